/**
 * Batch Driver
 * 
 * Runs the orchestrator over a file list, one file at a time. A file that
 * ends in TerminalFailure is recorded and the batch moves on; cancellation
 * stops the remaining queue and propagates to the caller.
 * 
 * Events:
 *   'start'     (file, index, total)
 *   'outcome'   (TranscodeOutcome)
 *   'cancelled' (file)
 */

import { EventEmitter } from 'node:events';
import { basename, join } from 'node:path';
import {
  CancelledError,
  TerminalFailure,
  errorMessage,
  throwIfCancelled,
  type TranscodeOutcome,
} from '@directplay/core';
import { createLogger, deriveOutputPath, ensureDir, moveFile, removeIfExists } from '@directplay/utils';
import type { TranscodeRequest } from './orchestrator.js';
import type { ProgressUpdate } from './types.js';

const logger = createLogger({ component: 'batch' });

/**
 * What happens to a source once it has been converted
 */
export type SourceAction = 'keep' | 'delete' | 'backup';

export interface Transcoder {
  transcode(request: TranscodeRequest): Promise<TranscodeOutcome>;
}

export interface BatchOptions {
  outputDir: string;
  outputExtension?: string;
  sourceAction?: SourceAction;
  backupDir?: string;        // required for 'backup'
}

export interface BatchRunOptions {
  signal?: AbortSignal;
  onProgress?: (update: ProgressUpdate) => void;
}

export interface BatchTally {
  skipped: number;
  remuxed: number;
  hwEncoded: number;
  swEncoded: number;
  failed: number;
}

export interface BatchResult {
  outcomes: TranscodeOutcome[];
  tally: BatchTally;
}

export function tallyOutcomes(outcomes: readonly TranscodeOutcome[]): BatchTally {
  const tally: BatchTally = { skipped: 0, remuxed: 0, hwEncoded: 0, swEncoded: 0, failed: 0 };
  for (const outcome of outcomes) {
    switch (outcome.state) {
      case 'skipped':
        tally.skipped++;
        break;
      case 'remuxed':
        tally.remuxed++;
        break;
      case 'hw-encoded':
        tally.hwEncoded++;
        break;
      case 'sw-encoded':
        tally.swEncoded++;
        break;
      case 'failed':
        tally.failed++;
        break;
    }
  }
  return tally;
}

function collisionOutcome(input: string, output: string, owner: string): TranscodeOutcome {
  logger.warn({ input, output, owner }, 'Output path already written in this batch');
  return {
    input,
    output: null,
    state: 'failed',
    diagnostic: `Output would collide with ${basename(owner)}: ${basename(output)}`,
    elapsedMs: 0,
    attempts: [],
  };
}

export class BatchDriver extends EventEmitter {
  private readonly transcoder: Transcoder;
  private readonly options: Required<Omit<BatchOptions, 'backupDir'>> & { backupDir?: string };

  constructor(transcoder: Transcoder, options: BatchOptions) {
    super();
    this.transcoder = transcoder;
    this.options = {
      outputDir: options.outputDir,
      outputExtension: options.outputExtension ?? 'mp4',
      sourceAction: options.sourceAction ?? 'keep',
      backupDir: options.backupDir,
    };
  }

  /**
   * Process files in order. Rejects with CancelledError on interrupt;
   * outcomes gathered so far are lost to the caller only in that case.
   */
  async run(files: readonly string[], runOptions: BatchRunOptions = {}): Promise<BatchResult> {
    const { signal, onProgress } = runOptions;
    const outcomes: TranscodeOutcome[] = [];
    // output path -> input that wrote it
    const claimed = new Map<string, string>();

    logger.info({ count: files.length, outputDir: this.options.outputDir }, 'Starting batch');

    for (const [index, file] of files.entries()) {
      const output = deriveOutputPath(file, this.options.outputDir, this.options.outputExtension);
      let outcome: TranscodeOutcome;
      try {
        throwIfCancelled(signal, file);
        this.emit('start', file, index, files.length);
        const owner = claimed.get(output);
        outcome = owner === undefined
          ? await this.transcoder.transcode({ input: file, output, signal, onProgress })
          : collisionOutcome(file, output, owner);
      } catch (error) {
        if (error instanceof TerminalFailure) {
          outcome = error.outcome;
        } else {
          if (error instanceof CancelledError) {
            logger.warn({ file, remaining: files.length - index - 1 }, 'Batch cancelled');
            this.emit('cancelled', file);
          }
          throw error;
        }
      }

      if (outcome.output !== null) {
        claimed.set(outcome.output, file);
      }
      if (outcome.state !== 'skipped' && outcome.state !== 'failed') {
        await this.handleSource(file);
      }

      outcomes.push(outcome);
      this.emit('outcome', outcome);
    }

    const tally = tallyOutcomes(outcomes);
    logger.info(tally, 'Batch complete');
    return { outcomes, tally };
  }

  /**
   * Apply the configured source action. Failures are logged; the
   * converted output is already in place.
   */
  private async handleSource(file: string): Promise<void> {
    const { sourceAction, backupDir } = this.options;
    try {
      if (sourceAction === 'delete') {
        await removeIfExists(file);
        logger.debug({ file }, 'Deleted source');
      } else if (sourceAction === 'backup' && backupDir) {
        await ensureDir(backupDir);
        await moveFile(file, join(backupDir, basename(file)));
        logger.debug({ file, backupDir }, 'Moved source to backup');
      }
    } catch (error) {
      logger.warn({ file, action: sourceAction, error: errorMessage(error) }, 'Source action failed');
    }
  }
}
