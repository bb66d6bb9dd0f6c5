/**
 * FFmpeg Wrapper
 * 
 * Runs ffmpeg in its own process group with the progress feed on stdout.
 * Cancelling the signal takes the whole group down (SIGTERM, then SIGKILL
 * after the grace period) and the run rejects with CancelledError.
 */

import { CancelledError, errorMessage } from '@directplay/core';
import { createLogger, executeCommand, runStreamingCommand } from '@directplay/utils';
import type { EncodeRunOptions, EncodeRunResult, EncodeRunner } from './types.js';

const logger = createLogger({ component: 'ffmpeg' });

export interface FFmpegOptions {
  ffmpegPath?: string;
  killGraceMs?: number;
}

export class FFmpeg implements EncodeRunner {
  private readonly ffmpegPath: string;
  private readonly killGraceMs: number;

  constructor(options: FFmpegOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.killGraceMs = options.killGraceMs ?? 2000;
  }

  async run(args: string[], options: EncodeRunOptions = {}): Promise<EncodeRunResult> {
    // Progress as key=value lines on stdout, errors only on stderr
    const fullArgs = [
      '-progress', 'pipe:1',
      '-nostats',
      '-loglevel', 'error',
      ...args,
    ];

    logger.debug({ command: this.ffmpegPath, args: fullArgs }, 'Spawning ffmpeg');

    const result = await runStreamingCommand(this.ffmpegPath, fullArgs, {
      signal: options.signal,
      killGraceMs: this.killGraceMs,
      onStdoutLine: options.onProgressLine,
    });

    if (result.cancelled) {
      logger.warn({ killed: result.killed }, 'ffmpeg cancelled');
      throw new CancelledError();
    }

    return {
      exitCode: result.exitCode,
      stderr: result.stderr,
      durationMs: result.duration,
    };
  }

  /**
   * Check if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffmpegPath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, 'ffmpeg not runnable');
      return false;
    }
  }
}
