/**
 * Transcode Orchestrator
 * 
 * Drives one file through plan → execute → verify → fallback. Each state
 * is a Step value; handlers return the next Step and the loop feeds every
 * transition through TranscodeStateMachine, so an illegal edge throws.
 * 
 * Attempts write to a per-strategy temporary path. Only a verified
 * artifact is moved onto the final path; every other scratch file is
 * removed before the call returns or throws.
 * 
 * Only TerminalFailure and CancelledError leave this class.
 */

import { dirname } from 'node:path';
import {
  CancelledError,
  ExecutionError,
  ProbeError,
  TerminalFailure,
  TranscodeStateMachine,
  VerificationFailure,
  errorMessage,
  outcomeStateFor,
  throwIfCancelled,
  type EncodeStrategy,
  type EncoderSettings,
  type OutcomeState,
  type TargetProfile,
  type TranscodeOutcome,
} from '@directplay/core';
import {
  classify,
  hasIssue,
  type CompatibilityVerdict,
  type MediaDescription,
  type MediaProber,
} from '@directplay/media';
import {
  createLogger,
  deriveTempPath,
  ensureDir,
  moveFile,
  removeIfExists,
  type Logger,
} from '@directplay/utils';
import { createEncodeCommand } from './commandBuilder.js';
import { planEncode } from './planner.js';
import { ProgressMonitor, type ProgressEvent } from './progressMonitor.js';
import type {
  EncodePlan,
  EncodeRunner,
  HardwareCapability,
  ProgressUpdate,
} from './types.js';

const logger = createLogger({ component: 'orchestrator' });

export interface OrchestratorOptions {
  prober: MediaProber;
  runner: EncodeRunner;
  profile: TargetProfile;
  settings: EncoderSettings;
  hardware: HardwareCapability;
}

export interface TranscodeRequest {
  input: string;
  output: string;           // final path; attempts write next to it
  signal?: AbortSignal;
  onProgress?: (update: ProgressUpdate) => void;
}

type Step =
  | { state: 'EXECUTING'; plan: EncodePlan }
  | { state: 'VERIFYING'; plan: EncodePlan; tempPath: string }
  | { state: 'RETRYING'; failed: EncodePlan; reason: string }
  | { state: 'DONE'; plan: EncodePlan }
  | { state: 'FAILED'; reason: string };

interface FileContext {
  input: string;
  output: string;
  signal?: AbortSignal;
  onProgress?: (update: ProgressUpdate) => void;
  source: MediaDescription;
  verdict: CompatibilityVerdict;
  durationSeconds: number | null;
  attempts: EncodeStrategy[];
  scratch: Set<string>;
  fallbackReason: string | null;
  log: Logger;
}

const STRATEGY_LABELS: Record<EncodeStrategy, string> = {
  'skip': 'Already compatible',
  'remux': 'Remuxed (stream copy)',
  'hw-encode': 'Hardware encode',
  'sw-encode': 'Software encode',
};

export class TranscodeOrchestrator {
  private readonly prober: MediaProber;
  private readonly runner: EncodeRunner;
  private readonly profile: TargetProfile;
  private readonly settings: EncoderSettings;
  private readonly hardware: HardwareCapability;

  constructor(options: OrchestratorOptions) {
    this.prober = options.prober;
    this.runner = options.runner;
    this.profile = options.profile;
    this.settings = options.settings;
    this.hardware = options.hardware;
  }

  async transcode(request: TranscodeRequest): Promise<TranscodeOutcome> {
    const { input, output, signal } = request;
    const startedAt = Date.now();
    const machine = new TranscodeStateMachine(input);
    const attempts: EncodeStrategy[] = [];
    const scratch = new Set<string>();
    const log = logger.child({ file: input });

    const finish = (state: OutcomeState, diagnostic: string, outputPath: string | null): TranscodeOutcome => ({
      input,
      output: outputPath,
      state,
      diagnostic,
      elapsedMs: Date.now() - startedAt,
      attempts: [...attempts],
    });

    const fail = (reason: string): never => {
      if (machine.canTransitionTo('FAILED')) {
        machine.transitionTo('FAILED', reason);
      }
      const outcome = finish('failed', reason, null);
      log.error({ attempts: outcome.attempts, diagnostic: reason }, 'Transcode failed');
      throw new TerminalFailure(outcome);
    };

    try {
      throwIfCancelled(signal, input);

      let source: MediaDescription;
      try {
        source = await this.prober.probe(input);
      } catch (error) {
        if (error instanceof ProbeError) {
          return fail(error.message);
        }
        throw error;
      }
      throwIfCancelled(signal, input);

      const verdict = classify(source, this.profile);
      if (hasIssue(verdict, 'no-video-stream')) {
        return fail('No video stream');
      }

      const plan = planEncode(source, verdict, this.profile, this.hardware);
      log.info(
        { strategy: plan.strategy, issues: verdict.issues.map(i => i.message) },
        'Planned'
      );

      if (plan.strategy === 'skip') {
        machine.transitionTo('DONE', 'already compatible');
        return finish('skipped', STRATEGY_LABELS.skip, null);
      }

      const durationSeconds = await this.prober.getDuration(input);
      throwIfCancelled(signal, input);
      await ensureDir(dirname(output));

      const ctx: FileContext = {
        input,
        output,
        signal,
        onProgress: request.onProgress,
        source,
        verdict,
        durationSeconds,
        attempts,
        scratch,
        fallbackReason: null,
        log,
      };

      let step: Step = { state: 'EXECUTING', plan };
      for (;;) {
        if (step.state === 'FAILED') {
          return fail(step.reason);
        }

        machine.transitionTo(step.state, step.state === 'RETRYING' ? step.reason : undefined);

        switch (step.state) {
          case 'EXECUTING':
            step = await this.execute(ctx, step.plan);
            break;
          case 'VERIFYING':
            step = await this.verify(ctx, step.plan, step.tempPath);
            break;
          case 'RETRYING':
            step = this.retry(ctx, step.failed, step.reason);
            break;
          case 'DONE': {
            const outcome = finish(outcomeStateFor(step.plan.strategy), this.describe(ctx, step.plan), output);
            log.info({ state: outcome.state, elapsedMs: outcome.elapsedMs }, 'Transcode complete');
            return outcome;
          }
        }
      }
    } catch (error) {
      if (error instanceof TerminalFailure) {
        throw error;
      }
      if (error instanceof CancelledError) {
        if (machine.canTransitionTo('CANCELLED')) {
          machine.transitionTo('CANCELLED');
        }
        log.warn({ attempts }, 'Transcode cancelled');
        throw error;
      }
      return fail(`Unexpected error: ${errorMessage(error)}`);
    } finally {
      await this.discardAll(scratch, log);
    }
  }

  private async execute(ctx: FileContext, plan: EncodePlan): Promise<Step> {
    throwIfCancelled(ctx.signal, ctx.input);

    const tempPath = deriveTempPath(ctx.output, plan.strategy);
    const args = createEncodeCommand(plan, ctx.input, tempPath, this.profile, this.settings).build();

    const monitor = new ProgressMonitor(ctx.durationSeconds);
    monitor.on('progress', (event: ProgressEvent) => {
      ctx.onProgress?.({ file: ctx.input, strategy: plan.strategy, percent: event.percent });
    });

    ctx.scratch.add(tempPath);
    ctx.attempts.push(plan.strategy);
    ctx.log.info({ strategy: plan.strategy, encoder: plan.encoder, attempt: ctx.attempts.length }, 'Executing');

    const result = await this.runner.run(args, {
      signal: ctx.signal,
      onProgressLine: line => monitor.feedLine(line),
    });
    throwIfCancelled(ctx.signal, ctx.input);

    if (result.exitCode !== 0) {
      const error = new ExecutionError(plan.strategy, result.exitCode, result.stderr);
      const lastLine = result.stderr.trim().split('\n').pop();
      const reason = lastLine ? `${error.message}: ${lastLine}` : error.message;
      ctx.log.warn({ exitCode: result.exitCode, stderr: error.details?.['stderr'] }, error.message);
      await this.discard(ctx, tempPath);
      return this.afterFailure(plan, reason);
    }

    return { state: 'VERIFYING', plan, tempPath };
  }

  private async verify(ctx: FileContext, plan: EncodePlan, tempPath: string): Promise<Step> {
    let produced: MediaDescription;
    try {
      produced = await this.prober.probe(tempPath);
    } catch (error) {
      if (!(error instanceof ProbeError)) {
        throw error;
      }
      ctx.log.warn({ strategy: plan.strategy, error: error.message }, 'Output could not be probed');
      await this.discard(ctx, tempPath);
      return this.afterFailure(plan, error.message);
    }
    throwIfCancelled(ctx.signal, ctx.input);

    const verdict = classify(produced, this.profile);
    if (!verdict.compatible) {
      const failure = new VerificationFailure(plan.strategy, verdict.issues.map(i => i.message));
      ctx.log.warn({ strategy: plan.strategy, issues: failure.issues }, 'Output failed verification');
      await this.discard(ctx, tempPath);
      return this.afterFailure(plan, failure.message);
    }

    await moveFile(tempPath, ctx.output);
    ctx.scratch.delete(tempPath);
    return { state: 'DONE', plan };
  }

  /**
   * Fresh software plan; the failed one is left untouched
   */
  private retry(ctx: FileContext, failed: EncodePlan, reason: string): Step {
    ctx.fallbackReason = reason;
    const plan = planEncode(ctx.source, ctx.verdict, this.profile, this.hardware, {
      forceSoftware: true,
    });
    ctx.log.info({ from: failed.strategy, to: plan.strategy, reason }, 'Falling back');
    return { state: 'EXECUTING', plan };
  }

  /**
   * Software encode is the last tier
   */
  private afterFailure(plan: EncodePlan, reason: string): Step {
    if (plan.strategy === 'sw-encode') {
      return { state: 'FAILED', reason };
    }
    return { state: 'RETRYING', failed: plan, reason };
  }

  private describe(ctx: FileContext, plan: EncodePlan): string {
    let text = STRATEGY_LABELS[plan.strategy];
    if (plan.encoder) {
      text += ` with ${plan.encoder}`;
    }
    if (plan.scale) {
      text += `, scaled to fit ${plan.scale.width}x${plan.scale.height}`;
    }
    if (ctx.fallbackReason) {
      text += ` (after ${ctx.fallbackReason})`;
    }
    return text;
  }

  private async discard(ctx: FileContext, path: string): Promise<void> {
    await removeIfExists(path);
    ctx.scratch.delete(path);
  }

  private async discardAll(scratch: Set<string>, log: Logger): Promise<void> {
    for (const path of scratch) {
      try {
        await removeIfExists(path);
      } catch (error) {
        log.error({ path, error: errorMessage(error) }, 'Could not remove temporary file');
      }
    }
    scratch.clear();
  }
}
