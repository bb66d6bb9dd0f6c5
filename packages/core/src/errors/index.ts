/**
 * Custom Error Classes
 */

import type { TranscodeState } from '../stateMachine.js';
import type { TranscodeOutcome } from '../types/transcode.js';

/**
 * Base error class for all directplay errors
 */
export class DirectPlayError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DirectPlayError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration values that fail validation
 */
export class ConfigError extends DirectPlayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * Inspection failed or produced output that is not structured data
 */
export class ProbeError extends DirectPlayError {
  constructor(filePath: string, reason: string) {
    super(
      `Probe failed for ${filePath}: ${reason}`,
      'PROBE_ERROR',
      { filePath, reason }
    );
    this.name = 'ProbeError';
  }
}

/**
 * A plan was asked for something it cannot describe
 */
export class PlanningError extends DirectPlayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PLANNING_ERROR', details);
    this.name = 'PlanningError';
  }
}

/**
 * Encode process exited non-zero
 */
export class ExecutionError extends DirectPlayError {
  public readonly exitCode: number;

  constructor(
    strategy: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `${strategy} exited with code ${exitCode}`,
      'EXECUTION_ERROR',
      { strategy, exitCode, stderr: stderr.slice(-1000) }
    );
    this.name = 'ExecutionError';
    this.exitCode = exitCode;
  }
}

/**
 * Encoded output exists but does not classify as compatible
 */
export class VerificationFailure extends DirectPlayError {
  public readonly issues: string[];

  constructor(strategy: string, issues: string[]) {
    super(
      `${strategy} output not compatible: ${issues.join('; ')}`,
      'VERIFICATION_FAILURE',
      { strategy, issues }
    );
    this.name = 'VerificationFailure';
    this.issues = issues;
  }
}

/**
 * Every tier failed; no artifact remains for this file
 */
export class TerminalFailure extends DirectPlayError {
  public readonly outcome: TranscodeOutcome;

  constructor(outcome: TranscodeOutcome) {
    super(
      `Transcode failed for ${outcome.input}: ${outcome.diagnostic}`,
      'TERMINAL_FAILURE',
      { input: outcome.input, attempts: outcome.attempts }
    );
    this.name = 'TerminalFailure';
    this.outcome = outcome;
  }
}

/**
 * External cancellation (e.g. SIGINT) observed at a suspension point
 */
export class CancelledError extends DirectPlayError {
  constructor(filePath?: string) {
    super(
      filePath ? `Cancelled while processing ${filePath}` : 'Cancelled',
      'CANCELLED',
      filePath ? { filePath } : undefined
    );
    this.name = 'CancelledError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends DirectPlayError {
  constructor(
    filePath: string,
    fromState: TranscodeState,
    toState: TranscodeState,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { filePath, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Throw CancelledError if the signal has fired
 */
export function throwIfCancelled(signal: AbortSignal | undefined, filePath?: string): void {
  if (signal?.aborted) {
    throw new CancelledError(filePath);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
