/**
 * Transcode Types
 * 
 * Strategy tags and per-file outcome records shared across packages.
 */

/**
 * Cheapest-first transformation tiers
 */
export type EncodeStrategy = 'skip' | 'remux' | 'hw-encode' | 'sw-encode';

export type OutcomeState = 'skipped' | 'remuxed' | 'hw-encoded' | 'sw-encoded' | 'failed';

export interface TranscodeOutcome {
  input: string;
  output: string | null;     // null when nothing was written (skipped, failed)
  state: OutcomeState;
  diagnostic: string;
  elapsedMs: number;
  attempts: EncodeStrategy[]; // strategies that spawned a process, in order
}

export function outcomeStateFor(strategy: EncodeStrategy): OutcomeState {
  switch (strategy) {
    case 'skip':
      return 'skipped';
    case 'remux':
      return 'remuxed';
    case 'hw-encode':
      return 'hw-encoded';
    case 'sw-encode':
      return 'sw-encoded';
  }
}
