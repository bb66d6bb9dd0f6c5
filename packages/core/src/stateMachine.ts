/**
 * Transcode State Machine
 * 
 * Strict per-file state machine for the transcode workflow.
 * 
 * State Flow:
 * PLANNED → EXECUTING → VERIFYING → DONE
 *               ↓            ↓
 *            RETRYING ←──────┘
 *               ↓
 *           EXECUTING (software tier, once)
 * 
 *   ↘ FAILED / CANCELLED (from any non-terminal state)
 * 
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Every transition is logged
 */

import { createLogger, type Logger } from '@directplay/utils';
import { StateTransitionError } from './errors/index.js';

export type TranscodeState =
  | 'PLANNED'
  | 'EXECUTING'
  | 'VERIFYING'
  | 'RETRYING'
  | 'DONE'
  | 'FAILED'
  | 'CANCELLED';

/**
 * Represents a state transition with metadata
 */
export interface TranscodeStateTransition {
  from: TranscodeState;
  to: TranscodeState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<TranscodeState, ReadonlySet<TranscodeState>> = {
  PLANNED: new Set<TranscodeState>([
    'EXECUTING',
    'DONE', // skip: nothing to run
    'FAILED',
    'CANCELLED',
  ]),
  EXECUTING: new Set<TranscodeState>([
    'VERIFYING',
    'RETRYING', // non-zero exit
    'FAILED',
    'CANCELLED',
  ]),
  VERIFYING: new Set<TranscodeState>([
    'DONE',
    'RETRYING',
    'FAILED',
    'CANCELLED',
  ]),
  RETRYING: new Set<TranscodeState>([
    'EXECUTING',
    'FAILED',
    'CANCELLED',
  ]),
  DONE: new Set<TranscodeState>([]),
  FAILED: new Set<TranscodeState>([]),
  CANCELLED: new Set<TranscodeState>([]),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: TranscodeState, to: TranscodeState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: TranscodeState): TranscodeState[] {
  return Array.from(validTransitions[current]);
}

export function isTerminalState(state: TranscodeState): boolean {
  return validTransitions[state].size === 0;
}

/**
 * Transcode State Machine class
 * Manages state transitions with validation and logging
 */
export class TranscodeStateMachine {
  private currentState: TranscodeState;
  private history: TranscodeStateTransition[];
  private readonly filePath: string;
  private readonly log: Logger;

  constructor(filePath: string, initialState: TranscodeState = 'PLANNED') {
    this.filePath = filePath;
    this.currentState = initialState;
    this.history = [];
    this.log = createLogger({ component: 'state-machine', file: filePath });
  }

  /**
   * Get the current state
   */
  getState(): TranscodeState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<TranscodeStateTransition> {
    return [...this.history];
  }

  /**
   * Check if a transition to the target state is valid
   */
  canTransitionTo(targetState: TranscodeState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: TranscodeState, reason?: string): TranscodeStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.filePath, this.currentState, targetState);
    }

    const transition: TranscodeStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;
    this.log.debug({ from: transition.from, to: targetState, reason }, 'State transition');

    return transition;
  }

  /**
   * Check if the workflow has reached a terminal state
   */
  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

  /**
   * Count how often a state has been entered
   */
  timesEntered(state: TranscodeState): number {
    return this.history.filter(t => t.to === state).length;
  }
}
