/**
 * @directplay/core
 * 
 * Core package containing:
 * - Transcode state machine
 * - Error taxonomy
 * - Target profile / encoder settings
 * - Binary resolution
 * - Shared outcome types
 */

// State machine
export { 
  TranscodeStateMachine,
  isValidTransition,
  getNextStates,
  isTerminalState,
  type TranscodeState,
  type TranscodeStateTransition, 
} from './stateMachine.js';

// Types
export {
  outcomeStateFor,
  type EncodeStrategy,
  type OutcomeState,
  type TranscodeOutcome,
} from './types/transcode.js';

// Errors
export { 
  DirectPlayError,
  ConfigError,
  ProbeError,
  PlanningError,
  ExecutionError,
  VerificationFailure,
  TerminalFailure,
  CancelledError,
  StateTransitionError,
  throwIfCancelled,
  errorMessage,
} from './errors/index.js';

// Profile configuration
export {
  targetProfileSchema,
  encoderSettingsSchema,
  createTargetProfile,
  createEncoderSettings,
  formatLevel,
  DEFAULT_TARGET_PROFILE,
  DEFAULT_ENCODER_SETTINGS,
  type TargetProfile,
  type TargetProfileInput,
  type EncoderSettings,
  type EncoderSettingsInput,
} from './config/profile.js';

// Binary Configuration
export {
  getBinariesConfig,
  type BinaryConfig,
  type BinariesConfig,
  type BinarySource,
} from './config/binaries.js';
