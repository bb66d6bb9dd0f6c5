/**
 * @directplay/processing
 * 
 * Planning and execution layer.
 * 
 * Responsibilities:
 * - Choose the cheapest strategy that reaches the target profile
 * - Build ffmpeg arguments for remux and encode plans
 * - Detect hardware encoders
 * - Run ffmpeg with a live progress feed and process-group cancellation
 * - Drive each file through execute → verify → fallback
 * - Run batches and tally outcomes
 */

// Planning
export { planEncode, type PlanOptions } from './planner.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  createRemuxCommand,
  createEncodeCommand,
  buildScaleFilter,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type OutputOptions,
  type StreamMapping,
} from './commandBuilder.js';

// Encoder Presets
export { getVideoPreset, getAudioPreset } from './presets.js';

// Hardware detection
export {
  HardwareEncoderDetector,
  parseEncoderNames,
  selectHardwareEncoder,
} from './hardware.js';

// Progress
export { ProgressMonitor, type ProgressEvent } from './progressMonitor.js';

// FFmpeg runner
export { FFmpeg, type FFmpegOptions } from './ffmpeg.js';

// Orchestration
export {
  TranscodeOrchestrator,
  type OrchestratorOptions,
  type TranscodeRequest,
} from './orchestrator.js';

export {
  BatchDriver,
  tallyOutcomes,
  type SourceAction,
  type Transcoder,
  type BatchOptions,
  type BatchRunOptions,
  type BatchResult,
  type BatchTally,
} from './batch.js';

// Types
export type {
  EncodePlan,
  EncodeRunner,
  EncodeRunOptions,
  EncodeRunResult,
  HardwareCapability,
  HardwareEncoder,
  VideoEncoder,
  ScaleBox,
  ProgressUpdate,
} from './types.js';
