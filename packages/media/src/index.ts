/**
 * @directplay/media
 * 
 * Media inspection layer.
 * 
 * Responsibilities:
 * - Probe files with ffprobe into an immutable MediaDescription
 * - Query container duration for progress reporting
 * - Classify descriptions against the target direct-play profile
 */

// Probing
export {
  FFProbe,
  parseProbeOutput,
  parseDuration,
  type FFProbeResult,
  type FFProbeStream,
} from './probes/ffprobe.js';

// Classification
export {
  classify,
  normalizeLevel,
  hasOnlyContainerIssues,
  hasIssue,
  type Issue,
  type IssueCategory,
  type CompatibilityVerdict,
} from './classifier.js';

// Types
export {
  firstVideoStream,
  audioStreams,
  subtitleStreams,
  type StreamKind,
  type StreamInfo,
  type VideoStreamInfo,
  type AudioStreamInfo,
  type SubtitleStreamInfo,
  type OtherStreamInfo,
  type MediaDescription,
  type MediaProber,
} from './types.js';
