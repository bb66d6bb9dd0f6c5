/**
 * Processing Types
 */

import type { EncodeStrategy } from '@directplay/core';

export type HardwareEncoder = 'h264_nvenc' | 'h264_videotoolbox' | 'h264_qsv';
export type VideoEncoder = 'libx264' | HardwareEncoder;

/**
 * What this host can offer the planner
 */
export interface HardwareCapability {
  encoder: HardwareEncoder | null; // detected on this host
  enabled: boolean;                // hardware use permitted by configuration
}

/**
 * Box the video is scaled down into, aspect ratio preserved
 */
export interface ScaleBox {
  width: number;
  height: number;
}

/**
 * Immutable execution plan for one attempt. A fallback builds a new one.
 */
export interface EncodePlan {
  readonly strategy: EncodeStrategy;
  readonly encoder: VideoEncoder | null;   // null: nothing is encoded (skip, remux)
  readonly scale: ScaleBox | null;         // null: no scaling required
  readonly copyAudio: boolean;
  readonly videoStreamIndex: number | null;
  readonly audioStreamIndex: number | null; // stream copied when copyAudio
}

export interface EncodeRunOptions {
  signal?: AbortSignal;
  onProgressLine?: (line: string) => void;
}

export interface EncodeRunResult {
  exitCode: number;
  stderr: string;
  durationMs: number;
}

/**
 * Encode capability: runs one encoder invocation to completion.
 * Rejects with CancelledError once the signal fires and the process is gone.
 */
export interface EncodeRunner {
  run(args: string[], options?: EncodeRunOptions): Promise<EncodeRunResult>;
}

export interface ProgressUpdate {
  file: string;
  strategy: EncodeStrategy;
  percent: number;
}
