/**
 * Media Types
 * 
 * Internal description of a probed file. Produced once by the probe and
 * never mutated afterwards.
 */

export type StreamKind = 'video' | 'audio' | 'subtitle' | 'other';

export interface VideoStreamInfo {
  kind: 'video';
  index: number;
  codec: string;
  pixelFormat?: string;
  profile?: string;
  level?: number; // raw, as reported: 41 or 4.1
  width: number;
  height: number;
}

export interface AudioStreamInfo {
  kind: 'audio';
  index: number;
  codec: string;
  channels?: number;
}

export interface SubtitleStreamInfo {
  kind: 'subtitle';
  index: number;
  codec: string;
  language?: string;
}

export interface OtherStreamInfo {
  kind: 'other';
  index: number;
  codec: string;
}

export type StreamInfo = VideoStreamInfo | AudioStreamInfo | SubtitleStreamInfo | OtherStreamInfo;

export interface MediaDescription {
  readonly format: string; // container format_name, '' when unknown
  readonly streams: readonly StreamInfo[];
}

/**
 * Inspection capability the pipeline depends on
 */
export interface MediaProber {
  probe(filePath: string): Promise<MediaDescription>;
  /** Seconds, or null when the duration cannot be determined */
  getDuration(filePath: string): Promise<number | null>;
}

export function firstVideoStream(desc: MediaDescription): VideoStreamInfo | undefined {
  return desc.streams.find((s): s is VideoStreamInfo => s.kind === 'video');
}

export function audioStreams(desc: MediaDescription): AudioStreamInfo[] {
  return desc.streams.filter((s): s is AudioStreamInfo => s.kind === 'audio');
}

export function subtitleStreams(desc: MediaDescription): SubtitleStreamInfo[] {
  return desc.streams.filter((s): s is SubtitleStreamInfo => s.kind === 'subtitle');
}
