/**
 * FFProbe Wrapper
 * 
 * Safe wrapper for ffprobe command execution.
 * Requests full stream and format metadata as JSON and validates it
 * into a MediaDescription.
 */

import { z } from 'zod';
import { executeCommand, createLogger, type CommandResult } from '@directplay/utils';
import { ProbeError, errorMessage } from '@directplay/core';
import type { MediaDescription, MediaProber, StreamInfo } from '../types.js';

const log = createLogger({ component: 'ffprobe' });

const ffprobeStreamSchema = z.object({
  index: z.number().int().optional(),
  codec_type: z.string().optional(),
  codec_name: z.string().optional(),
  profile: z.string().optional(),
  pix_fmt: z.string().optional(),
  level: z.union([z.number(), z.string()]).optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  channels: z.number().optional(),
  tags: z.object({
    language: z.string().optional(),
  }).passthrough().optional(),
}).passthrough();

const ffprobeOutputSchema = z.object({
  format: z.object({
    format_name: z.string().optional(),
    duration: z.string().optional(),
  }).passthrough().optional(),
  streams: z.array(ffprobeStreamSchema).optional(),
}).passthrough();

export type FFProbeStream = z.infer<typeof ffprobeStreamSchema>;
export type FFProbeResult = z.infer<typeof ffprobeOutputSchema>;

function toNumber(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(n) ? n : undefined;
}

function toStreamInfo(stream: FFProbeStream, position: number): StreamInfo {
  const index = stream.index ?? position;
  const codec = stream.codec_name ?? '';

  switch (stream.codec_type) {
    case 'video':
      return {
        kind: 'video',
        index,
        codec,
        pixelFormat: stream.pix_fmt,
        profile: stream.profile,
        level: toNumber(stream.level),
        width: stream.width ?? 0,
        height: stream.height ?? 0,
      };
    case 'audio':
      return { kind: 'audio', index, codec, channels: stream.channels };
    case 'subtitle':
      return { kind: 'subtitle', index, codec, language: stream.tags?.language };
    default:
      return { kind: 'other', index, codec };
  }
}

/**
 * Turn ffprobe's JSON stdout into a MediaDescription
 */
export function parseProbeOutput(filePath: string, stdout: string): MediaDescription {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new ProbeError(filePath, `unparseable output: ${stdout.substring(0, 200)}`);
  }

  const parsed = ffprobeOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProbeError(filePath, `unexpected output shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const streams = (parsed.data.streams ?? []).map(toStreamInfo);
  return Object.freeze({
    format: parsed.data.format?.format_name ?? '',
    streams: Object.freeze(streams),
  });
}

export class FFProbe implements MediaProber {
  private ffprobePath: string;
  private timeoutMs: number;

  constructor(ffprobePath: string = 'ffprobe', timeoutMs: number = 60000) {
    this.ffprobePath = ffprobePath;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Probe a media file and return its stream/format description
   */
  async probe(filePath: string): Promise<MediaDescription> {
    const args = [
      '-v', 'error',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];

    let result: CommandResult;
    try {
      result = await executeCommand(this.ffprobePath, args, { timeout: this.timeoutMs });
    } catch (error) {
      throw new ProbeError(filePath, `could not run ffprobe: ${errorMessage(error)}`);
    }

    if (result.exitCode !== 0) {
      throw new ProbeError(filePath, `ffprobe exited with code ${result.exitCode}: ${result.stderr.trim()}`);
    }

    return parseProbeOutput(filePath, result.stdout);
  }

  /**
   * Container duration in seconds; null when unknown
   */
  async getDuration(filePath: string): Promise<number | null> {
    const args = [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      filePath,
    ];

    try {
      const result = await executeCommand(this.ffprobePath, args, { timeout: this.timeoutMs });
      if (result.exitCode !== 0) {
        log.debug({ filePath, exitCode: result.exitCode }, 'Duration query failed');
        return null;
      }
      return parseDuration(result.stdout);
    } catch (error) {
      log.warn({ filePath, error: errorMessage(error) }, 'Duration query could not run');
      return null;
    }
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffprobePath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch (error) {
      log.debug({ error: errorMessage(error) }, 'ffprobe not runnable');
      return false;
    }
  }
}

export function parseDuration(stdout: string): number | null {
  const value = parseFloat(stdout.trim());
  return Number.isFinite(value) && value > 0 ? value : null;
}
