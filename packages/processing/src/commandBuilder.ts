/**
 * FFmpeg Command Builder
 * 
 * Fluent API for building ffmpeg argument lists from an EncodePlan.
 * Arguments are returned as an array and never passed through a shell.
 */

import {
  PlanningError,
  type EncoderSettings,
  type TargetProfile,
} from '@directplay/core';
import { createLogger } from '@directplay/utils';
import { getAudioPreset, getVideoPreset } from './presets.js';
import type { EncodePlan, ScaleBox, VideoEncoder } from './types.js';

const logger = createLogger({ component: 'command-builder' });

export interface OutputOptions {
  format?: string;        // -f format
  movflags?: string;      // -movflags for mp4
  extraArgs?: string[];
}

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g. '2', 'a:0'
  optional?: boolean;     // trailing ? tolerates a missing stream
}

export interface VideoCodecOptions {
  codec: 'copy' | VideoEncoder;
  preset?: string;
  crf?: number;
  bitrate?: string;
  maxrate?: string;
  bufsize?: string;
  profile?: string;
  level?: string;
  pixFmt?: string;
  extraArgs?: string[];
}

export interface AudioCodecOptions {
  codec: 'copy' | 'aac';
  bitrate?: string;
  channels?: number;
  extraArgs?: string[];
}

export class FFmpegCommandBuilder {
  private inputs: string[] = [];
  private mappings: StreamMapping[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private videoFilters: string[] = [];
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private globalArgs: string[] = [];

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string, optional: boolean = false): this {
    this.mappings.push({ inputIndex, streamSpec, optional });
    return this;
  }

  /**
   * Set video codec (copy = no re-encode)
   */
  setVideoCodec(options: VideoCodecOptions | 'copy'): this {
    this.videoCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /**
   * Set audio codec (copy = no re-encode)
   */
  setAudioCodec(options: AudioCodecOptions | 'copy'): this {
    this.audioCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  addVideoFilter(filter: string): this {
    this.videoFilters.push(filter);
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [...this.globalArgs];

    for (const input of this.inputs) {
      args.push('-i', input);
    }

    for (const mapping of this.mappings) {
      const opt = mapping.optional ? '?' : '';
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}${opt}`);
    }

    // Video codec
    if (this.videoCodec) {
      const v = this.videoCodec;
      args.push('-c:v', v.codec);

      if (v.codec !== 'copy') {
        if (v.preset) args.push('-preset', v.preset);
        if (v.crf !== undefined) args.push('-crf', v.crf.toString());
        if (v.bitrate) args.push('-b:v', v.bitrate);
        if (v.maxrate) args.push('-maxrate', v.maxrate);
        if (v.bufsize) args.push('-bufsize', v.bufsize);
        if (v.profile) args.push('-profile:v', v.profile);
        if (v.level) args.push('-level', v.level);
        if (v.pixFmt) args.push('-pix_fmt', v.pixFmt);
        if (v.extraArgs) args.push(...v.extraArgs);
      }
    }

    // Video filters (only if not copying)
    if (this.videoFilters.length > 0) {
      if (this.videoCodec?.codec === 'copy') {
        logger.warn('Video filters specified but codec is copy - filters will be ignored');
      } else {
        args.push('-vf', this.videoFilters.join(','));
      }
    }

    // Audio codec
    if (this.audioCodec) {
      const a = this.audioCodec;
      args.push('-c:a', a.codec);

      if (a.codec !== 'copy') {
        if (a.bitrate) args.push('-b:a', a.bitrate);
        if (a.channels) args.push('-ac', a.channels.toString());
        if (a.extraArgs) args.push(...a.extraArgs);
      }
    }

    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }
    if (this.outputOpts.format) {
      args.push('-f', this.outputOpts.format);
    }
    if (this.outputOpts.extraArgs) {
      args.push(...this.outputOpts.extraArgs);
    }

    if (!this.outputFile) {
      throw new PlanningError('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }

  /**
   * Build command as string for logging
   */
  buildString(): string {
    return `ffmpeg ${this.build().map(a => a.includes(' ') ? `"${a}"` : a).join(' ')}`;
  }
}

/**
 * Fit inside the box keeping aspect ratio. The free dimension is -2 so
 * the encoder rounds it to an even value, as 4:2:0 chroma requires.
 */
export function buildScaleFilter(box: ScaleBox): string {
  const ratio = `${box.width}/${box.height}`;
  return `scale='if(gt(iw/ih,${ratio}),${box.width},-2)':'if(gt(iw/ih,${ratio}),-2,${box.height})'`;
}

function applyOutputOptions(builder: FFmpegCommandBuilder, settings: EncoderSettings): void {
  builder.setOutputOptions({
    format: settings.outputFormat,
    movflags: settings.fastStart ? '+faststart' : undefined,
  });
}

function mapVideo(builder: FFmpegCommandBuilder, plan: EncodePlan): void {
  if (plan.videoStreamIndex !== null) {
    builder.map(0, plan.videoStreamIndex.toString());
  } else {
    builder.map(0, 'v:0');
  }
}

/**
 * Stream copy into the target container. Only the planned video and
 * audio streams are mapped, so embedded subtitles are left behind.
 */
export function createRemuxCommand(
  plan: EncodePlan,
  inputFile: string,
  outputFile: string,
  settings: EncoderSettings
): FFmpegCommandBuilder {
  const builder = new FFmpegCommandBuilder()
    .addGlobalArg('-hide_banner', '-y')
    .addInput(inputFile);

  mapVideo(builder, plan);
  if (plan.audioStreamIndex !== null) {
    builder.map(0, plan.audioStreamIndex.toString());
  } else {
    builder.map(0, 'a:0', true);
  }

  builder
    .setVideoCodec('copy')
    .setAudioCodec('copy')
    .setOutput(outputFile);
  applyOutputOptions(builder, settings);

  return builder;
}

/**
 * Build the ffmpeg invocation for any plan that spawns a process
 */
export function createEncodeCommand(
  plan: EncodePlan,
  inputFile: string,
  outputFile: string,
  profile: TargetProfile,
  settings: EncoderSettings
): FFmpegCommandBuilder {
  if (plan.strategy === 'skip') {
    throw new PlanningError('A skip plan has no command', { input: inputFile });
  }
  if (plan.strategy === 'remux') {
    return createRemuxCommand(plan, inputFile, outputFile, settings);
  }
  if (plan.encoder === null) {
    throw new PlanningError(`${plan.strategy} plan has no encoder`, { input: inputFile });
  }

  const builder = new FFmpegCommandBuilder()
    .addGlobalArg('-hide_banner', '-y')
    .addInput(inputFile);

  mapVideo(builder, plan);
  builder.setVideoCodec(getVideoPreset(plan.encoder, profile, settings));
  if (plan.scale) {
    builder.addVideoFilter(buildScaleFilter(plan.scale));
  }

  if (plan.copyAudio && plan.audioStreamIndex !== null) {
    builder.map(0, plan.audioStreamIndex.toString()).setAudioCodec('copy');
  } else {
    builder.map(0, 'a:0', true).setAudioCodec(getAudioPreset(settings));
  }

  builder.setOutput(outputFile);
  applyOutputOptions(builder, settings);

  return builder;
}
