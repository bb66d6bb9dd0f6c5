/**
 * Encoder Presets
 * 
 * Per-encoder video settings for the H.264 target. Each encoder gets its
 * own quality control: CRF for libx264, VBR with a CQ target for NVENC,
 * a quality hint under a bitrate ceiling for VideoToolbox, global quality
 * for QSV.
 */

import { formatLevel, type EncoderSettings, type TargetProfile } from '@directplay/core';
import type { AudioCodecOptions, VideoCodecOptions } from './commandBuilder.js';
import type { VideoEncoder } from './types.js';

export function getVideoPreset(
  encoder: VideoEncoder,
  profile: TargetProfile,
  settings: EncoderSettings
): VideoCodecOptions {
  const level = formatLevel(profile.maxLevel);

  switch (encoder) {
    case 'libx264':
      return {
        codec: 'libx264',
        preset: settings.software.preset,
        crf: settings.software.crf,
        pixFmt: profile.pixelFormat,
        profile: settings.encodeProfile,
        level,
      };

    case 'h264_nvenc':
      return {
        codec: 'h264_nvenc',
        preset: settings.nvenc.preset,
        bitrate: '0', // let CQ drive quality, capped by maxrate
        maxrate: settings.hardwareMaxrate,
        bufsize: settings.hardwareBufsize,
        pixFmt: profile.pixelFormat,
        profile: settings.encodeProfile,
        level,
        extraArgs: ['-rc', 'vbr', '-cq', settings.nvenc.cq.toString()],
      };

    case 'h264_videotoolbox':
      return {
        codec: 'h264_videotoolbox',
        bitrate: settings.hardwareMaxrate,
        maxrate: settings.hardwareMaxrate,
        bufsize: settings.hardwareBufsize,
        pixFmt: profile.pixelFormat,
        profile: settings.encodeProfile,
        level,
        extraArgs: ['-q:v', settings.videotoolbox.quality.toString()],
      };

    case 'h264_qsv':
      // qsv negotiates nv12 on its own; forcing a pixel format breaks upload
      return {
        codec: 'h264_qsv',
        preset: settings.qsv.preset,
        maxrate: settings.hardwareMaxrate,
        bufsize: settings.hardwareBufsize,
        profile: settings.encodeProfile,
        level,
        extraArgs: ['-global_quality', settings.qsv.globalQuality.toString()],
      };
  }
}

/**
 * Re-encode target for sources with no compatible audio track
 */
export function getAudioPreset(settings: EncoderSettings): AudioCodecOptions {
  return {
    codec: 'aac',
    bitrate: settings.audioBitrate,
    channels: settings.audioChannels,
  };
}
