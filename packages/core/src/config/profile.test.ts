import { describe, it, expect } from 'vitest';
import { ConfigError } from '../errors/index.js';
import {
  DEFAULT_ENCODER_SETTINGS,
  DEFAULT_TARGET_PROFILE,
  createEncoderSettings,
  createTargetProfile,
  formatLevel,
} from './profile.js';

describe('createTargetProfile', () => {
  it('fills the direct-play defaults', () => {
    expect(DEFAULT_TARGET_PROFILE).toEqual({
      allowedContainers: ['mp4', 'mov'],
      videoCodec: 'h264',
      pixelFormat: 'yuv420p',
      allowedProfiles: ['baseline', 'main', 'high'],
      maxLevel: 41,
      maxWidth: 3840,
      maxHeight: 2160,
      audioCodec: 'aac',
      tolerateEmbeddedSubtitles: false,
    });
  });

  it('lowercases codec and profile names', () => {
    const profile = createTargetProfile({ videoCodec: 'H264', allowedProfiles: ['High', ' Main '] });

    expect(profile.videoCodec).toBe('h264');
    expect(profile.allowedProfiles).toEqual(['high', 'main']);
  });

  it('returns a frozen profile', () => {
    const profile = createTargetProfile({ maxWidth: 1920, maxHeight: 1080 });

    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.allowedContainers)).toBe(true);
  });

  it('throws ConfigError on invalid values', () => {
    expect(() => createTargetProfile({ maxLevel: -1 })).toThrow(ConfigError);
    expect(() => createTargetProfile({ allowedContainers: [] })).toThrow('Invalid target profile');
  });
});

describe('createEncoderSettings', () => {
  it('defaults to CRF 18 software and CQ 19 hardware', () => {
    expect(DEFAULT_ENCODER_SETTINGS.software).toEqual({ preset: 'slow', crf: 18 });
    expect(DEFAULT_ENCODER_SETTINGS.nvenc).toEqual({ preset: 'p4', cq: 19 });
    expect(DEFAULT_ENCODER_SETTINGS.hardwareMaxrate).toBe('12M');
    expect(DEFAULT_ENCODER_SETTINGS.audioBitrate).toBe('128k');
    expect(DEFAULT_ENCODER_SETTINGS.audioChannels).toBe(2);
  });

  it('merges partial nested overrides with defaults', () => {
    const settings = createEncoderSettings({ software: { crf: 22 } });

    expect(settings.software).toEqual({ preset: 'slow', crf: 22 });
    expect(Object.isFrozen(settings.software)).toBe(true);
  });

  it('rejects malformed bitrates', () => {
    expect(() => createEncoderSettings({ audioBitrate: 'loud' })).toThrow(ConfigError);
  });
});

describe('formatLevel', () => {
  it('renders tenths as a decimal level', () => {
    expect(formatLevel(41)).toBe('4.1');
    expect(formatLevel(40)).toBe('4.0');
  });
});
