import { describe, it, expect } from 'vitest';
import { ConfigError } from '@directplay/core';
import { loadConfig } from './index.js';

describe('loadConfig', () => {
  it('applies defaults relative to the working directory', () => {
    const config = loadConfig({}, '/work');

    expect(config).toMatchObject({
      inputDir: '/work/videos',
      outputDir: '/work/converted_videos',
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
      useHardwareEncoder: true,
      sourceAction: 'keep',
      killGraceMs: 2000,
    });
    expect(config.profile.maxWidth).toBe(3840);
    expect(config.profile.maxHeight).toBe(2160);
    expect(config.profile.maxLevel).toBe(41);
    expect(config.profile.tolerateEmbeddedSubtitles).toBe(false);
    expect(config.settings.software.crf).toBe(18);
  });

  it('reads folders, flags and profile limits from the environment', () => {
    const config = loadConfig({
      INPUT_DIR: '/media/in',
      OUTPUT_DIR: 'out',
      USE_HARDWARE_ENCODER: 'false',
      SOURCE_ACTION: 'backup',
      KILL_GRACE_MS: '500',
      TARGET_MAX_WIDTH: '1920',
      TARGET_MAX_HEIGHT: '1080',
      TARGET_MAX_LEVEL: '40',
      TOLERATE_SUBTITLES: '1',
      FFMPEG_PATH: '/nonexistent/bin/ffmpeg',
    }, '/work');

    expect(config).toMatchObject({
      inputDir: '/media/in',
      outputDir: '/work/out',
      useHardwareEncoder: false,
      sourceAction: 'backup',
      killGraceMs: 500,
      ffmpegPath: '/nonexistent/bin/ffmpeg',
    });
    expect(config.profile).toMatchObject({
      maxWidth: 1920,
      maxHeight: 1080,
      maxLevel: 40,
      tolerateEmbeddedSubtitles: true,
    });
  });

  it('rejects values that do not validate', () => {
    expect(() => loadConfig({ SOURCE_ACTION: 'shred' }, '/work')).toThrow(ConfigError);
    expect(() => loadConfig({ TARGET_MAX_WIDTH: 'wide' }, '/work')).toThrow('Invalid environment configuration');
    expect(() => loadConfig({ TARGET_MAX_LEVEL: '0' }, '/work')).toThrow('Invalid target profile');
  });
});
