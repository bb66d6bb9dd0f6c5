/**
 * CLI Configuration
 * 
 * Environment (optionally from .env in the working directory), validated
 * with zod and turned into the frozen profile and encoder settings the
 * pipeline is constructed with.
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import {
  ConfigError,
  createEncoderSettings,
  createTargetProfile,
  getBinariesConfig,
  type EncoderSettings,
  type TargetProfile,
} from '@directplay/core';
import type { SourceAction } from '@directplay/processing';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),

  // Folders (relative to the working directory)
  INPUT_DIR: z.string().min(1).default('videos'),
  OUTPUT_DIR: z.string().min(1).default('converted_videos'),

  // Behaviour
  USE_HARDWARE_ENCODER: booleanString.default('true'),
  SOURCE_ACTION: z.enum(['keep', 'delete', 'backup']).default('keep'),
  KILL_GRACE_MS: z.string().regex(/^\d+$/).transform(Number).default('2000'),

  // Target profile
  TARGET_MAX_WIDTH: z.string().regex(/^\d+$/).transform(Number).default('3840'),
  TARGET_MAX_HEIGHT: z.string().regex(/^\d+$/).transform(Number).default('2160'),
  TARGET_MAX_LEVEL: z.string().regex(/^\d+$/).transform(Number).default('41'),
  TOLERATE_SUBTITLES: booleanString.default('false'),
});

export const BACKUP_FOLDER = 'originals_backup';

export interface CliConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  ffmpegPath: string;
  ffprobePath: string;
  inputDir: string;
  outputDir: string;
  useHardwareEncoder: boolean;
  sourceAction: SourceAction;
  killGraceMs: number;
  profile: TargetProfile;
  settings: EncoderSettings;
}

/**
 * Build the CLI configuration from an environment.
 * Throws ConfigError when a value does not validate.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): CliConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment configuration', {
      issues: parsed.error.flatten().fieldErrors,
    });
  }

  const env = parsed.data;
  const bins = getBinariesConfig(source);

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    ffmpegPath: bins.ffmpeg.resolvedPath,
    ffprobePath: bins.ffprobe.resolvedPath,
    inputDir: resolve(cwd, env.INPUT_DIR),
    outputDir: resolve(cwd, env.OUTPUT_DIR),
    useHardwareEncoder: env.USE_HARDWARE_ENCODER,
    sourceAction: env.SOURCE_ACTION,
    killGraceMs: env.KILL_GRACE_MS,
    profile: createTargetProfile({
      maxWidth: env.TARGET_MAX_WIDTH,
      maxHeight: env.TARGET_MAX_HEIGHT,
      maxLevel: env.TARGET_MAX_LEVEL,
      tolerateEmbeddedSubtitles: env.TOLERATE_SUBTITLES,
    }),
    settings: createEncoderSettings(),
  };
}

let cached: CliConfig | null = null;

/**
 * Process-wide configuration, read from process.env on first use
 */
export function getConfig(): CliConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
