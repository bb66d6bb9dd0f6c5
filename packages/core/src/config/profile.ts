/**
 * Target Profile & Encoder Settings
 * 
 * Process-wide, read-only configuration. Built once at startup from
 * validated input, frozen, and handed to each component's constructor.
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

const codecName = z.string().trim().min(1).transform(s => s.toLowerCase());

export const targetProfileSchema = z.object({
  allowedContainers: z.array(codecName).min(1).default(['mp4', 'mov']),
  videoCodec: codecName.default('h264'),
  pixelFormat: codecName.default('yuv420p'),
  allowedProfiles: z.array(codecName).min(1).default(['baseline', 'main', 'high']),
  maxLevel: z.number().int().positive().default(41), // tenths: 41 = "4.1"
  maxWidth: z.number().int().positive().default(3840),
  maxHeight: z.number().int().positive().default(2160),
  audioCodec: codecName.default('aac'),
  tolerateEmbeddedSubtitles: z.boolean().default(false),
});

const bitrate = z.string().regex(/^\d+(\.\d+)?[kKmM]?$/, 'expected a bitrate like 128k or 12M');

export const encoderSettingsSchema = z.object({
  software: z.object({
    preset: z.string().default('slow'),
    crf: z.number().int().min(0).max(51).default(18),
  }).default({}),
  nvenc: z.object({
    preset: z.string().default('p4'),
    cq: z.number().int().min(0).max(51).default(19),
  }).default({}),
  videotoolbox: z.object({
    quality: z.number().int().min(1).max(100).default(18),
  }).default({}),
  qsv: z.object({
    preset: z.string().default('medium'),
    globalQuality: z.number().int().min(1).max(51).default(19),
  }).default({}),
  hardwareMaxrate: bitrate.default('12M'),
  hardwareBufsize: bitrate.default('24M'),
  encodeProfile: z.string().default('high'),
  audioBitrate: bitrate.default('128k'),
  audioChannels: z.number().int().min(1).max(8).default(2),
  outputExtension: z.string().regex(/^[a-z0-9]+$/).default('mp4'),
  outputFormat: z.string().default('mp4'),
  fastStart: z.boolean().default(true),
});

export type TargetProfileInput = z.input<typeof targetProfileSchema>;
export type EncoderSettingsInput = z.input<typeof encoderSettingsSchema>;

type TargetProfileData = z.output<typeof targetProfileSchema>;
type EncoderSettingsData = z.output<typeof encoderSettingsSchema>;

export interface TargetProfile extends Readonly<Omit<TargetProfileData, 'allowedContainers' | 'allowedProfiles'>> {
  readonly allowedContainers: readonly string[];
  readonly allowedProfiles: readonly string[];
}

export type EncoderSettings = {
  readonly [K in keyof EncoderSettingsData]: Readonly<EncoderSettingsData[K]>;
};

function freezeProfile(data: TargetProfileData): TargetProfile {
  return Object.freeze({
    ...data,
    allowedContainers: Object.freeze([...data.allowedContainers]),
    allowedProfiles: Object.freeze([...data.allowedProfiles]),
  });
}

function freezeSettings(data: EncoderSettingsData): EncoderSettings {
  return Object.freeze({
    ...data,
    software: Object.freeze({ ...data.software }),
    nvenc: Object.freeze({ ...data.nvenc }),
    videotoolbox: Object.freeze({ ...data.videotoolbox }),
    qsv: Object.freeze({ ...data.qsv }),
  });
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid ${what}`, { issues: result.error.flatten() });
  }
  return result.data;
}

export function createTargetProfile(input: TargetProfileInput = {}): TargetProfile {
  return freezeProfile(parseOrThrow(targetProfileSchema, input, 'target profile'));
}

export function createEncoderSettings(input: EncoderSettingsInput = {}): EncoderSettings {
  return freezeSettings(parseOrThrow(encoderSettingsSchema, input, 'encoder settings'));
}

export const DEFAULT_TARGET_PROFILE: TargetProfile = createTargetProfile();
export const DEFAULT_ENCODER_SETTINGS: EncoderSettings = createEncoderSettings();

/**
 * Format a tenths level for encoder arguments: 41 -> "4.1"
 */
export function formatLevel(tenths: number): string {
  return (tenths / 10).toFixed(1);
}
