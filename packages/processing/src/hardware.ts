/**
 * Hardware Encoder Detection
 * 
 * Reads `ffmpeg -encoders` once and picks the H.264 hardware encoder this
 * host should prefer. The listing only says what ffmpeg was built with;
 * a missing device shows up later as a failed attempt and falls back to
 * software.
 */

import { executeCommand, createLogger } from '@directplay/utils';
import { errorMessage } from '@directplay/core';
import type { HardwareCapability, HardwareEncoder } from './types.js';

const logger = createLogger({ component: 'hardware' });

/**
 * Preference order by platform
 */
const PLATFORM_PREFERENCE: Record<string, HardwareEncoder[]> = {
  darwin: ['h264_videotoolbox'],
  linux: ['h264_nvenc', 'h264_qsv'],
  win32: ['h264_nvenc', 'h264_qsv'],
};

/**
 * Encoder names listed by `ffmpeg -encoders`. Entries look like
 * " V....D h264_nvenc           NVIDIA NVENC H.264 encoder".
 */
export function parseEncoderNames(listing: string): Set<string> {
  const names = new Set<string>();
  for (const line of listing.split('\n')) {
    const match = /^\s*[VAS][A-Z.]{5}\s+(\S+)/.exec(line);
    if (match?.[1]) {
      names.add(match[1]);
    }
  }
  return names;
}

export function selectHardwareEncoder(
  listing: string,
  platform: NodeJS.Platform = process.platform
): HardwareEncoder | null {
  const available = parseEncoderNames(listing);
  const preference = PLATFORM_PREFERENCE[platform] ?? [];
  return preference.find(encoder => available.has(encoder)) ?? null;
}

export class HardwareEncoderDetector {
  private cached: HardwareEncoder | null | undefined;

  constructor(
    private readonly ffmpegPath: string = 'ffmpeg',
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  /**
   * Detected encoder, or null when none is usable (cached after first call)
   */
  async detect(): Promise<HardwareEncoder | null> {
    if (this.cached !== undefined) {
      return this.cached;
    }

    logger.debug('Detecting hardware encoders...');

    let encoder: HardwareEncoder | null = null;
    try {
      const result = await executeCommand(this.ffmpegPath, ['-hide_banner', '-encoders'], {
        timeout: 15000,
      });
      if (result.exitCode === 0) {
        encoder = selectHardwareEncoder(result.stdout, this.platform);
      } else {
        logger.warn({ exitCode: result.exitCode }, 'ffmpeg -encoders failed, using software encoding');
      }
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Could not run ffmpeg for encoder detection');
    }

    if (encoder) {
      logger.info({ encoder }, 'Hardware encoder available');
    } else {
      logger.info('No hardware encoder found, using libx264');
    }

    this.cached = encoder;
    return encoder;
  }

  /**
   * Capability handed to the planner. Detection is skipped when disabled.
   */
  async capability(enabled: boolean): Promise<HardwareCapability> {
    if (!enabled) {
      return { encoder: null, enabled: false };
    }
    return { encoder: await this.detect(), enabled: true };
  }
}
