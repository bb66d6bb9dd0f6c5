/**
 * Compatibility Classifier
 * 
 * Evaluates a MediaDescription against a TargetProfile. Every rule runs
 * and every deficiency is collected; the only early exit is a missing
 * video stream, which makes the file incompatible on its own.
 */

import type { TargetProfile } from '@directplay/core';
import {
  audioStreams,
  firstVideoStream,
  subtitleStreams,
  type MediaDescription,
} from './types.js';

export type IssueCategory =
  | 'container'
  | 'video-codec'
  | 'pix-fmt'
  | 'profile'
  | 'level'
  | 'resolution'
  | 'audio-codec'
  | 'subtitle-present'
  | 'no-video-stream';

export interface Issue {
  category: IssueCategory;
  message: string;
}

export interface CompatibilityVerdict {
  compatible: boolean;
  issues: readonly Issue[];
}

/**
 * Levels are compared in tenths. Small decimals (4.1) are scaled up,
 * anything else (41) is taken as already in tenths.
 */
export function normalizeLevel(level: number | undefined): number | undefined {
  if (level === undefined || !Number.isFinite(level)) {
    return undefined;
  }
  return level < 10 ? Math.round(level * 10) : Math.trunc(level);
}

export function classify(desc: MediaDescription, profile: TargetProfile): CompatibilityVerdict {
  const issues: Issue[] = [];
  const verdict = (): CompatibilityVerdict => ({
    compatible: issues.length === 0,
    issues: Object.freeze([...issues]),
  });

  // 1. Container
  if (!profile.allowedContainers.some(c => desc.format.includes(c))) {
    issues.push({
      category: 'container',
      message: `Container: ${desc.format || 'unknown'} (expected ${profile.allowedContainers.join('/')})`,
    });
  }

  // 2. First video stream only
  const video = firstVideoStream(desc);
  if (!video) {
    issues.push({ category: 'no-video-stream', message: 'No video stream' });
    return verdict();
  }

  // 3. Codec, pixel format, profile, level
  if (video.codec !== profile.videoCodec) {
    issues.push({
      category: 'video-codec',
      message: `Video codec: ${video.codec || 'unknown'} (expected ${profile.videoCodec})`,
    });
  }

  if (video.pixelFormat && video.pixelFormat !== profile.pixelFormat) {
    issues.push({
      category: 'pix-fmt',
      message: `Pixel format: ${video.pixelFormat} (expected ${profile.pixelFormat})`,
    });
  }

  if (video.profile && !profile.allowedProfiles.includes(video.profile.toLowerCase())) {
    issues.push({
      category: 'profile',
      message: `Profile: ${video.profile} (allowed ${profile.allowedProfiles.join('/')})`,
    });
  }

  const level = normalizeLevel(video.level);
  if (level && level > profile.maxLevel) {
    issues.push({
      category: 'level',
      message: `Level ${(level / 10).toFixed(1)} > ${(profile.maxLevel / 10).toFixed(1)}`,
    });
  }

  // 4. Resolution
  if (video.width > profile.maxWidth || video.height > profile.maxHeight) {
    issues.push({
      category: 'resolution',
      message: `Resolution ${video.width}x${video.height} > ${profile.maxWidth}x${profile.maxHeight}`,
    });
  }

  // 5. Audio: any matching stream is enough
  if (!audioStreams(desc).some(a => a.codec === profile.audioCodec)) {
    issues.push({
      category: 'audio-codec',
      message: `No ${profile.audioCodec} audio track`,
    });
  }

  // 6. Subtitles
  if (!profile.tolerateEmbeddedSubtitles) {
    for (const sub of subtitleStreams(desc)) {
      issues.push({
        category: 'subtitle-present',
        message: `Embedded subtitle: ${sub.codec || 'unknown'}${sub.language ? ` (${sub.language})` : ''}`,
      });
    }
  }

  return verdict();
}

export function hasOnlyContainerIssues(verdict: CompatibilityVerdict): boolean {
  return verdict.issues.length > 0 && verdict.issues.every(i => i.category === 'container');
}

export function hasIssue(verdict: CompatibilityVerdict, category: IssueCategory): boolean {
  return verdict.issues.some(i => i.category === category);
}
