/**
 * Encode Planner
 * 
 * Picks the cheapest transformation that reaches the target profile and
 * describes it as an immutable EncodePlan. Pure: no I/O, nothing spawned.
 */

import type { EncodeStrategy, TargetProfile } from '@directplay/core';
import {
  audioStreams,
  firstVideoStream,
  hasOnlyContainerIssues,
  type CompatibilityVerdict,
  type MediaDescription,
} from '@directplay/media';
import type { EncodePlan, HardwareCapability, ScaleBox, VideoEncoder } from './types.js';

export interface PlanOptions {
  /** Fallback attempts always encode in software */
  forceSoftware?: boolean;
}

function chooseStrategy(
  verdict: CompatibilityVerdict,
  hw: HardwareCapability,
  forceSoftware: boolean
): EncodeStrategy {
  if (forceSoftware) {
    return 'sw-encode';
  }
  if (verdict.compatible) {
    return 'skip';
  }
  if (hasOnlyContainerIssues(verdict)) {
    return 'remux';
  }
  return hw.enabled && hw.encoder !== null ? 'hw-encode' : 'sw-encode';
}

function chooseEncoder(strategy: EncodeStrategy, hw: HardwareCapability): VideoEncoder | null {
  switch (strategy) {
    case 'hw-encode':
      return hw.encoder;
    case 'sw-encode':
      return 'libx264';
    default:
      return null;
  }
}

export function planEncode(
  desc: MediaDescription,
  verdict: CompatibilityVerdict,
  profile: TargetProfile,
  hw: HardwareCapability,
  options: PlanOptions = {}
): EncodePlan {
  const strategy = chooseStrategy(verdict, hw, options.forceSoftware ?? false);
  const video = firstVideoStream(desc);

  let scale: ScaleBox | null = null;
  if (video && (video.width > profile.maxWidth || video.height > profile.maxHeight)) {
    scale = { width: profile.maxWidth, height: profile.maxHeight };
  }

  const matchingAudio = audioStreams(desc).find(s => s.codec === profile.audioCodec);

  return Object.freeze({
    strategy,
    encoder: chooseEncoder(strategy, hw),
    scale,
    copyAudio: matchingAudio !== undefined,
    videoStreamIndex: video?.index ?? null,
    audioStreamIndex: matchingAudio?.index ?? null,
  });
}
