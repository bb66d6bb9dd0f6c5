/**
 * Binary Configuration
 * 
 * Resolves the external inspection and encode binaries.
 * 
 * Priority order:
 * 1. Environment variables (FFMPEG_PATH, FFPROBE_PATH)
 * 2. Bundled binary folder (packages/core/binaries/<os>/)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

/**
 * OS-specific subfolder
 */
function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

/**
 * Get executable extension for current OS
 */
function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export type BinarySource = 'env' | 'bundled' | 'path';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv
): BinaryConfig {
  // 1. Check environment variable
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }
  
  // 2. Check bundled binary folder
  const bundledPath = join(BINARY_ROOT, getOsFolder(), name + getExeExt());
  if (existsSync(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }
  
  // 3. Bare name (or whatever the env var said), resolved through PATH at spawn time
  return { name, envVar, resolvedPath: envPath || name, source: 'path' };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', env),
  };
}
