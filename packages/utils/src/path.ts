/**
 * Path Utilities
 */

import { join, extname, basename, dirname } from 'node:path';

/**
 * Extensions treated as candidate media files
 */
export const MEDIA_EXTENSIONS: readonly string[] = ['.mp4', '.mkv', '.mov', '.avi', '.m4v', '.webm'];

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

export function isMediaFile(
  filename: string,
  extensions: readonly string[] = MEDIA_EXTENSIONS
): boolean {
  return extensions.includes(extname(filename).toLowerCase());
}

/**
 * Canonical output path for an input: same stem, normalized extension
 */
export function deriveOutputPath(
  inputPath: string,
  outputDir: string,
  extension: string = 'mp4'
): string {
  return join(outputDir, `${getBasename(inputPath)}.${extension}`);
}

/**
 * Scratch path next to the output, tagged per attempt
 * e.g. out/clip.mp4 + "sw-encode" -> out/clip.sw-encode.tmp.mp4
 */
export function deriveTempPath(outputPath: string, tag: string): string {
  const ext = extname(outputPath);
  return join(dirname(outputPath), `${basename(outputPath, ext)}.${tag}.tmp${ext}`);
}
