/**
 * Input Resolution
 * 
 * Expands command-line paths into the ordered list of media files to work on.
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { isMediaFile, listMediaFiles } from '@directplay/utils';

/**
 * Directories contribute their media files (sorted, not recursive); files
 * are taken as given when they carry a media extension. Duplicates are
 * dropped, first occurrence wins.
 */
export async function resolveInputs(paths: readonly string[], cwd: string = process.cwd()): Promise<string[]> {
  const files: string[] = [];
  const seen = new Set<string>();

  for (const raw of paths) {
    const path = resolve(cwd, raw);
    const info = await stat(path);
    const found = info.isDirectory() ? await listMediaFiles(path) : isMediaFile(path) ? [path] : [];

    for (const file of found) {
      if (!seen.has(file)) {
        seen.add(file);
        files.push(file);
      }
    }
  }

  return files;
}
