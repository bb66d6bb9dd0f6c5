/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { 
  mkdir, 
  readdir,
  stat, 
  rename, 
  rm,
  copyFile,
  unlink,
} from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { isErrnoException } from './guards.js';
import { isMediaFile, MEDIA_EXTENSIONS } from './path.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Delete a file if it is there; a missing file is not an error
 */
export async function removeIfExists(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Move a file to a new location, falling back to copy + unlink
 * when source and destination live on different devices
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  try {
    await rename(source, destination);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
    await copyFile(source, destination);
    await unlink(source);
  }
}

/**
 * List media files directly inside a directory, sorted by name
 */
export async function listMediaFiles(
  dirPath: string,
  extensions: readonly string[] = MEDIA_EXTENSIONS
): Promise<string[]> {
  const entries = await readdir(dirPath, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && isMediaFile(entry.name, extensions))
    .map(entry => join(dirPath, entry.name))
    .sort();
}
