import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveInputs } from './inputs.js';

describe('resolveInputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'directplay-inputs-'));
    await mkdir(join(dir, 'season'));
    await writeFile(join(dir, 'season', 'e02.mkv'), '');
    await writeFile(join(dir, 'season', 'e01.mkv'), '');
    await writeFile(join(dir, 'season', 'notes.txt'), '');
    await writeFile(join(dir, 'movie.MOV'), '');
    await writeFile(join(dir, 'cover.jpg'), '');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('expands folders, keeps media files and drops duplicates', async () => {
    const files = await resolveInputs(['movie.MOV', 'season', 'cover.jpg', 'season/e01.mkv'], dir);

    expect(files).toEqual([
      join(dir, 'movie.MOV'),
      join(dir, 'season', 'e01.mkv'),
      join(dir, 'season', 'e02.mkv'),
    ]);
  });

  it('fails for a path that does not exist', async () => {
    await expect(resolveInputs(['missing.mkv'], dir)).rejects.toThrow('ENOENT');
  });
});
