import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileExists, listMediaFiles, moveFile, removeIfExists } from './file.js';

describe('file operations', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'directplay-file-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists only media files, sorted, ignoring directories', async () => {
    await writeFile(join(dir, 'b.mkv'), '');
    await writeFile(join(dir, 'a.MP4'), '');
    await writeFile(join(dir, 'readme.txt'), '');
    await mkdir(join(dir, 'nested.mkv'));

    expect(await listMediaFiles(dir)).toEqual([join(dir, 'a.MP4'), join(dir, 'b.mkv')]);
  });

  it('removes files and tolerates missing ones', async () => {
    const target = join(dir, 'partial.tmp.mp4');
    await writeFile(target, 'x');

    await removeIfExists(target);
    await removeIfExists(target);

    expect(await fileExists(target)).toBe(false);
  });

  it('moves a file into a directory it creates', async () => {
    const source = join(dir, 'clip.mp4');
    const destination = join(dir, 'backup', 'clip.mp4');
    await writeFile(source, 'payload');

    await moveFile(source, destination);

    expect(await fileExists(source)).toBe(false);
    expect(await readFile(destination, 'utf8')).toBe('payload');
  });
});
