import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CancelledError,
  TerminalFailure,
  type OutcomeState,
  type TranscodeOutcome,
} from '@directplay/core';
import { BatchDriver, tallyOutcomes, type Transcoder } from './batch.js';
import type { TranscodeRequest } from './orchestrator.js';

function outcome(input: string, state: OutcomeState, output: string | null = null): TranscodeOutcome {
  return { input, output, state, diagnostic: state, elapsedMs: 1, attempts: [] };
}

/**
 * Scripted transcoder: one reaction per input basename
 */
class ScriptedTranscoder implements Transcoder {
  readonly requests: TranscodeRequest[] = [];

  constructor(private readonly script: Record<string, (request: TranscodeRequest) => TranscodeOutcome>) {}

  async transcode(request: TranscodeRequest): Promise<TranscodeOutcome> {
    this.requests.push(request);
    const name = request.input.split('/').pop() ?? '';
    const react = this.script[name];
    if (!react) {
      throw new Error(`unscripted file ${name}`);
    }
    return react(request);
  }
}

describe('tallyOutcomes', () => {
  it('counts every outcome state', () => {
    const tally = tallyOutcomes([
      outcome('a', 'skipped'),
      outcome('b', 'remuxed'),
      outcome('c', 'hw-encoded'),
      outcome('d', 'sw-encoded'),
      outcome('e', 'sw-encoded'),
      outcome('f', 'failed'),
    ]);

    expect(tally).toEqual({ skipped: 1, remuxed: 1, hwEncoded: 1, swEncoded: 2, failed: 1 });
  });
});

describe('BatchDriver', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'directplay-batch-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('derives output paths and records terminal failures without stopping', async () => {
    const transcoder = new ScriptedTranscoder({
      'a.mkv': r => outcome(r.input, 'remuxed', r.output),
      'b.avi': r => {
        throw new TerminalFailure(outcome(r.input, 'failed'));
      },
      'c.mp4': r => outcome(r.input, 'skipped'),
    });
    const driver = new BatchDriver(transcoder, { outputDir: '/out' });
    const seen: string[] = [];
    driver.on('outcome', (o: TranscodeOutcome) => seen.push(`${o.input}:${o.state}`));

    const result = await driver.run(['/in/a.mkv', '/in/b.avi', '/in/c.mp4']);

    expect(transcoder.requests.map(r => r.output)).toEqual(['/out/a.mp4', '/out/b.mp4', '/out/c.mp4']);
    expect(seen).toEqual(['/in/a.mkv:remuxed', '/in/b.avi:failed', '/in/c.mp4:skipped']);
    expect(result.tally).toEqual({ skipped: 1, remuxed: 1, hwEncoded: 0, swEncoded: 0, failed: 1 });
  });

  it('stops the remaining queue and rethrows on cancellation', async () => {
    const controller = new AbortController();
    const transcoder = new ScriptedTranscoder({
      'a.mkv': r => outcome(r.input, 'sw-encoded', r.output),
      'b.mkv': r => {
        controller.abort();
        throw new CancelledError(r.input);
      },
      'c.mkv': r => outcome(r.input, 'sw-encoded', r.output),
    });
    const driver = new BatchDriver(transcoder, { outputDir: '/out' });
    const cancelled: string[] = [];
    driver.on('cancelled', (file: string) => cancelled.push(file));

    await expect(driver.run(['/in/a.mkv', '/in/b.mkv', '/in/c.mkv'], { signal: controller.signal }))
      .rejects.toBeInstanceOf(CancelledError);
    expect(transcoder.requests.map(r => r.input)).toEqual(['/in/a.mkv', '/in/b.mkv']);
    expect(cancelled).toEqual(['/in/b.mkv']);
  });

  it('does not start the next file once the signal has fired', async () => {
    const controller = new AbortController();
    const transcoder = new ScriptedTranscoder({
      'a.mkv': r => {
        controller.abort();
        return outcome(r.input, 'skipped');
      },
      'b.mkv': r => outcome(r.input, 'skipped'),
    });

    await expect(new BatchDriver(transcoder, { outputDir: '/out' }).run(['/in/a.mkv', '/in/b.mkv'], { signal: controller.signal }))
      .rejects.toThrow('Cancelled while processing /in/b.mkv');
    expect(transcoder.requests).toHaveLength(1);
  });

  it('propagates errors that are not terminal failures', async () => {
    const transcoder = new ScriptedTranscoder({});

    await expect(new BatchDriver(transcoder, { outputDir: '/out' }).run(['/in/x.mkv']))
      .rejects.toThrow('unscripted file x.mkv');
  });

  it('fails a later input whose output path is already written, leaving its source alone', async () => {
    const inputDir = join(dir, 'in');
    const outputDir = join(dir, 'out');
    await mkdir(inputDir);
    const files = [join(inputDir, 'clip.avi'), join(inputDir, 'clip.mkv')];
    for (const file of files) {
      await writeFile(file, 'source');
    }
    const transcoder = new ScriptedTranscoder({
      'clip.avi': r => outcome(r.input, 'sw-encoded', r.output),
      'clip.mkv': r => outcome(r.input, 'sw-encoded', r.output),
    });

    const result = await new BatchDriver(transcoder, { outputDir, sourceAction: 'delete' }).run(files);

    expect(transcoder.requests.map(r => r.input)).toEqual([files[0]]);
    expect(result.outcomes[1]).toEqual({
      input: files[1],
      output: null,
      state: 'failed',
      diagnostic: 'Output would collide with clip.avi: clip.mp4',
      elapsedMs: 0,
      attempts: [],
    });
    expect(result.tally).toEqual({ skipped: 0, remuxed: 0, hwEncoded: 0, swEncoded: 1, failed: 1 });
    expect(await readdir(inputDir)).toEqual(['clip.mkv']);
  });

  it('lets a later input use an output path whose first claimant failed', async () => {
    const transcoder = new ScriptedTranscoder({
      'clip.avi': r => {
        throw new TerminalFailure(outcome(r.input, 'failed'));
      },
      'clip.mkv': r => outcome(r.input, 'remuxed', r.output),
    });

    const result = await new BatchDriver(transcoder, { outputDir: '/out' }).run(['/in/clip.avi', '/in/clip.mkv']);

    expect(transcoder.requests.map(r => r.output)).toEqual(['/out/clip.mp4', '/out/clip.mp4']);
    expect(result.outcomes.map(o => o.state)).toEqual(['failed', 'remuxed']);
  });

  describe('source handling', () => {
    async function setup(): Promise<{ inputDir: string; files: string[] }> {
      const inputDir = join(dir, 'in');
      await mkdir(inputDir);
      const files = [join(inputDir, 'a.mkv'), join(inputDir, 'b.mkv'), join(inputDir, 'c.mp4')];
      for (const file of files) {
        await writeFile(file, 'source');
      }
      return { inputDir, files };
    }

    const script = {
      'a.mkv': (r: TranscodeRequest) => outcome(r.input, 'remuxed', r.output),
      'b.mkv': (r: TranscodeRequest) => {
        throw new TerminalFailure(outcome(r.input, 'failed'));
      },
      'c.mp4': (r: TranscodeRequest) => outcome(r.input, 'skipped'),
    };

    it('keeps sources by default', async () => {
      const { inputDir, files } = await setup();

      await new BatchDriver(new ScriptedTranscoder(script), { outputDir: join(dir, 'out') }).run(files);

      expect((await readdir(inputDir)).sort()).toEqual(['a.mkv', 'b.mkv', 'c.mp4']);
    });

    it('deletes only converted sources', async () => {
      const { inputDir, files } = await setup();

      await new BatchDriver(new ScriptedTranscoder(script), {
        outputDir: join(dir, 'out'),
        sourceAction: 'delete',
      }).run(files);

      expect((await readdir(inputDir)).sort()).toEqual(['b.mkv', 'c.mp4']);
    });

    it('moves converted sources into the backup folder', async () => {
      const { inputDir, files } = await setup();
      const backupDir = join(inputDir, 'originals_backup');

      await new BatchDriver(new ScriptedTranscoder(script), {
        outputDir: join(dir, 'out'),
        sourceAction: 'backup',
        backupDir,
      }).run(files);

      expect((await readdir(inputDir)).sort()).toEqual(['b.mkv', 'c.mp4', 'originals_backup']);
      expect(await readdir(backupDir)).toEqual(['a.mkv']);
    });
  });
});
