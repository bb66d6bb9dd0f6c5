import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ProbeError } from '@directplay/core';

vi.mock('@directplay/utils', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@directplay/utils')>()),
  executeCommand: vi.fn(),
}));

import { executeCommand } from '@directplay/utils';
import { FFProbe, parseDuration, parseProbeOutput } from './ffprobe.js';

const mockedExecute = vi.mocked(executeCommand);

const sampleOutput = JSON.stringify({
  format: { format_name: 'matroska,webm', duration: '120.500000' },
  streams: [
    { index: 0, codec_type: 'video', codec_name: 'h264', profile: 'High', pix_fmt: 'yuv420p', level: 40, width: 1920, height: 1080 },
    { index: 1, codec_type: 'audio', codec_name: 'aac', channels: 6 },
    { index: 2, codec_type: 'subtitle', codec_name: 'ass', tags: { language: 'jpn', title: 'Signs' } },
    { index: 3, codec_type: 'attachment', codec_name: 'ttf' },
  ],
});

function commandResult(exitCode: number, stdout: string, stderr = '') {
  return { exitCode, stdout, stderr, duration: 5, timedOut: false };
}

describe('parseProbeOutput', () => {
  it('maps ffprobe streams into typed stream descriptions', () => {
    const desc = parseProbeOutput('/in/a.mkv', sampleOutput);

    expect(desc.format).toBe('matroska,webm');
    expect(desc.streams).toEqual([
      { kind: 'video', index: 0, codec: 'h264', pixelFormat: 'yuv420p', profile: 'High', level: 40, width: 1920, height: 1080 },
      { kind: 'audio', index: 1, codec: 'aac', channels: 6 },
      { kind: 'subtitle', index: 2, codec: 'ass', language: 'jpn' },
      { kind: 'other', index: 3, codec: 'ttf' },
    ]);
    expect(Object.isFrozen(desc)).toBe(true);
  });

  it('defaults a missing format name to an empty string', () => {
    const desc = parseProbeOutput('/in/a.mkv', JSON.stringify({ streams: [] }));

    expect(desc).toEqual({ format: '', streams: [] });
  });

  it('parses a level reported as a decimal string', () => {
    const desc = parseProbeOutput('/in/a.mp4', JSON.stringify({
      streams: [{ index: 0, codec_type: 'video', codec_name: 'h264', level: '4.1', width: 640, height: 360 }],
    }));

    expect(desc.streams[0]).toMatchObject({ kind: 'video', level: 4.1 });
  });

  it('throws ProbeError on output that is not JSON', () => {
    expect(() => parseProbeOutput('/in/a.mkv', 'not json')).toThrow(ProbeError);
  });

  it('throws ProbeError when streams is not a list', () => {
    expect(() => parseProbeOutput('/in/a.mkv', JSON.stringify({ streams: 'nope' }))).toThrow(
      /Probe failed for \/in\/a\.mkv: unexpected output shape/
    );
  });
});

describe('parseDuration', () => {
  it('returns seconds or null', () => {
    expect(parseDuration('120.500000\n')).toBe(120.5);
    expect(parseDuration('N/A\n')).toBeNull();
    expect(parseDuration('')).toBeNull();
  });
});

describe('FFProbe', () => {
  beforeEach(() => {
    mockedExecute.mockReset();
  });

  it('requests JSON format and stream metadata', async () => {
    mockedExecute.mockResolvedValue(commandResult(0, sampleOutput));

    const desc = await new FFProbe('/opt/ffprobe').probe('/in/a.mkv');

    expect(desc.streams).toHaveLength(4);
    expect(mockedExecute).toHaveBeenCalledWith(
      '/opt/ffprobe',
      ['-v', 'error', '-print_format', 'json', '-show_format', '-show_streams', '/in/a.mkv'],
      { timeout: 60000 }
    );
  });

  it('throws ProbeError on non-zero exit', async () => {
    mockedExecute.mockResolvedValue(commandResult(1, '', 'a.mkv: Invalid data found when processing input\n'));

    await expect(new FFProbe().probe('/in/a.mkv')).rejects.toThrow(
      'Probe failed for /in/a.mkv: ffprobe exited with code 1: a.mkv: Invalid data found when processing input'
    );
  });

  it('throws ProbeError when ffprobe cannot be spawned', async () => {
    mockedExecute.mockRejectedValue(new Error('spawn ffprobe ENOENT'));

    await expect(new FFProbe().probe('/in/a.mkv')).rejects.toBeInstanceOf(ProbeError);
  });

  it('queries duration and degrades to null on failure', async () => {
    const probe = new FFProbe();
    mockedExecute.mockResolvedValueOnce(commandResult(0, '42.25\n'));
    mockedExecute.mockResolvedValueOnce(commandResult(1, ''));
    mockedExecute.mockRejectedValueOnce(new Error('spawn ffprobe ENOENT'));

    expect(await probe.getDuration('/in/a.mkv')).toBe(42.25);
    expect(await probe.getDuration('/in/a.mkv')).toBeNull();
    expect(await probe.getDuration('/in/a.mkv')).toBeNull();
  });
});
