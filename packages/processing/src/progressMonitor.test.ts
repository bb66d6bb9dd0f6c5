import { describe, it, expect } from 'vitest';
import { ProgressMonitor, type ProgressEvent } from './progressMonitor.js';

function collect(monitor: ProgressMonitor): number[] {
  const seen: number[] = [];
  monitor.on('progress', (event: ProgressEvent) => seen.push(event.percent));
  return seen;
}

describe('ProgressMonitor', () => {
  it('converts microsecond keys into a floored percentage', () => {
    const monitor = new ProgressMonitor(200);
    const seen = collect(monitor);

    monitor.feedLine('out_time_us=50000000');
    monitor.feedLine('out_time_ms=101990000');

    expect(seen).toEqual([25, 50]);
    expect(monitor.percent).toBe(50);
  });

  it('reads HH:MM:SS elapsed time', () => {
    const monitor = new ProgressMonitor(120);
    const seen = collect(monitor);

    monitor.feedLine('out_time=00:01:30.000000');

    expect(seen).toEqual([75]);
  });

  it('never rewinds and drops updates that do not increase', () => {
    const monitor = new ProgressMonitor(100);
    const seen = collect(monitor);

    for (const line of [
      'out_time_us=10000000',
      'out_time_us=10400000',
      'out_time_us=5000000',
      'out_time=00:00:10.000000',
      'out_time_us=30000000',
      'out_time=00:00:20.000000',
    ]) {
      monitor.feedLine(line);
    }

    expect(seen).toEqual([10, 30]);
    expect(monitor.percent).toBe(30);
  });

  it('caps at 100 when elapsed time overshoots the duration', () => {
    const monitor = new ProgressMonitor(10);
    const seen = collect(monitor);

    monitor.feedLine('out_time_us=12000000');

    expect(seen).toEqual([100]);
  });

  it('forces 100 on progress=end and ignores anything after it', () => {
    const monitor = new ProgressMonitor(100);
    const seen = collect(monitor);
    let completed = 0;
    monitor.on('complete', () => completed++);

    monitor.feedLine('out_time_us=42000000');
    monitor.feedLine('progress=continue');
    monitor.feedLine('progress=end');
    monitor.feedLine('out_time_us=99000000');

    expect(seen).toEqual([42, 100]);
    expect(completed).toBe(1);
  });

  it('ignores N/A and negative values', () => {
    const monitor = new ProgressMonitor(100);
    const seen = collect(monitor);

    monitor.feedLine('out_time_us=N/A');
    monitor.feedLine('out_time_ms=-23000');
    monitor.feedLine('out_time=-00:00:00.023000');
    monitor.feedLine('out_time=N/A');

    expect(seen).toEqual([]);
    expect(monitor.percent).toBe(0);
  });

  it('reports nothing at all when the duration is unknown', () => {
    const monitor = new ProgressMonitor(null);
    const seen = collect(monitor);
    let completed = false;
    monitor.on('complete', () => {
      completed = true;
    });

    monitor.feedLine('out_time_us=50000000');
    monitor.feedLine('progress=end');

    expect(seen).toEqual([]);
    expect(completed).toBe(true);
  });

  it('treats a zero duration as unknown', () => {
    const monitor = new ProgressMonitor(0);
    const seen = collect(monitor);

    monitor.feedLine('out_time_us=5000000');
    monitor.feedLine('progress=end');

    expect(seen).toEqual([]);
  });

  it('accepts lines with surrounding whitespace and skips lines without a key', () => {
    const monitor = new ProgressMonitor(100);
    const seen = collect(monitor);

    monitor.feedLine('frame=10\r');
    monitor.feedLine('=15');
    monitor.feedLine('garbage');
    monitor.feedLine('  out_time_us=20000000\r');

    expect(seen).toEqual([20]);
  });

  it('includes the reported speed in progress events', () => {
    const monitor = new ProgressMonitor(100);
    const events: ProgressEvent[] = [];
    monitor.on('progress', (event: ProgressEvent) => events.push(event));

    monitor.feedLine('speed=2.5x');
    monitor.feedLine('out_time_us=5000000');

    expect(events).toEqual([{ percent: 5, elapsedSeconds: 5, speed: 2.5 }]);
  });
});
