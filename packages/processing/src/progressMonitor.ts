/**
 * Progress Monitor
 * 
 * Turns the `-progress pipe:1` key=value feed of a running ffmpeg into a
 * latched integer percentage. Events:
 *   'progress' (ProgressEvent)  percentage strictly increased
 *   'complete' ()               progress=end was seen
 */

import { EventEmitter } from 'node:events';
import { parseClockTime } from '@directplay/utils';

export interface ProgressEvent {
  percent: number;          // 0-100, never decreases
  elapsedSeconds: number;
  speed: number | null;     // x realtime, when reported
}

const MICROSECONDS = 1_000_000;

export class ProgressMonitor extends EventEmitter {
  private readonly totalSeconds: number | null;
  private elapsedSeconds = 0;
  private speed: number | null = null;
  private latched = -1;
  private finished = false;

  /**
   * @param totalSeconds - Source duration; null or non-positive when unknown,
   *   in which case the feed is drained but no percentage is reported
   */
  constructor(totalSeconds: number | null) {
    super();
    this.totalSeconds = totalSeconds !== null && totalSeconds > 0 ? totalSeconds : null;
  }

  get percent(): number {
    return Math.max(this.latched, 0);
  }

  /**
   * Consume one line of the feed
   */
  feedLine(rawLine: string): void {
    if (this.finished) return;

    const line = rawLine.trim();
    const eq = line.indexOf('=');
    if (eq <= 0) return;

    const key = line.slice(0, eq);
    const value = line.slice(eq + 1).trim();

    switch (key) {
      // ffmpeg writes microseconds under both names
      case 'out_time_us':
      case 'out_time_ms': {
        const micros = Number(value);
        if (value !== '' && Number.isFinite(micros) && micros >= 0) {
          this.advance(micros / MICROSECONDS);
        }
        break;
      }
      case 'out_time': {
        const seconds = parseClockTime(value);
        if (seconds !== null) {
          this.advance(seconds);
        }
        break;
      }
      case 'speed': {
        const speed = Number.parseFloat(value.replace(/x$/, ''));
        this.speed = Number.isFinite(speed) ? speed : null;
        break;
      }
      case 'progress':
        if (value === 'end') {
          this.finish();
        }
        break;
    }
  }

  private advance(seconds: number): void {
    if (seconds > this.elapsedSeconds) {
      this.elapsedSeconds = seconds;
    }
    if (this.totalSeconds === null) return;

    // floor(min(elapsed / total, 1) * 100), scaled first to keep integer inputs exact
    const percent = seconds >= this.totalSeconds
      ? 100
      : Math.floor((seconds * 100) / this.totalSeconds);
    this.report(percent);
  }

  private finish(): void {
    this.finished = true;
    if (this.totalSeconds !== null) {
      this.report(100);
    }
    this.emit('complete');
  }

  private report(percent: number): void {
    if (percent <= this.latched) return;
    this.latched = percent;

    const event: ProgressEvent = {
      percent,
      elapsedSeconds: this.elapsedSeconds,
      speed: this.speed,
    };
    this.emit('progress', event);
  }
}
