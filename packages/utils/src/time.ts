/**
 * Time Utilities
 */

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Parse a clock string (HH:MM:SS[.frac]) into seconds.
 * Returns null for anything that is not a non-negative clock value.
 */
export function parseClockTime(value: string): number | null {
  const parts = value.trim().split(':');
  if (parts.length !== 3) {
    return null;
  }

  const numbers = parts.map(part => (/^\d+(\.\d+)?$/.test(part) ? parseFloat(part) : NaN));
  const [hours = NaN, minutes = NaN, seconds = NaN] = numbers;
  if ([hours, minutes, seconds].some(n => Number.isNaN(n))) {
    return null;
  }

  return hours * 3600 + minutes * 60 + seconds;
}
