/**
 * Time Utilities
 * Monotonic nanosecond clock and ISO timestamp generation
 */

import type { Clock } from '../types.js';

/**
 * Get current monotonic timestamp in nanoseconds
 * Uses process.hrtime.bigint(), which is unaffected by wall-clock changes
 */
export function hrTimeNs(): bigint {
  return process.hrtime.bigint();
}

/**
 * Default clock for every timer
 */
export const systemClock: Clock = hrTimeNs;

/**
 * Get current ISO 8601 timestamp
 * Format: 2024-01-15T10:30:00.000Z
 */
export function isoTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Build a clock that replays the given timestamps in order
 *
 * Useful for deterministic tests and replays. Reading past the end
 * keeps returning the last value.
 */
export function sequenceClock(timestamps: readonly bigint[]): Clock {
  if (timestamps.length === 0) {
    throw new RangeError('sequenceClock needs at least one timestamp');
  }

  let index = 0;
  return () => {
    const value = timestamps[Math.min(index, timestamps.length - 1)];
    index++;
    return value ?? 0n;
  };
}
