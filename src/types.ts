/**
 * splitwatch Types - Core type definitions for the splitwatch timer library
 *
 * A timer records monotonic nanosecond timestamps for start, split, pause,
 * resume and stop actions, and derives elapsed/split metrics once stopped.
 */

import type { TimerAction, TimerState } from './core/labels.js';
import { TimeUnit } from './core/units.js';

/**
 * Monotonic nanosecond clock
 */
export type Clock = () => bigint;

/**
 * A single recorded action inside a segment
 */
export interface SegmentEvent {
  readonly action: TimerAction;
  readonly timestamp: bigint;
}

/**
 * One span between two boundary actions (start, split, stop)
 *
 * The first event is always the boundary action that opened the segment;
 * any further events are alternating pause/resume pairs.
 */
export interface Segment {
  readonly label?: string;
  readonly events: readonly SegmentEvent[];
}

/**
 * Options accepted when creating a timer
 */
export interface TimerOptions {
  clock?: Clock;
}

/**
 * Per-segment entry of a timer report
 */
export interface SplitReport {
  name: string;
  time: number;
  period: number;
}

/**
 * Read-only summary of a stopped timer, expressed in a single unit
 */
export interface TimerReport {
  name: string;
  unit: TimeUnit;
  elapsed: number;
  splits: SplitReport[];
}

/**
 * Outcome of a timed request
 */
export type RequestOutcome = 'success' | 'error' | 'aborted';

/**
 * Normalized error structure attached to events
 */
export interface TimerEventError {
  type: string;
  message: string;
  code?: string;
}

/**
 * The event emitted once per request by the Express middleware
 */
export interface TimerEvent {
  timestamp: string;
  request_id: string;
  method: string;
  path: string;
  route?: string;
  status_code: number;
  outcome: RequestOutcome;
  unit: TimeUnit;
  timers: TimerReport[];
  error?: TimerEventError;
}

/**
 * Function signature for event emission
 */
export type EmitFunction = (event: TimerEvent) => void;

/**
 * Middleware configuration
 */
export interface TimerMiddlewareConfig {
  /**
   * Unit used for every report in the emitted event.
   * Falls back to SPLITWATCH_UNIT, then DEFAULTS.unit.
   */
  unit?: TimeUnit;

  /** Name of the timer started for every request */
  requestTimerName?: string;

  requestIdHeader?: string;
  trustIncomingIds?: boolean;

  emit?: EmitFunction;

  /**
   * Debug mode: also writes a one-line summary of every event to stderr.
   * Defaults to true when NODE_ENV !== 'production'.
   */
  debug?: boolean;

  /** Paths that are not timed */
  ignorePaths?: (string | RegExp)[] | ((path: string) => boolean);

  /** Record each stopped timer on the active OpenTelemetry span */
  otel?: boolean;
}

/**
 * Default configuration values
 */
export const DEFAULTS = {
  requestIdHeader: 'x-request-id',
  requestTimerName: 'request',
  trustIncomingIds: true,
  unit: TimeUnit.Microseconds,
  unitEnvVar: 'SPLITWATCH_UNIT',
} as const;
