/**
 * Split Timer
 *
 * State machine plus timestamp ledger. Every boundary action (start, split,
 * stop) opens a new segment; pause/resume pairs are recorded inside the
 * segment that is open when they happen. Metrics are derived from the
 * ledger on first query after stop and cached until reset().
 *
 * A timer belongs to one logical flow. It does no locking.
 */

import type { Clock, Segment, SegmentEvent, TimerOptions } from '../types.js';
import { IndexOutOfRangeError, InvalidStateError } from './errors.js';
import { TimerAction, TimerState, actionLabel, stateLabel } from './labels.js';
import { TimeUnit, convertNanos, unitLabel } from './units.js';
import { systemClock } from '../utils/time.js';

interface LedgerSegment {
  label?: string;
  events: SegmentEvent[];
}

const ACTIVE_STATES: readonly TimerState[] = [TimerState.Running, TimerState.Paused];

/**
 * Create a new timer in the uninitialised state
 *
 * @param name - Display name used in reports
 * @param options - Optional clock override
 */
export function newTimer(name: string = '', options: TimerOptions = {}): SplitTimer {
  return new SplitTimer(name, options);
}

/**
 * Display name of a segment: its label, or the name of the action that opened it
 */
export function segmentName(segment: Segment): string {
  if (segment.label !== undefined) {
    return segment.label;
  }
  const opening = segment.events[0];
  return opening ? actionLabel(opening.action) : '';
}

/**
 * Total paused nanoseconds inside one segment
 * Sums every (pause, resume) pair following the opening event
 */
export function pauseNanos(segment: Segment): bigint {
  const events = segment.events;
  let paused = 0n;
  for (let i = 1; i + 1 < events.length; i += 2) {
    paused += events[i + 1].timestamp - events[i].timestamp;
  }
  return paused;
}

function boundaryTimestamp(segment: Segment): bigint {
  return segment.events[0].timestamp;
}

export class SplitTimer {
  private readonly name: string;
  private readonly clock: Clock;

  private state: TimerState = TimerState.Uninitialised;
  private segments: LedgerSegment[] = [];
  private current: LedgerSegment | undefined;

  private elapsedCache: bigint | undefined;
  private splitTimesCache: bigint[] | undefined;
  private splitPeriodsCache: bigint[] | undefined;

  constructor(name: string = '', options: TimerOptions = {}) {
    this.name = name;
    this.clock = options.clock ?? systemClock;
  }

  getName(): string {
    return this.name;
  }

  getState(): TimerState {
    return this.state;
  }

  /**
   * Readonly copy of the recorded segments
   */
  getSegments(): readonly Segment[] {
    return this.segments.map((segment) => ({
      label: segment.label,
      events: [...segment.events],
    }));
  }

  /**
   * Start the timer. Only legal when uninitialised.
   */
  start(label?: string): this {
    const now = this.clock();
    if (this.state !== TimerState.Uninitialised) {
      throw new InvalidStateError('start', this.state, [TimerState.Uninitialised]);
    }

    this.segments = [];
    this.openSegment(TimerAction.Start, now, label);
    this.state = TimerState.Running;
    return this;
  }

  /**
   * Close the current segment and open a new one.
   * A pending pause is closed at the split's timestamp.
   */
  split(label?: string): this {
    const now = this.clock();
    this.requireActive('split');

    if (this.state === TimerState.Paused) {
      this.record(TimerAction.Resume, now);
    }
    this.openSegment(TimerAction.Split, now, label);
    this.state = TimerState.Running;
    return this;
  }

  /**
   * Pause the timer. Pausing a paused timer does nothing.
   */
  pause(): this {
    const now = this.clock();
    this.requireActive('pause');

    if (this.state === TimerState.Running) {
      this.record(TimerAction.Pause, now);
      this.state = TimerState.Paused;
    }
    return this;
  }

  /**
   * Resume the timer. Resuming a running timer does nothing.
   */
  resume(): this {
    const now = this.clock();
    this.requireActive('resume');

    if (this.state === TimerState.Paused) {
      this.record(TimerAction.Resume, now);
      this.state = TimerState.Running;
    }
    return this;
  }

  /**
   * Stop the timer. A pending pause is closed at the stop timestamp
   * before the closing segment is appended.
   */
  stop(label?: string): this {
    const now = this.clock();
    this.requireActive('stop');

    if (this.state === TimerState.Paused) {
      this.record(TimerAction.Resume, now);
    }
    this.openSegment(TimerAction.Stop, now, label);
    this.state = TimerState.Stopped;
    return this;
  }

  /**
   * Return to the uninitialised state from any state, discarding the ledger
   */
  reset(): this {
    this.state = TimerState.Uninitialised;
    this.segments = [];
    this.current = undefined;
    this.elapsedCache = undefined;
    this.splitTimesCache = undefined;
    this.splitPeriodsCache = undefined;
    return this;
  }

  /**
   * Net running time from start to stop, excluding pauses
   */
  elapsedTime(unit: TimeUnit = TimeUnit.Nanoseconds): number {
    this.requireStopped('elapsedTime');
    return convertNanos(this.elapsedNanos(), unit);
  }

  /**
   * Exact elapsed nanoseconds, for spans past Number.MAX_SAFE_INTEGER
   */
  elapsedTimeNanos(): bigint {
    this.requireStopped('elapsedTimeNanos');
    return this.elapsedNanos();
  }

  /**
   * Net time from start to each split boundary and to stop
   */
  splitTimes(unit: TimeUnit = TimeUnit.Nanoseconds): number[] {
    this.requireStopped('splitTimes');
    return this.splitTimesNanos().map((value) => convertNanos(value, unit));
  }

  splitTime(index: number, unit: TimeUnit = TimeUnit.Nanoseconds): number {
    this.requireStopped('splitTime');
    this.checkIndex('split time', index);
    return convertNanos(this.splitTimesNanos()[index], unit);
  }

  /**
   * Net running time of each segment on its own
   */
  splitPeriods(unit: TimeUnit = TimeUnit.Nanoseconds): number[] {
    this.requireStopped('splitPeriods');
    return this.splitPeriodsNanos().map((value) => convertNanos(value, unit));
  }

  splitPeriod(index: number, unit: TimeUnit = TimeUnit.Nanoseconds): number {
    this.requireStopped('splitPeriod');
    this.checkIndex('split period', index);
    return convertNanos(this.splitPeriodsNanos()[index], unit);
  }

  /**
   * Split time rendered as `name[value unit]`, e.g. `start[50000 microseconds]`
   */
  splitTimeWithName(index: number, unit: TimeUnit = TimeUnit.Nanoseconds): string {
    this.requireStopped('splitTimeWithName');
    this.checkIndex('split time', index);
    return this.withName(index, this.splitTimesNanos()[index], unit);
  }

  splitPeriodWithName(index: number, unit: TimeUnit = TimeUnit.Nanoseconds): string {
    this.requireStopped('splitPeriodWithName');
    this.checkIndex('split period', index);
    return this.withName(index, this.splitPeriodsNanos()[index], unit);
  }

  /**
   * `timer <state>` until stopped, then the full ledger with the elapsed
   * time in the given unit. Timestamps and pauses stay in nanoseconds.
   */
  toString(unit: TimeUnit = TimeUnit.Nanoseconds): string {
    if (this.state !== TimerState.Stopped) {
      return `timer ${stateLabel(this.state)}`;
    }

    const splits = this.segments.map((segment) => {
      const actions = segment.events
        .map((event) => `${actionLabel(event.action)}(${event.timestamp})`)
        .join(',');
      return [
        '    {',
        `      name: ${segmentName(segment)},`,
        `      actions: [${actions}],`,
        `      paused: ${pauseNanos(segment)}`,
        '    }',
      ].join('\n');
    });

    return [
      '{',
      `  name: "${this.name}",`,
      `  elapsed: ${this.elapsedTime(unit)} ${unitLabel(unit)},`,
      '  splits: [',
      splits.join(',\n'),
      '  ]',
      '}',
    ].join('\n');
  }

  private openSegment(action: TimerAction, timestamp: bigint, label: string | undefined): void {
    const segment: LedgerSegment = { label, events: [{ action, timestamp }] };
    this.segments.push(segment);
    this.current = segment;
  }

  private record(action: TimerAction, timestamp: bigint): void {
    if (!this.current) {
      throw new InvalidStateError(actionLabel(action), this.state, ACTIVE_STATES);
    }
    this.current.events.push({ action, timestamp });
  }

  private requireActive(operation: string): void {
    if (!ACTIVE_STATES.includes(this.state)) {
      throw new InvalidStateError(operation, this.state, ACTIVE_STATES);
    }
  }

  private requireStopped(operation: string): void {
    if (this.state !== TimerState.Stopped) {
      throw new InvalidStateError(operation, this.state, [TimerState.Stopped]);
    }
  }

  private checkIndex(kind: 'split time' | 'split period', index: number): void {
    const bound = this.segments.length - 1;
    if (!Number.isInteger(index) || index < 0 || index >= bound) {
      throw new IndexOutOfRangeError(kind, index, bound);
    }
  }

  private withName(index: number, nanos: bigint, unit: TimeUnit): string {
    return `${segmentName(this.segments[index])}[${convertNanos(nanos, unit)} ${unitLabel(unit)}]`;
  }

  private elapsedNanos(): bigint {
    if (this.elapsedCache === undefined) {
      const last = this.segments.length - 1;
      let paused = 0n;
      for (let i = 0; i < last; i++) {
        paused += pauseNanos(this.segments[i]);
      }
      this.elapsedCache =
        boundaryTimestamp(this.segments[last]) - boundaryTimestamp(this.segments[0]) - paused;
    }
    return this.elapsedCache;
  }

  private splitTimesNanos(): bigint[] {
    if (this.splitTimesCache === undefined) {
      const startedAt = boundaryTimestamp(this.segments[0]);
      const times: bigint[] = [];
      let paused = 0n;
      for (let i = 1; i < this.segments.length; i++) {
        paused += pauseNanos(this.segments[i - 1]);
        times.push(boundaryTimestamp(this.segments[i]) - startedAt - paused);
      }
      this.splitTimesCache = times;
    }
    return this.splitTimesCache;
  }

  private splitPeriodsNanos(): bigint[] {
    if (this.splitPeriodsCache === undefined) {
      const periods: bigint[] = [];
      for (let i = 1; i < this.segments.length; i++) {
        const previous = this.segments[i - 1];
        periods.push(
          boundaryTimestamp(this.segments[i]) - boundaryTimestamp(previous) - pauseNanos(previous)
        );
      }
      this.splitPeriodsCache = periods;
    }
    return this.splitPeriodsCache;
  }
}
