/**
 * OpenTelemetry Integration
 *
 * Copies a stopped timer's metrics onto the active span. Without a
 * registered SDK the API hands back no span and every call is a no-op.
 */

import { trace, type AttributeValue, type Attributes } from '@opentelemetry/api';
import type { SplitTimer } from './timer.js';
import { createTimerReport } from './report.js';
import { TimerState } from './labels.js';
import { TimeUnit, unitLabel } from './units.js';

/**
 * Check whether there is an active span to enrich
 */
export function isSpanActive(): boolean {
  return trace.getActiveSpan() !== undefined;
}

/**
 * Add a stopped timer's metrics to the active span as
 * `timer.<name>.elapsed`, `timer.<name>.unit` and `timer.<name>.splits.<label>`
 *
 * @returns true if attributes were written
 */
export function recordTimerAttributes(
  timer: SplitTimer,
  unit: TimeUnit = TimeUnit.Nanoseconds
): boolean {
  const span = trace.getActiveSpan();
  if (!span || timer.getState() !== TimerState.Stopped) {
    return false;
  }

  span.setAttributes(timerAttributes(timer, unit));
  return true;
}

/**
 * Flatten a stopped timer's report into dot-notation span attributes
 * A repeated split label gets its index as a suffix, bumped until the key is unused
 */
export function timerAttributes(timer: SplitTimer, unit: TimeUnit): Attributes {
  const report = createTimerReport(timer, unit);
  const prefix = `timer.${report.name || 'unnamed'}`;
  const attributes: Record<string, AttributeValue> = {
    [`${prefix}.elapsed`]: report.elapsed,
    [`${prefix}.unit`]: unitLabel(unit),
  };

  report.splits.forEach((split, i) => {
    const base = `${prefix}.splits.${split.name}`;
    let key = base;
    for (let n = i; key in attributes; n++) {
      key = `${base}.${n}`;
    }
    attributes[key] = split.period;
  });

  return attributes;
}
