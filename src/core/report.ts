/**
 * Timer Reports
 *
 * Read-only views of a stopped timer: a structured report for emission and
 * a plain-text block for printing.
 */

import type { TimerReport } from '../types.js';
import { segmentName, type SplitTimer } from './timer.js';
import { TimeUnit, unitAbbreviation } from './units.js';

/**
 * Build a report of a stopped timer in one unit
 * Throws InvalidStateError if the timer is not stopped
 */
export function createTimerReport(
  timer: SplitTimer,
  unit: TimeUnit = TimeUnit.Nanoseconds
): TimerReport {
  const elapsed = timer.elapsedTime(unit);
  const times = timer.splitTimes(unit);
  const periods = timer.splitPeriods(unit);
  const segments = timer.getSegments();

  return {
    name: timer.getName(),
    unit,
    elapsed,
    splits: times.map((time, i) => ({
      name: segmentName(segments[i]),
      time,
      period: periods[i],
    })),
  };
}

/**
 * Render a report as aligned text lines:
 *
 *   elapsed   : 100000us
 *   split[0]  : 50000us
 *   period[0] : 50000us
 */
export function formatTimerReport(report: TimerReport): string {
  const suffix = unitAbbreviation(report.unit);
  const lines = [`elapsed   : ${report.elapsed}${suffix}`];

  report.splits.forEach((split, i) => {
    lines.push(`split[${i}]  : ${split.time}${suffix}`);
  });
  report.splits.forEach((split, i) => {
    lines.push(`period[${i}] : ${split.period}${suffix}`);
  });

  return lines.join('\n');
}
