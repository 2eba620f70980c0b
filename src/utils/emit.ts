/**
 * Console Emitter Utilities
 *
 * Helper functions for writing timer events and reports to stdout
 */

import type { EmitFunction, TimerEvent } from '../types.js';
import type { SplitTimer } from '../core/timer.js';
import { createTimerReport, formatTimerReport } from '../core/report.js';
import { TimeUnit } from '../core/units.js';

/**
 * Create a console emitter function for middleware events
 *
 * @param opts.pretty - If true, uses JSON.stringify with indentation (default: false)
 */
export function createConsoleEmitter(opts?: { pretty?: boolean }): EmitFunction {
  const pretty = opts?.pretty ?? false;

  return (event: TimerEvent): void => {
    const json = pretty
      ? JSON.stringify(event, null, 2)
      : JSON.stringify(event);
    process.stdout.write(json + '\n');
  };
}

/**
 * Create a function that prints a stopped timer's report to stdout
 *
 * @param opts.pretty - Print the aligned text form instead of a JSON line
 * @param opts.unit - Unit for every value (default: nanoseconds)
 */
export function createConsoleReporter(opts?: {
  pretty?: boolean;
  unit?: TimeUnit;
}): (timer: SplitTimer) => void {
  const pretty = opts?.pretty ?? false;
  const unit = opts?.unit ?? TimeUnit.Nanoseconds;

  return (timer: SplitTimer): void => {
    const report = createTimerReport(timer, unit);
    const output = pretty
      ? `${report.name}\n${formatTimerReport(report)}`
      : JSON.stringify(report);
    process.stdout.write(output + '\n');
  };
}
