/**
 * splitwatch - nanosecond split timers for Node.js
 *
 * Start, split, pause, resume and stop a timer, then read elapsed time,
 * split times and split periods in any unit.
 *
 * @example
 * ```typescript
 * import { newTimer, TimeUnit } from 'splitwatch';
 *
 * const timer = newTimer('checkout').start();
 * await loadCart();
 * timer.split('cart');
 * timer.pause();
 * await waitForUser();
 * timer.resume();
 * await charge();
 * timer.stop('charge');
 *
 * timer.elapsedTime(TimeUnit.Milliseconds);
 * timer.splitPeriodWithName(1, TimeUnit.Microseconds); // e.g. "cart[1204 microseconds]"
 * ```
 *
 * With Express, every request gets its own timer scope:
 *
 * ```typescript
 * app.use(timerExpress({ unit: TimeUnit.Milliseconds }));
 * app.get('/orders', async (req, res) => {
 *   const db = req.timers.create('db').start();
 *   const rows = await query();
 *   db.stop();
 *   res.json(rows);
 * });
 * app.use(timerExpressError());
 * ```
 */

export type {
  Clock,
  EmitFunction,
  RequestOutcome,
  Segment,
  SegmentEvent,
  SplitReport,
  TimerEvent,
  TimerEventError,
  TimerMiddlewareConfig,
  TimerOptions,
  TimerReport,
} from './types.js';

export { DEFAULTS } from './types.js';

export { SplitTimer, newTimer, segmentName, pauseNanos } from './core/timer.js';

export { TimerState, TimerAction, stateLabel, actionLabel } from './core/labels.js';

export {
  TimeUnit,
  convertNanos,
  unitLabel,
  unitAbbreviation,
  parseTimeUnit,
} from './core/units.js';

export {
  TimerError,
  InvalidStateError,
  IndexOutOfRangeError,
  normalizeError,
} from './core/errors.js';

export {
  TimerScope,
  createTimer,
  findTimer,
  listTimers,
  clearTimers,
  runWithTimers,
  hasTimerScope,
  currentScope,
} from './core/registry.js';

export { createTimerReport, formatTimerReport } from './core/report.js';

export { recordTimerAttributes, timerAttributes, isSpanActive } from './core/otel.js';

export { timerExpress, timerExpressError, resolveUnit } from './middleware/express.js';

export { createConsoleEmitter, createConsoleReporter } from './utils/emit.js';

export { generateRequestId, isValidRequestId } from './utils/ids.js';

export { hrTimeNs, systemClock, sequenceClock } from './utils/time.js';
