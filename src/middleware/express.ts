/**
 * Express Middleware
 *
 * Provides two middlewares:
 * - timerExpress(): opens a timer scope per request, times the request and
 *   emits one event with every timer's report on finish/close
 * - timerExpressError(): error middleware that records the error on the event
 *
 * Usage:
 *   app.use(timerExpress(config));
 *   // ... routes ...
 *   app.use(timerExpressError()); // AFTER all routes
 */

import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import type {
  EmitFunction,
  RequestOutcome,
  TimerEvent,
  TimerEventError,
  TimerMiddlewareConfig,
  TimerReport,
} from '../types.js';
import { DEFAULTS } from '../types.js';
import { normalizeError } from '../core/errors.js';
import { TimerState, stateLabel } from '../core/labels.js';
import { recordTimerAttributes } from '../core/otel.js';
import { TimerScope, runWithTimers } from '../core/registry.js';
import { createTimerReport } from '../core/report.js';
import { parseTimeUnit, type TimeUnit } from '../core/units.js';
import { createConsoleEmitter } from '../utils/emit.js';
import { resolveRequestId } from '../utils/ids.js';
import { logDebug, logError, logWarning } from '../utils/log.js';
import { isoTimestamp } from '../utils/time.js';

interface RequestState {
  error?: TimerEventError;
}

const requestStates = new WeakMap<Request, RequestState>();

/**
 * Resolve the report unit: config, then SPLITWATCH_UNIT, then the default
 */
export function resolveUnit(config: TimerMiddlewareConfig): TimeUnit {
  if (config.unit) {
    return config.unit;
  }

  const fromEnv = process.env[DEFAULTS.unitEnvVar];
  if (fromEnv) {
    const parsed = parseTimeUnit(fromEnv);
    if (parsed) {
      return parsed;
    }
    logWarning(`ignoring unknown ${DEFAULTS.unitEnvVar} "${fromEnv}"`);
  }

  return DEFAULTS.unit;
}

/**
 * Main timer middleware for Express
 *
 * Attaches req.timers (a fresh TimerScope, also active through the
 * registry functions for the rest of the request) and finalizes on
 * response finish/close:
 * - 'finish': Normal response completion
 * - 'close': Client disconnect/abort (without finish)
 */
export function timerExpress(config: TimerMiddlewareConfig = {}): RequestHandler {
  const requestIdHeader = config.requestIdHeader ?? DEFAULTS.requestIdHeader;
  const requestTimerName = config.requestTimerName ?? DEFAULTS.requestTimerName;
  const trustIncoming = config.trustIncomingIds ?? DEFAULTS.trustIncomingIds;
  const debug = config.debug ?? (process.env.NODE_ENV !== 'production');
  const emit: EmitFunction = config.emit ?? createConsoleEmitter();
  const unit = resolveUnit(config);
  const ignorePaths = config.ignorePaths;

  const shouldIgnorePath = (path: string): boolean => {
    if (!ignorePaths) return false;

    if (typeof ignorePaths === 'function') {
      return ignorePaths(path);
    }

    return ignorePaths.some(pattern =>
      typeof pattern === 'string' ? path === pattern : pattern.test(path)
    );
  };

  return (req: Request, res: Response, next: NextFunction): void => {
    const path = req.path || req.url;

    if (shouldIgnorePath(path)) {
      return next();
    }

    const requestId = resolveRequestId(
      req.headers[requestIdHeader.toLowerCase()],
      trustIncoming
    );
    res.setHeader(requestIdHeader, requestId);

    const timestamp = isoTimestamp();
    const scope = new TimerScope();
    const requestTimer = scope.create(requestTimerName).start();
    const state: RequestState = {};

    requestStates.set(req, state);
    req.timers = scope;

    let finalized = false;

    const collectReports = (): TimerReport[] => {
      const reports: TimerReport[] = [];
      // a handler may have replaced the request timer in the scope
      const timers = [requestTimer, ...scope.list().filter((timer) => timer !== requestTimer)];

      for (const timer of timers) {
        const timerState = timer.getState();
        if (timerState === TimerState.Running || timerState === TimerState.Paused) {
          if (timer !== requestTimer) {
            logWarning(
              `timer "${timer.getName()}" still ${stateLabel(timerState)} at end of request ${requestId}, stopping it`
            );
          }
          timer.stop();
        }

        if (timer.getState() !== TimerState.Stopped) {
          continue;
        }

        reports.push(createTimerReport(timer, unit));
        if (config.otel) {
          recordTimerAttributes(timer, unit);
        }
      }

      return reports;
    };

    const finalizeOnce = (outcome: RequestOutcome, overrideStatusCode?: number): void => {
      if (finalized) return;
      finalized = true;

      const statusCode = overrideStatusCode ?? (res.statusCode || 200);
      const event: TimerEvent = {
        timestamp,
        request_id: requestId,
        method: req.method.toUpperCase(),
        path,
        status_code: statusCode,
        outcome: resolveOutcome(outcome, state, statusCode),
        unit,
        timers: collectReports(),
      };

      const route: unknown = req.route?.path;
      if (typeof route === 'string') {
        event.route = route;
      }
      if (state.error) {
        event.error = state.error;
      }

      if (debug) {
        logDebug(
          `${event.method} ${event.path} ${event.status_code} ${event.outcome} (${requestId}) timers=${event.timers.length}`
        );
      }

      try {
        emit(event);
      } catch (err) {
        logError(`emit failed for ${requestId}: ${normalizeError(err).message}`);
      }
    };

    res.on('finish', () => {
      finalizeOnce('success');
    });

    res.on('close', () => {
      if (finalized) return;
      if (res.writableEnded) return;

      finalizeOnce('aborted', 499);
    });

    runWithTimers(() => next(), scope);
  };
}

/**
 * Timer error middleware for Express
 *
 * Records the normalized error on the request's event and passes it on.
 * MUST be registered AFTER all routes to capture route errors.
 */
export function timerExpressError(): ErrorRequestHandler {
  return (err: unknown, req: Request, _res: Response, next: NextFunction): void => {
    const state = requestStates.get(req);
    if (state) {
      state.error = normalizeError(err);
    }

    next(err);
  };
}

function resolveOutcome(
  outcome: RequestOutcome,
  state: RequestState,
  statusCode: number
): RequestOutcome {
  if (outcome === 'aborted') {
    return 'aborted';
  }
  if (state.error || statusCode >= 500) {
    return 'error';
  }
  return outcome;
}

export type { TimerMiddlewareConfig };
