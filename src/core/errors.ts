/**
 * Timer Errors
 *
 * Both error kinds are ordinary, caller-recoverable conditions. A timer's
 * state is never changed by a call that throws.
 */

import type { TimerEventError } from '../types.js';
import { stateLabel, type TimerState } from './labels.js';

/**
 * Base class for every error thrown by a timer
 */
export class TimerError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Thrown when a mutator or metric accessor is called in a state that forbids it
 */
export class InvalidStateError extends TimerError {
  readonly operation: string;
  readonly state: TimerState;
  readonly allowed: readonly TimerState[];

  constructor(operation: string, state: TimerState, allowed: readonly TimerState[]) {
    const required = allowed.map(stateLabel).join(' or ');
    super(
      `${operation}() requires the timer to be ${required}, but it is ${stateLabel(state)}`,
      'ERR_TIMER_STATE'
    );
    this.operation = operation;
    this.state = state;
    this.allowed = allowed;
  }
}

/**
 * Thrown by index-addressed split queries for an index outside [0, bound)
 */
export class IndexOutOfRangeError extends TimerError {
  readonly index: number;
  readonly bound: number;

  constructor(kind: 'split time' | 'split period', index: number, bound: number) {
    super(`${kind} index ${index} out of range: 0 <= index < ${bound}`, 'ERR_TIMER_INDEX');
    this.index = index;
    this.bound = bound;
  }
}

/**
 * Normalize an error value into a standard event error structure
 * Handles Error objects, objects with error-like properties, and primitives
 */
export function normalizeError(err: unknown): TimerEventError {
  if (err instanceof Error) {
    const normalized: TimerEventError = {
      type: err.name || 'Error',
      message: err.message || 'Unknown error',
    };

    if ('code' in err && typeof err.code === 'string') {
      normalized.code = err.code;
    }

    return normalized;
  }

  if (err !== null && typeof err === 'object') {
    const type = 'type' in err && typeof err.type === 'string' ? err.type : 'Error';
    const message = 'message' in err && typeof err.message === 'string' ? err.message : String(err);
    const normalized: TimerEventError = { type, message };
    if ('code' in err && typeof err.code === 'string') {
      normalized.code = err.code;
    }
    return normalized;
  }

  return {
    type: 'Error',
    message: String(err),
  };
}
