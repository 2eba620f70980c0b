/**
 * Error Tests
 */

import { describe, it, expect } from 'vitest';
import {
  IndexOutOfRangeError,
  InvalidStateError,
  TimerError,
  normalizeError,
} from '../src/core/errors.js';
import { TimerState } from '../src/core/labels.js';

describe('Errors', () => {
  describe('InvalidStateError', () => {
    it('names the operation and the required states', () => {
      const err = new InvalidStateError('split', TimerState.Stopped, [
        TimerState.Running,
        TimerState.Paused,
      ]);

      expect(err).toBeInstanceOf(TimerError);
      expect(err).toBeInstanceOf(Error);
      expect(err.name).toBe('InvalidStateError');
      expect(err.message).toBe('split() requires the timer to be running or paused, but it is stopped');
    });
  });

  describe('IndexOutOfRangeError', () => {
    it('carries the index and bound', () => {
      const err = new IndexOutOfRangeError('split period', 3, 2);

      expect(err.name).toBe('IndexOutOfRangeError');
      expect(err.index).toBe(3);
      expect(err.bound).toBe(2);
      expect(err.message).toBe('split period index 3 out of range: 0 <= index < 2');
    });
  });

  describe('normalizeError', () => {
    it('keeps name, message and code of timer errors', () => {
      const err = new IndexOutOfRangeError('split time', 5, 1);
      expect(normalizeError(err)).toEqual({
        type: 'IndexOutOfRangeError',
        message: 'split time index 5 out of range: 0 <= index < 1',
        code: 'ERR_TIMER_INDEX',
      });
    });

    it('handles plain errors', () => {
      expect(normalizeError(new TypeError('bad input'))).toEqual({
        type: 'TypeError',
        message: 'bad input',
      });
    });

    it('handles error-like objects', () => {
      expect(normalizeError({ type: 'Timeout', message: 'took too long', code: 'ETIME' })).toEqual({
        type: 'Timeout',
        message: 'took too long',
        code: 'ETIME',
      });
    });

    it('handles primitives', () => {
      expect(normalizeError('boom')).toEqual({ type: 'Error', message: 'boom' });
      expect(normalizeError(42)).toEqual({ type: 'Error', message: '42' });
    });
  });
});
