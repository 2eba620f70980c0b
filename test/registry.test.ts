/**
 * Timer Registry Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  TimerScope,
  clearTimers,
  createTimer,
  currentScope,
  findTimer,
  hasTimerScope,
  listTimers,
  runWithTimers,
} from '../src/core/registry.js';
import { TimerState } from '../src/core/labels.js';
import { sequenceClock } from '../src/utils/time.js';

describe('Timer registry', () => {
  afterEach(() => {
    clearTimers();
  });

  describe('root scope', () => {
    it('creates and finds timers by name', () => {
      const timer = createTimer('load');

      expect(timer.getName()).toBe('load');
      expect(timer.getState()).toBe(TimerState.Uninitialised);
      expect(findTimer('load')).toBe(timer);
      expect(findTimer('missing')).toBeUndefined();
      expect(hasTimerScope()).toBe(false);
    });

    it('replaces a timer registered under the same name', () => {
      const first = createTimer('load');
      const second = createTimer('load');

      expect(first).not.toBe(second);
      expect(findTimer('load')).toBe(second);
      expect(listTimers()).toEqual([second]);
    });

    it('passes options to the timer', () => {
      const timer = createTimer('fixed', { clock: sequenceClock([5n, 25n]) });
      timer.start().stop();
      expect(timer.elapsedTime()).toBe(20);
    });

    it('lists timers in creation order and clears them', () => {
      const a = createTimer('a');
      const b = createTimer('b');
      expect(listTimers()).toEqual([a, b]);

      clearTimers();
      expect(listTimers()).toEqual([]);
    });
  });

  describe('runWithTimers', () => {
    it('opens an empty scope that hides the root timers', () => {
      const outer = createTimer('shared');

      runWithTimers(() => {
        expect(hasTimerScope()).toBe(true);
        expect(findTimer('shared')).toBeUndefined();
        createTimer('shared');
      });

      expect(findTimer('shared')).toBe(outer);
    });

    it('returns the callback result', async () => {
      expect(runWithTimers(() => 7)).toBe(7);
      await expect(runWithTimers(async () => 'done')).resolves.toBe('done');
    });

    it('keeps concurrent flows apart across awaits', async () => {
      const labels = await Promise.all(
        ['first', 'second', 'third'].map((label, i) =>
          runWithTimers(async () => {
            createTimer('step').start(label);
            await sleep(5 * (3 - i));
            return findTimer('step')?.getSegments()[0]?.label;
          })
        )
      );

      expect(labels).toEqual(['first', 'second', 'third']);
    });

    it('uses a supplied scope', () => {
      const scope = new TimerScope();
      runWithTimers(() => {
        createTimer('inside');
        expect(currentScope()).toBe(scope);
      }, scope);

      expect(scope.find('inside')?.getName()).toBe('inside');
      expect(findTimer('inside')).toBeUndefined();
    });
  });
});
