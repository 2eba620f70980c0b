/**
 * Timer Registry
 *
 * Named timers scoped per logical execution context. runWithTimers() opens a
 * scope that follows the async flow of the callback; code running outside
 * any scope shares a process-wide root scope.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { TimerOptions } from '../types.js';
import { SplitTimer } from './timer.js';

/**
 * A set of named timers belonging to one logical flow
 */
export class TimerScope {
  private readonly timers = new Map<string, SplitTimer>();

  /**
   * Create a timer and register it under its name
   * Replaces any timer already registered under that name
   */
  create(name: string, options?: TimerOptions): SplitTimer {
    const timer = new SplitTimer(name, options);
    this.timers.set(name, timer);
    return timer;
  }

  find(name: string): SplitTimer | undefined {
    return this.timers.get(name);
  }

  /**
   * Registered timers in creation order
   */
  list(): SplitTimer[] {
    return [...this.timers.values()];
  }

  clear(): void {
    this.timers.clear();
  }
}

const storage = new AsyncLocalStorage<TimerScope>();
const rootScope = new TimerScope();

/**
 * The scope of the current async flow, or the root scope outside any
 */
export function currentScope(): TimerScope {
  return storage.getStore() ?? rootScope;
}

export function createTimer(name: string, options?: TimerOptions): SplitTimer {
  return currentScope().create(name, options);
}

export function findTimer(name: string): SplitTimer | undefined {
  return currentScope().find(name);
}

export function listTimers(): SplitTimer[] {
  return currentScope().list();
}

export function clearTimers(): void {
  currentScope().clear();
}

/**
 * Run a callback inside a timer scope (a new, empty one by default)
 *
 * @returns whatever the callback returns (a promise stays a promise)
 */
export function runWithTimers<T>(fn: () => T, scope: TimerScope = new TimerScope()): T {
  return storage.run(scope, fn);
}

/**
 * Whether the caller is inside a runWithTimers() scope
 */
export function hasTimerScope(): boolean {
  return storage.getStore() !== undefined;
}
