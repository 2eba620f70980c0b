/**
 * Express type augmentation for splitwatch
 * Adds req.timers to Express Request objects
 */

import type { TimerScope } from '../core/registry.js';

declare global {
  namespace Express {
    interface Request {
      timers: TimerScope;
    }
  }
}

export {};
