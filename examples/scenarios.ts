/**
 * Timer scenarios
 *
 * Replays the reference start/split/pause/resume/stop sequences with real
 * 50ms delays and prints each timer followed by its report in microseconds.
 * Run with: npx tsx examples/scenarios.ts
 */

import { setTimeout as sleep } from 'node:timers/promises';
import {
  TimeUnit,
  createTimer,
  createTimerReport,
  formatTimerReport,
  runWithTimers,
  type SplitTimer,
} from '../src/index.js';

type Step = (timer: SplitTimer) => unknown;

const start: Step = (t) => t.start();
const split: Step = (t) => t.split();
const pause: Step = (t) => t.pause();
const resume: Step = (t) => t.resume();
const stop: Step = (t) => t.stop();

const scenarios: Array<[string, Step[]]> = [
  ['scenario 1: start - stop', [start, stop]],
  ['scenario 2: start - split - stop', [start, split, stop]],
  ['scenario 3: start - pause - resume - stop', [start, pause, resume, stop]],
  ['scenario 4: start - pause - stop', [start, pause, stop]],
  ['scenario 5: start - split - pause - resume - stop', [start, split, pause, resume, stop]],
  ['scenario 6: start - split - pause - stop', [start, split, pause, stop]],
  [
    'scenario 7: start - split - pause - resume - pause - resume - split - pause - resume - stop',
    [start, split, pause, resume, pause, resume, split, pause, resume, stop],
  ],
];

async function runScenario(name: string, steps: Step[]): Promise<void> {
  const timer = createTimer(name);

  for (const [i, step] of steps.entries()) {
    if (i > 0) {
      await sleep(50);
    }
    step(timer);
  }

  console.log(`timer => ${timer.toString()}\n`);
  console.log(formatTimerReport(createTimerReport(timer, TimeUnit.Microseconds)));
  console.log('\n');
}

async function main(): Promise<void> {
  console.log('Timers\n------\n');
  for (const [name, steps] of scenarios) {
    await runWithTimers(() => runScenario(name, steps));
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
