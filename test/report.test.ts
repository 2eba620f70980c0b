/**
 * Report and Console Reporter Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { newTimer } from '../src/core/timer.js';
import { createTimerReport, formatTimerReport } from '../src/core/report.js';
import { InvalidStateError } from '../src/core/errors.js';
import { TimeUnit } from '../src/core/units.js';
import { createConsoleEmitter, createConsoleReporter } from '../src/utils/emit.js';
import { sequenceClock } from '../src/utils/time.js';
import type { TimerEvent } from '../src/types.js';

const MS = 1_000_000n;

function scenarioTimer() {
  const timer = newTimer('scenario', {
    clock: sequenceClock([
      0n, 50n * MS, 100n * MS, 150n * MS, 200n * MS,
      250n * MS, 300n * MS, 350n * MS, 400n * MS, 450n * MS,
    ]),
  });
  timer.start();
  timer.split('split1');
  timer.pause();
  timer.resume();
  timer.pause();
  timer.resume();
  timer.split('split2');
  timer.pause();
  timer.resume();
  timer.stop();
  return timer;
}

describe('Timer reports', () => {
  describe('createTimerReport', () => {
    it('collects elapsed, split times and periods in one unit', () => {
      expect(createTimerReport(scenarioTimer(), TimeUnit.Milliseconds)).toEqual({
        name: 'scenario',
        unit: 'MILLISECONDS',
        elapsed: 300,
        splits: [
          { name: 'start', time: 50, period: 50 },
          { name: 'split1', time: 200, period: 150 },
          { name: 'split2', time: 300, period: 100 },
        ],
      });
    });

    it('defaults to nanoseconds', () => {
      const timer = newTimer('ns', { clock: sequenceClock([0n, 75n]) }).start().stop();
      expect(createTimerReport(timer)).toEqual({
        name: 'ns',
        unit: 'NANOSECONDS',
        elapsed: 75,
        splits: [{ name: 'start', time: 75, period: 75 }],
      });
    });

    it('refuses a timer that is not stopped', () => {
      const timer = newTimer('live', { clock: sequenceClock([0n]) }).start();
      expect(() => createTimerReport(timer)).toThrow(InvalidStateError);
    });
  });

  describe('formatTimerReport', () => {
    it('renders aligned lines with the unit suffix', () => {
      const text = formatTimerReport(createTimerReport(scenarioTimer(), TimeUnit.Milliseconds));

      expect(text).toBe(
        [
          'elapsed   : 300ms',
          'split[0]  : 50ms',
          'split[1]  : 200ms',
          'split[2]  : 300ms',
          'period[0] : 50ms',
          'period[1] : 150ms',
          'period[2] : 100ms',
        ].join('\n')
      );
    });
  });

  describe('console output', () => {
    const captureStdout = () => vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('prints a report as a JSON line', () => {
      const writeSpy = captureStdout();
      const timer = newTimer('job', { clock: sequenceClock([0n, 4_000n]) }).start().stop();
      createConsoleReporter({ unit: TimeUnit.Microseconds })(timer);

      expect(writeSpy).toHaveBeenCalledWith(
        '{"name":"job","unit":"MICROSECONDS","elapsed":4,"splits":[{"name":"start","time":4,"period":4}]}\n'
      );
    });

    it('prints the text form when pretty', () => {
      const writeSpy = captureStdout();
      const timer = newTimer('job', { clock: sequenceClock([0n, 4_000n]) }).start().stop();
      createConsoleReporter({ pretty: true, unit: TimeUnit.Microseconds })(timer);

      expect(writeSpy).toHaveBeenCalledWith(
        'job\nelapsed   : 4us\nsplit[0]  : 4us\nperiod[0] : 4us\n'
      );
    });

    it('emits events as JSON lines', () => {
      const event: TimerEvent = {
        timestamp: '2024-01-15T10:30:00.000Z',
        request_id: 'req_test',
        method: 'GET',
        path: '/test',
        status_code: 200,
        outcome: 'success',
        unit: 'MILLISECONDS',
        timers: [],
      };
      const writeSpy = captureStdout();
      createConsoleEmitter()(event);

      expect(writeSpy).toHaveBeenCalledWith(JSON.stringify(event) + '\n');
    });
  });
});
