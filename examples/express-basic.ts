/**
 * splitwatch Express Example
 *
 * Times every request and a couple of sub-steps inside the handlers.
 * Run with: npx tsx examples/express-basic.ts
 */

import express from 'express';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  TimeUnit,
  createConsoleEmitter,
  findTimer,
  timerExpress,
  timerExpressError,
} from '../src/index.js';

const app = express();
app.use(express.json());

/**
 * Register the timer middleware
 * - Attaches req.timers to every request
 * - Emits one event per request on response finish/close
 */
app.use(timerExpress({
  unit: TimeUnit.Milliseconds,
  emit: createConsoleEmitter({ pretty: true }),
}));

app.get('/hello', (_req, res) => {
  res.json({ message: 'Hello, World!' });
});

app.get('/report/:id', async (req, res, next) => {
  try {
    const work = req.timers.create('report').start('load');
    await sleep(20);
    work.split('render');

    // The request timer is reachable through the registry too
    findTimer('request')?.split('handler');

    work.pause();
    await sleep(30); // waiting on something we don't want to count
    work.resume();

    await sleep(10);
    work.stop();

    res.json({ id: req.params.id, renderMs: work.splitPeriod(1, TimeUnit.Milliseconds) });
  } catch (err) {
    next(err);
  }
});

app.get('/error', () => {
  throw new Error('Something went wrong!');
});

/**
 * Register the error middleware AFTER all routes
 */
app.use(timerExpressError());

app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
  res.status(500).json({ error: err.message });
});

const PORT = 3000;
app.listen(PORT, () => {
  console.log(`Example running on http://localhost:${PORT}`);
  console.log('Try:');
  console.log(`  curl http://localhost:${PORT}/hello`);
  console.log(`  curl http://localhost:${PORT}/report/42`);
  console.log(`  curl http://localhost:${PORT}/error`);
});
