import { Hono } from 'hono';

import type { CycleRunner } from '../../scheduler/cycleRunner.js';

export function makeTriggerRoutes(runner: CycleRunner): Hono {
  const app = new Hono();

  // POST /api/trigger
  app.post('/', (c) => {
    if (!runner.trigger('manual')) {
      return c.json({ error: 'Cycle already running' }, 409);
    }
    return c.json({ triggered: true }, 202);
  });

  return app;
}
