import { Hono } from 'hono';

import type { LibraryStatsCache } from '../../capability/library.js';
import type { CycleRunner } from '../../scheduler/cycleRunner.js';

export function makeLibraryRoutes(library: LibraryStatsCache, runner: CycleRunner): Hono {
  const app = new Hono();

  // GET /api/library
  app.get('/', (c) => c.json({ stats: library.current }));

  // POST /api/library/refresh - reading the stats navigates the shared page, so not during a cycle
  app.post('/refresh', async (c) => {
    if (runner.isRunning) {
      return c.json({ status: 'skipped', message: 'Cycle running; try again once it finishes' }, 409);
    }
    const stats = await library.refresh();
    if (!stats) {
      return c.json({ status: 'failed', error: 'Library stats unavailable', stats: library.current }, 503);
    }
    return c.json({ status: 'ok', stats });
  });

  return app;
}
