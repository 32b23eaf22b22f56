import { Hono } from 'hono';

import type { DiscrepancyStore } from '../../discrepancy/types.js';

export function makeDiscrepancyRoutes(store: DiscrepancyStore): Hono {
  const app = new Hono();

  // GET /api/discrepancies
  app.get('/', async (c) => {
    const records = await store.list();
    return c.json({ total: records.length, discrepancies: records });
  });

  return app;
}
