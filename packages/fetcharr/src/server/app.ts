/**
 * Hono application factory.
 * Status, manual trigger, request webhook, discrepancy listing and library stats.
 */

import { Hono } from 'hono';
import { logger } from 'hono/logger';

import type { LibraryStatsCache } from '../capability/library.js';
import type { DiscrepancyStore } from '../discrepancy/types.js';
import type { RunLogger } from '../report/runLog.js';
import type { CycleRunner } from '../scheduler/cycleRunner.js';
import { makeDiscrepancyRoutes } from './routes/discrepancies.js';
import { makeLibraryRoutes } from './routes/library.js';
import { makeStatusRoutes } from './routes/status.js';
import { makeTriggerRoutes } from './routes/trigger.js';
import { makeWebhookRoutes } from './routes/webhook.js';

export interface AppDeps {
  runner: CycleRunner;
  store: DiscrepancyStore;
  runLogger?: RunLogger;
  surface?: { isUsable(): Promise<boolean> };
  library?: LibraryStatsCache;
  /** Process start, for uptime. Defaults to app creation. */
  startedAt?: Date;
  now?: () => Date;
  /** Skip request logging (tests). */
  quiet?: boolean;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  if (!deps.quiet) app.use('*', logger());

  app.route(
    '/api/status',
    makeStatusRoutes({
      runner: deps.runner,
      runLogger: deps.runLogger,
      surface: deps.surface,
      library: deps.library,
      startedAt: deps.startedAt ?? new Date(),
      now: deps.now ?? (() => new Date()),
    }),
  );
  app.route('/api/trigger', makeTriggerRoutes(deps.runner));
  app.route('/api/webhook', makeWebhookRoutes(deps.runner));
  app.route('/api/discrepancies', makeDiscrepancyRoutes(deps.store));
  if (deps.library) app.route('/api/library', makeLibraryRoutes(deps.library, deps.runner));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));
  app.onError((err, c) => c.json({ error: err.message }, 500));

  return app;
}
