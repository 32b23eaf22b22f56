import { Hono } from 'hono';

import type { LibraryStatsCache } from '../../capability/library.js';
import type { RunLogger } from '../../report/runLog.js';
import type { CycleRunner } from '../../scheduler/cycleRunner.js';
import { VERSION } from '../../shared/version.js';

export interface StatusDeps {
  runner: CycleRunner;
  runLogger?: RunLogger;
  surface?: { isUsable(): Promise<boolean> };
  library?: LibraryStatsCache;
  startedAt: Date;
  now: () => Date;
}

/** 90245 -> "1d 1h 4m 5s"; leading zero units are left out. */
export function formatUptime(totalSeconds: number): string {
  const days = Math.floor(totalSeconds / 86_400);
  const hours = Math.floor((totalSeconds % 86_400) / 3_600);
  const minutes = Math.floor((totalSeconds % 3_600) / 60);
  const seconds = Math.floor(totalSeconds % 60);
  let out = '';
  if (days > 0) out += `${days}d `;
  if (hours > 0 || days > 0) out += `${hours}h `;
  if (minutes > 0 || hours > 0 || days > 0) out += `${minutes}m `;
  return `${out}${seconds}s`;
}

export function makeStatusRoutes(deps: StatusDeps): Hono {
  const app = new Hono();

  // GET /api/status
  app.get('/', async (c) => {
    const uptimeSeconds = Math.max(0, Math.floor((deps.now().getTime() - deps.startedAt.getTime()) / 1000));
    return c.json({
      version: VERSION,
      uptimeSeconds,
      uptime: formatUptime(uptimeSeconds),
      browser: deps.surface ? await deps.surface.isUsable() : false,
      library: deps.library?.current ?? null,
      ...deps.runner.state,
      lastRun: deps.runLogger?.readStatus() ?? null,
    });
  });

  return app;
}
