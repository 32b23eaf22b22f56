/**
 * Wires config into the runtime object graph shared by `run` and `serve`.
 */

import { CascadeController } from '../cascade/controller.js';
import { LibraryStatsCache } from '../capability/library.js';
import { PuppeteerSurface } from '../capability/puppeteer.js';
import { JsonFileDiscrepancyStore } from '../discrepancy/jsonStore.js';
import { SqliteDiscrepancyStore } from '../discrepancy/sqliteStore.js';
import { DiscrepancyTracker } from '../discrepancy/tracker.js';
import type { DiscrepancyStore } from '../discrepancy/types.js';
import { OverseerrClient } from '../feed/overseerr.js';
import { TraktClient } from '../metadata/trakt.js';
import { ResolutionOrchestrator } from '../orchestrator/orchestrator.js';
import { RunLogger } from '../report/runLog.js';
import { createCycleJob, CycleRunner } from '../scheduler/cycleRunner.js';
import { loadConfig, type FetcharrConfig } from '../shared/config.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { createLogger, setLogLevel } from '../shared/logger.js';

const log = createLogger('cli');

export type ClosableStore = DiscrepancyStore & { close?: () => void };

export interface Runtime {
  config: FetcharrConfig;
  store: ClosableStore;
  surface: PuppeteerSurface;
  library: LibraryStatsCache;
  runLogger: RunLogger;
  runner: CycleRunner;
  shutdown(): Promise<void>;
}

/** Load config and apply its log level; config errors end the process. */
export function loadConfigOrExit(baseDir: string, configPath?: string): FetcharrConfig {
  try {
    const config = loadConfig(baseDir, configPath);
    setLogLevel(config.logs.level);
    return config;
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

export function openStore(config: FetcharrConfig): ClosableStore {
  const { backend, path } = config.discrepancies;
  return backend === 'sqlite' ? new SqliteDiscrepancyStore(path) : new JsonFileDiscrepancyStore(path);
}

export function buildRuntime(config: FetcharrConfig): Runtime {
  const store = openStore(config);
  const trakt = new TraktClient({ clientId: config.trakt.clientId, baseUrl: config.trakt.baseUrl });
  const feed = new OverseerrClient(config.overseerr, trakt);
  const runLogger = new RunLogger(config.logs.dir);

  const surfaceOptions = {
    executablePath: config.browser.executablePath,
    headless: config.browser.headless,
    catalogBaseUrl: config.catalog.baseUrl,
    storage: config.browser.storage,
    navigationTimeoutMs: config.browser.navigationTimeoutMs,
    selectors: config.browser.selectors,
    settings: config.catalog.settings,
  };
  const surface = new PuppeteerSurface(surfaceOptions);
  const library = new LibraryStatsCache(surface);

  const { extrasFallback, checkNextEpisode, tiers, ...timings } = config.cascade;
  const controller = new CascadeController(surface, { tiers, matching: config.matching, timings, extrasFallback });
  const tracker = new DiscrepancyTracker(store, trakt, { checkNextEpisode });
  const orchestrator = new ResolutionOrchestrator({
    surface,
    controller,
    tracker,
    catalogBaseUrl: config.catalog.baseUrl,
    reestablish: () => surface.relaunch(),
  });

  const job = createCycleJob({
    feed,
    orchestrator,
    runLogger,
    library,
    prepare: async () => {
      if (await surface.isUsable()) return;
      await surface.open();
    },
  });
  const runner = new CycleRunner(job, { intervalSeconds: config.schedule.intervalSeconds, runLogger });

  return {
    config,
    store,
    surface,
    library,
    runLogger,
    runner,
    async shutdown() {
      runner.stop();
      try {
        await surface.close();
      } catch (err) {
        log.warn(`closing browser failed: ${errorMessage(err)}`);
      }
      store.close?.();
    },
  };
}
