/**
 * Single-flight cycle runner.
 * Cycles come from the interval timer, the HTTP trigger or the webhook;
 * a trigger that arrives while a cycle is running is dropped.
 */

import type { LibraryStatsCache } from '../capability/library.js';
import type { CycleReport, ResolutionOrchestrator } from '../orchestrator/orchestrator.js';
import { buildWorkItems } from '../orchestrator/workItems.js';
import type { RunLogger, RunStatus } from '../report/runLog.js';
import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { RequestFeed } from '../shared/types.js';

const log = createLogger('scheduler');

export const MIN_INTERVAL_SECONDS = 60;

export type CycleJob = (trigger: string) => Promise<CycleReport>;

export interface RunnerState {
  running: boolean;
  intervalSeconds: number;
  lastTrigger?: string;
  lastRunStarted?: string;
  lastRunCompleted?: string;
  lastError?: string;
  lastSummary?: CycleReport['summary'];
  nextRunAt?: string;
}

export class CycleRunner {
  private running = false;
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly intervalSeconds: number;
  private history: Omit<RunnerState, 'running' | 'intervalSeconds'> = {};
  private readonly runLogger?: RunLogger;

  constructor(
    private readonly job: CycleJob,
    opts: { intervalSeconds: number; runLogger?: RunLogger },
  ) {
    this.intervalSeconds = Math.max(MIN_INTERVAL_SECONDS, opts.intervalSeconds);
    this.runLogger = opts.runLogger;
  }

  get state(): RunnerState {
    return { running: this.running, intervalSeconds: this.intervalSeconds, ...this.history };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Fire-and-forget; false when a cycle is already running. */
  trigger(source: string): boolean {
    if (this.running) {
      log.info(`trigger from ${source} ignored: cycle already running`);
      return false;
    }
    this.runNow(source).catch((err) => log.error(`cycle from ${source} crashed: ${errorMessage(err)}`));
    return true;
  }

  /** Runs a cycle and resolves with its report; null when skipped or failed. */
  async runNow(source: string): Promise<CycleReport | null> {
    if (this.running) return null;
    this.running = true;
    const startedAt = new Date().toISOString();
    this.history = { ...this.history, lastTrigger: source, lastRunStarted: startedAt };
    log.info(`cycle started (${source})`);

    try {
      const report = await this.job(source);
      this.history = { ...this.history, lastError: undefined, lastSummary: report.summary };
      this.recordStatus({
        trigger: source,
        startedAt,
        completedAt: new Date().toISOString(),
        aborted: report.aborted,
        summary: report.summary,
      });
      log.info(`cycle finished: ${report.summary.complete}/${report.summary.items} items complete`);
      return report;
    } catch (err) {
      const message = errorMessage(err);
      this.history = { ...this.history, lastError: message };
      this.recordStatus({ trigger: source, startedAt, completedAt: new Date().toISOString(), aborted: true, error: message });
      log.error(`cycle failed: ${message}`);
      return null;
    } finally {
      this.running = false;
      this.history = { ...this.history, lastRunCompleted: new Date().toISOString() };
    }
  }

  private recordStatus(status: RunStatus): void {
    try {
      this.runLogger?.writeStatus(status);
    } catch (err) {
      log.warn(`could not write run status: ${errorMessage(err)}`);
    }
  }

  start(runOnStart = true): void {
    if (this.timer) return;
    const periodMs = this.intervalSeconds * 1000;
    this.history = { ...this.history, nextRunAt: new Date(Date.now() + periodMs).toISOString() };
    this.timer = setInterval(() => {
      this.history = { ...this.history, nextRunAt: new Date(Date.now() + periodMs).toISOString() };
      this.trigger('schedule');
    }, periodMs);
    log.info(`scheduled every ${this.intervalSeconds}s`);
    if (runOnStart) this.trigger('startup');
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.history = { ...this.history, nextRunAt: undefined };
  }
}

export interface CycleJobDeps {
  feed: RequestFeed;
  orchestrator: ResolutionOrchestrator;
  runLogger?: RunLogger;
  /** Runs before the feed is read, e.g. to open the browser session. */
  prepare?: () => Promise<void>;
  /** Re-read after every cycle. */
  library?: LibraryStatsCache;
}

/** feed -> work items -> orchestrator -> mark available -> library stats -> run log */
export function createCycleJob(deps: CycleJobDeps): CycleJob {
  return async () => {
    await deps.prepare?.();
    const items = buildWorkItems(await deps.feed.fetchPending());
    const report = await deps.orchestrator.runCycle(items);

    if (deps.feed.markAvailable) {
      for (const item of items) {
        const done = report.items.find((r) => r.requestId === item.requestId)?.complete;
        if (!done) continue;
        try {
          await deps.feed.markAvailable(item);
        } catch (err) {
          log.warn(`${item.title}: marking available failed (${errorMessage(err)})`);
        }
      }
    }

    await deps.library?.refresh();

    try {
      const logPath = deps.runLogger?.writeReport(report);
      if (logPath) log.debug(`run log: ${logPath}`);
    } catch (err) {
      log.warn(`could not write run log: ${errorMessage(err)}`);
    }
    return report;
  };
}
