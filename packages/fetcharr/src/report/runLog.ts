import fs from 'node:fs';
import path from 'node:path';

import type { CycleReport } from '../orchestrator/orchestrator.js';

export interface RunStatus {
  trigger: string;
  startedAt: string;
  completedAt: string;
  aborted: boolean;
  error?: string;
  summary?: CycleReport['summary'];
  logPath?: string;
}

/**
 * Per-cycle JSON reports under <dir>/runs and a last-run.json status file.
 * Both are written to a temp file first and renamed into place.
 */
export class RunLogger {
  private readonly runDir: string;
  private readonly statusPath: string;

  constructor(logDir: string) {
    this.runDir = path.join(logDir, 'runs');
    this.statusPath = path.join(logDir, 'last-run.json');
  }

  private writeAtomic(filePath: string, data: unknown): string {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2));
    fs.renameSync(tmpPath, filePath);
    return filePath;
  }

  writeReport(report: CycleReport): string {
    const ts = report.startedAt.replace(/[:.]/g, '-');
    return this.writeAtomic(path.join(this.runDir, `${ts}.json`), report);
  }

  writeStatus(status: RunStatus): string {
    return this.writeAtomic(this.statusPath, status);
  }

  readStatus(): RunStatus | null {
    if (!fs.existsSync(this.statusPath)) return null;
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.statusPath, 'utf8'));
      return isRunStatus(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }
}

function isRunStatus(value: unknown): value is RunStatus {
  return (
    typeof value === 'object' &&
    value !== null &&
    'trigger' in value &&
    typeof value.trigger === 'string' &&
    'startedAt' in value &&
    typeof value.startedAt === 'string'
  );
}
