import fs from 'node:fs';
import path from 'node:path';

import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { discrepancyFileSchema, DiscrepancyRecord, DiscrepancyStore } from './types.js';

const log = createLogger('discrepancies');

/**
 * Discrepancies kept in a single JSON document: { "discrepancies": [...] }.
 * A missing file reads as empty; an unreadable one is reset to an empty store.
 */
export class JsonFileDiscrepancyStore implements DiscrepancyStore {
  constructor(private readonly filePath: string) {}

  private writeAtomic(records: DiscrepancyRecord[]): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify({ discrepancies: records }, null, 2));
    fs.renameSync(tmpPath, this.filePath);
  }

  private load(): DiscrepancyRecord[] {
    if (!fs.existsSync(this.filePath)) return [];
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
    } catch (err) {
      log.warn(`${this.filePath} is not valid JSON (${errorMessage(err)}); starting a fresh store`);
      this.writeAtomic([]);
      return [];
    }
    const parsed = discrepancyFileSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(`${this.filePath} has an unexpected shape; starting a fresh store`);
      this.writeAtomic([]);
      return [];
    }
    return parsed.data.discrepancies;
  }

  async get(showTitle: string, seasonNumber: number): Promise<DiscrepancyRecord | undefined> {
    return this.load().find((r) => r.showTitle === showTitle && r.seasonNumber === seasonNumber);
  }

  async put(record: DiscrepancyRecord): Promise<void> {
    const records = this.load();
    const idx = records.findIndex((r) => r.showTitle === record.showTitle && r.seasonNumber === record.seasonNumber);
    if (idx >= 0) records[idx] = record;
    else records.push(record);
    this.writeAtomic(records);
  }

  async list(): Promise<DiscrepancyRecord[]> {
    return this.load();
  }
}
