import fs from 'node:fs';
import path from 'node:path';

import BetterSqlite3 from 'better-sqlite3';
import type Database from 'better-sqlite3';
import { z } from 'zod';

import type { DiscrepancyRecord, DiscrepancyStore } from './types.js';

interface DiscrepancyRow {
  show_title: string;
  season_number: number;
  external_show_id: string;
  request_id: number | null;
  total_episode_count: number;
  aired_episode_count: number;
  failed_episode_labels: string; // JSON array
  recorded_at: string;
}

const labelsSchema = z.array(z.string());

export function applySchema(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS discrepancies (
      show_title            TEXT NOT NULL,
      season_number         INTEGER NOT NULL,
      external_show_id      TEXT NOT NULL,
      request_id            INTEGER,
      total_episode_count   INTEGER NOT NULL,
      aired_episode_count   INTEGER NOT NULL,
      failed_episode_labels TEXT NOT NULL DEFAULT '[]',
      recorded_at           TEXT NOT NULL,
      PRIMARY KEY (show_title, season_number)
    );
  `);
}

function fromRow(row: DiscrepancyRow): DiscrepancyRecord {
  const labels = labelsSchema.safeParse(JSON.parse(row.failed_episode_labels));
  return {
    showTitle: row.show_title,
    seasonNumber: row.season_number,
    externalShowId: row.external_show_id,
    ...(row.request_id !== null ? { requestId: row.request_id } : {}),
    totalEpisodeCount: row.total_episode_count,
    airedEpisodeCount: row.aired_episode_count,
    failedEpisodeLabels: labels.success ? labels.data : [],
    timestamp: row.recorded_at,
  };
}

/** Discrepancies in a SQLite table keyed on (show_title, season_number). */
export class SqliteDiscrepancyStore implements DiscrepancyStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new BetterSqlite3(dbPath);
    applySchema(this.db);
  }

  async get(showTitle: string, seasonNumber: number): Promise<DiscrepancyRecord | undefined> {
    const row = this.db
      .prepare<[string, number], DiscrepancyRow>(
        'SELECT * FROM discrepancies WHERE show_title = ? AND season_number = ?',
      )
      .get(showTitle, seasonNumber);
    return row ? fromRow(row) : undefined;
  }

  async put(record: DiscrepancyRecord): Promise<void> {
    this.db.prepare(`
      INSERT INTO discrepancies (
        show_title, season_number, external_show_id, request_id,
        total_episode_count, aired_episode_count, failed_episode_labels, recorded_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(show_title, season_number) DO UPDATE SET
        external_show_id      = excluded.external_show_id,
        request_id            = excluded.request_id,
        total_episode_count   = excluded.total_episode_count,
        aired_episode_count   = excluded.aired_episode_count,
        failed_episode_labels = excluded.failed_episode_labels,
        recorded_at           = excluded.recorded_at
    `).run(
      record.showTitle,
      record.seasonNumber,
      record.externalShowId,
      record.requestId ?? null,
      record.totalEpisodeCount,
      record.airedEpisodeCount,
      JSON.stringify(record.failedEpisodeLabels),
      record.timestamp,
    );
  }

  async list(): Promise<DiscrepancyRecord[]> {
    return this.db
      .prepare<[], DiscrepancyRow>('SELECT * FROM discrepancies ORDER BY show_title, season_number')
      .all()
      .map(fromRow);
  }

  close(): void {
    this.db.close();
  }
}
