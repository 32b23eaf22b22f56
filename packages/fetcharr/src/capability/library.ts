/**
 * Catalog library statistics (torrent count and total size), read from the
 * library page heading and kept for the status endpoint.
 */

import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('library');

export interface LibraryStats {
  torrentsCount: number;
  totalSizeTb: number;
  lastUpdated: string;
}

export interface LibraryStatsSource {
  /** null when the catalog session is not open. */
  libraryStats(): Promise<LibraryStats | null>;
}

/** Parses e.g. "Library 💾 1,234 torrents 56.7 TB". Missing parts read as 0. */
export function parseLibraryStats(text: string, now: Date = new Date()): LibraryStats {
  const torrents = /(\d[\d,]*)\s+torrents/i.exec(text);
  const size = /(\d+(?:\.\d+)?)\s*TB/i.exec(text);
  return {
    torrentsCount: torrents ? parseInt(torrents[1].replace(/,/g, ''), 10) : 0,
    totalSizeTb: size ? parseFloat(size[1]) : 0,
    lastUpdated: now.toISOString(),
  };
}

export class LibraryStatsCache {
  private stats: LibraryStats | null = null;

  constructor(private readonly source: LibraryStatsSource) {}

  get current(): LibraryStats | null {
    return this.stats;
  }

  /** Keeps the previous value when the read fails. */
  async refresh(): Promise<LibraryStats | null> {
    try {
      const stats = await this.source.libraryStats();
      if (!stats) {
        log.warn('library stats unavailable: catalog session not open');
        return null;
      }
      this.stats = stats;
      log.info(`library: ${stats.torrentsCount} torrents, ${stats.totalSizeTb} TB`);
      return stats;
    } catch (err) {
      log.warn(`refreshing library stats failed: ${errorMessage(err)}`);
      return null;
    }
  }
}
