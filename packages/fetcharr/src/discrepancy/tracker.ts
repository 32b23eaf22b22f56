import { formatEpisodeLabel } from '../matching/normalizer.js';
import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { MetadataSource, SeasonDetails } from '../shared/types.js';
import type { DiscrepancyRecord, DiscrepancyStore } from './types.js';

const log = createLogger('discrepancies');

export interface TrackedShow {
  title: string;
  /** Id the metadata service knows the show by. */
  externalId: string;
  requestId?: number;
}

export type SeasonClassification =
  | { season: number; mode: 'normal' }
  | { season: number; mode: 'discrepant'; record: DiscrepancyRecord };

export interface TrackerOptions {
  /** Count the next episode as aired when the metadata service says it already has. */
  checkNextEpisode?: boolean;
  now?: () => Date;
}

export function episodeLabels(count: number): string[] {
  return Array.from({ length: Math.max(0, count) }, (_, i) => formatEpisodeLabel(i + 1));
}

/**
 * Splits a show's requested seasons into normal ones (searched as whole seasons)
 * and discrepant ones (searched episode by episode). Owns every write to the store.
 */
export class DiscrepancyTracker {
  private readonly checkNextEpisode: boolean;
  private readonly now: () => Date;

  constructor(
    private readonly store: DiscrepancyStore,
    private readonly metadata: MetadataSource,
    opts: TrackerOptions = {},
  ) {
    this.checkNextEpisode = opts.checkNextEpisode ?? true;
    this.now = opts.now ?? (() => new Date());
  }

  async classifySeasons(show: TrackedShow, seasons: readonly number[]): Promise<SeasonClassification[]> {
    const out: SeasonClassification[] = [];
    for (const season of seasons) {
      out.push(await this.classifySeason(show, season));
    }
    return out;
  }

  async classifySeason(show: TrackedShow, season: number): Promise<SeasonClassification> {
    const existing = await this.store.get(show.title, season);
    if (existing) {
      log.debug(`${show.title} season ${season}: known discrepancy (${existing.failedEpisodeLabels.length} episodes)`);
      return { season, mode: 'discrepant', record: existing };
    }

    let details: SeasonDetails | null;
    try {
      details = await this.metadata.getSeasonDetails(show.externalId, season);
    } catch (err) {
      log.warn(`${show.title} season ${season}: metadata lookup failed (${errorMessage(err)}); searching whole season`);
      return { season, mode: 'normal' };
    }
    if (!details) {
      log.debug(`${show.title} season ${season}: no metadata; searching whole season`);
      return { season, mode: 'normal' };
    }

    const { totalEpisodeCount } = details;
    let { airedEpisodeCount } = details;
    if (totalEpisodeCount === airedEpisodeCount) return { season, mode: 'normal' };

    if (this.checkNextEpisode && (await this.nextEpisodeAired(show, season, airedEpisodeCount))) {
      airedEpisodeCount += 1;
    }

    const record: DiscrepancyRecord = {
      showTitle: show.title,
      externalShowId: show.externalId,
      ...(show.requestId !== undefined ? { requestId: show.requestId } : {}),
      seasonNumber: season,
      totalEpisodeCount,
      airedEpisodeCount,
      timestamp: this.now().toISOString(),
      failedEpisodeLabels: episodeLabels(airedEpisodeCount),
    };
    await this.store.put(record);
    log.info(`${show.title} season ${season}: ${airedEpisodeCount}/${totalEpisodeCount} episodes aired; searching episodes`);
    return { season, mode: 'discrepant', record };
  }

  private async nextEpisodeAired(show: TrackedShow, season: number, airedCount: number): Promise<boolean> {
    try {
      return await this.metadata.hasNextEpisodeAired(show.externalId, season, airedCount);
    } catch (err) {
      log.debug(`${show.title} season ${season}: next-episode check failed (${errorMessage(err)})`);
      return false;
    }
  }
}
