/**
 * Trakt API client: season episode counts, next-episode air checks and
 * TMDB -> IMDb lookups. Read-only.
 */

import { z } from 'zod';

import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { MediaKind, MetadataSource, SeasonDetails } from '../shared/types.js';

const log = createLogger('trakt');

const DEFAULT_TIMEOUT_MS = 15_000;
const CACHE_TTL_MS = 10 * 60_000;

const seasonsSchema = z.array(
  z.object({
    number: z.number().int(),
    episode_count: z.number().int().nullish(),
    aired_episodes: z.number().int().nullish(),
  }),
);
type TraktSeason = z.infer<typeof seasonsSchema>[number];

const episodeSchema = z.object({
  season: z.number().int(),
  number: z.number().int(),
  first_aired: z.string().nullish(),
});

const mediaInfoSchema = z.object({
  title: z.string(),
  year: z.number().int().nullish(),
  ids: z.object({ imdb: z.string().nullish(), tmdb: z.number().int().nullish() }),
});

const searchSchema = z.array(
  z.object({
    type: z.string(),
    movie: mediaInfoSchema.optional(),
    show: mediaInfoSchema.optional(),
  }),
);

export interface TitleInfo {
  imdbId: string;
  title: string;
  year?: number;
}

export interface TitleLookup {
  lookupByTmdb(tmdbId: number, kind: MediaKind): Promise<TitleInfo | null>;
}

export class TraktHttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
  ) {
    super(`Trakt request failed ${status}: ${url}`);
    this.name = 'TraktHttpError';
  }
}

interface CacheEntry {
  data: TraktSeason[];
  expiresAt: number;
}

export class TraktClient implements MetadataSource, TitleLookup {
  private readonly baseUrl: string;
  private readonly clientId: string;
  private readonly seasonCache = new Map<string, CacheEntry>();
  private readonly now: () => Date;

  constructor(opts: { clientId: string; baseUrl?: string; now?: () => Date }) {
    this.baseUrl = (opts.baseUrl ?? 'https://api.trakt.tv').replace(/\/$/, '');
    this.clientId = opts.clientId;
    this.now = opts.now ?? (() => new Date());
    if (!this.clientId) throw new Error('Trakt client id missing. Set trakt.clientId or TRAKT_CLIENT_ID.');
  }

  private async request<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, timeoutMs = DEFAULT_TIMEOUT_MS): Promise<T> {
    const url = `${this.baseUrl}${endpoint}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetch(url, {
        headers: {
          'Content-Type': 'application/json',
          'trakt-api-version': '2',
          'trakt-api-key': this.clientId,
        },
        signal: controller.signal,
      });
      if (!res.ok) throw new TraktHttpError(res.status, url);
      return schema.parse(await res.json());
    } finally {
      clearTimeout(timer);
    }
  }

  private async seasons(showId: string): Promise<TraktSeason[]> {
    const cached = this.seasonCache.get(showId);
    if (cached && cached.expiresAt > Date.now()) return cached.data;
    const data = await this.request(`/shows/${encodeURIComponent(showId)}/seasons?extended=full`, seasonsSchema);
    this.seasonCache.set(showId, { data, expiresAt: Date.now() + CACHE_TTL_MS });
    return data;
  }

  async getSeasonDetails(showId: string, season: number): Promise<SeasonDetails | null> {
    const entry = (await this.seasons(showId)).find((s) => s.number === season);
    if (!entry || entry.episode_count == null || entry.aired_episodes == null) {
      log.debug(`no episode counts for ${showId} season ${season}`);
      return null;
    }
    return { totalEpisodeCount: entry.episode_count, airedEpisodeCount: entry.aired_episodes };
  }

  async hasNextEpisodeAired(showId: string, season: number, airedCount: number): Promise<boolean> {
    const next = airedCount + 1;
    try {
      const episode = await this.request(
        `/shows/${encodeURIComponent(showId)}/seasons/${season}/episodes/${next}?extended=full`,
        episodeSchema,
      );
      if (!episode.first_aired) return false;
      const airedAt = Date.parse(episode.first_aired);
      return Number.isFinite(airedAt) && airedAt <= this.now().getTime();
    } catch (err) {
      if (err instanceof TraktHttpError && err.status === 404) return false;
      log.warn(`next-episode check for ${showId} S${season}E${next} failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async lookupByTmdb(tmdbId: number, kind: MediaKind): Promise<TitleInfo | null> {
    const type = kind === 'movie' ? 'movie' : 'show';
    const results = await this.request(`/search/tmdb/${tmdbId}?type=${type}`, searchSchema);
    for (const hit of results) {
      const info = kind === 'movie' ? hit.movie : hit.show;
      if (info?.ids.imdb) {
        return { imdbId: info.ids.imdb, title: info.title, ...(info.year != null ? { year: info.year } : {}) };
      }
    }
    log.warn(`no IMDb id on Trakt for TMDB ${type} ${tmdbId}`);
    return null;
  }
}
