/**
 * Overseerr request feed.
 * Lists approved requests that are not yet available and, on request,
 * marks media available once every season has been resolved.
 */

import { z } from 'zod';

import type { TitleInfo, TitleLookup } from '../metadata/trakt.js';
import { errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { FeedRequest, MediaKind, RequestFeed, WorkItem } from '../shared/types.js';

const log = createLogger('overseerr');

const DEFAULT_TIMEOUT_MS = 15_000;

/** Overseerr media status codes. */
export const MediaStatus = {
  UNKNOWN: 1,
  PENDING: 2,
  PROCESSING: 3,
  PARTIALLY_AVAILABLE: 4,
  AVAILABLE: 5,
} as const;

const DONE: ReadonlySet<number> = new Set([MediaStatus.PARTIALLY_AVAILABLE, MediaStatus.AVAILABLE]);

const requestSchema = z.object({
  id: z.number().int(),
  type: z.enum(['movie', 'tv']),
  media: z.object({
    id: z.number().int(),
    tmdbId: z.number().int(),
    status: z.number().int(),
  }),
  seasons: z
    .array(z.object({ seasonNumber: z.number().int(), status: z.number().int() }))
    .default([]),
});
type OverseerrRequest = z.infer<typeof requestSchema>;

const requestPageSchema = z.object({
  results: z.array(requestSchema),
});

const mediaSchema = z.object({
  id: z.number().int(),
  tmdbId: z.number().int(),
  status: z.number().int().optional(),
});

interface RequestOptions {
  method?: string;
  body?: unknown;
  query?: Record<string, string | number | undefined>;
}

export class OverseerrClient implements RequestFeed {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly markEnabled: boolean;

  constructor(
    opts: { url: string; apiKey: string; markAvailable?: boolean },
    private readonly titles: TitleLookup,
  ) {
    this.baseUrl = opts.url.replace(/\/$/, '');
    if (!opts.apiKey) throw new Error('Overseerr API key missing. Set overseerr.apiKey or OVERSEERR_API_KEY.');
    this.apiKey = opts.apiKey;
    this.markEnabled = opts.markAvailable ?? false;
  }

  private async request<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, opts: RequestOptions = {}): Promise<T> {
    const url = new URL(`${this.baseUrl}/api/v1${endpoint}`);
    if (opts.query) {
      Object.entries(opts.query).forEach(([k, v]) => {
        if (v !== undefined) url.searchParams.append(k, String(v));
      });
    }
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);
    try {
      const res = await fetch(url.toString(), {
        method: opts.method ?? 'GET',
        headers: {
          'X-Api-Key': this.apiKey,
          'Content-Type': 'application/json',
        },
        body: opts.body !== undefined ? JSON.stringify(opts.body) : undefined,
        signal: controller.signal,
      });
      if (!res.ok) {
        const text = await res.text();
        throw new Error(`Overseerr request failed ${res.status}: ${text}`);
      }
      return schema.parse(await res.json());
    } catch (err) {
      throw new Error(`Overseerr request to ${url.toString()} failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }

  async fetchPending(): Promise<FeedRequest[]> {
    const page = await this.request('/request', requestPageSchema, {
      query: { take: 500, filter: 'approved', sort: 'added' },
    });
    log.info(`${page.results.length} approved requests`);

    const out: FeedRequest[] = [];
    for (const req of page.results) {
      if (DONE.has(req.media.status)) continue;
      const resolved = await this.toFeedRequest(req);
      if (resolved) out.push(resolved);
    }
    return out;
  }

  private async toFeedRequest(req: OverseerrRequest): Promise<FeedRequest | null> {
    const mediaKind: MediaKind = req.type === 'movie' ? 'movie' : 'show';
    let info: TitleInfo | null;
    try {
      info = await this.titles.lookupByTmdb(req.media.tmdbId, mediaKind);
    } catch (err) {
      log.warn(`request ${req.id}: title lookup for TMDB ${req.media.tmdbId} failed (${errorMessage(err)})`);
      return null;
    }
    if (!info) return null;

    return {
      requestId: req.id,
      mediaId: req.media.id,
      tmdbId: req.media.tmdbId,
      externalId: info.imdbId,
      title: info.title,
      ...(info.year !== undefined ? { year: info.year } : {}),
      mediaKind,
      pendingSeasons: mediaKind === 'show' ? req.seasons.filter((s) => !DONE.has(s.status)).map((s) => s.seasonNumber) : [],
    };
  }

  async markAvailable(item: WorkItem): Promise<boolean> {
    if (!this.markEnabled) return false;
    if (item.mediaId === undefined) {
      log.warn(`${item.title}: no media id; cannot mark available`);
      return false;
    }
    const media = await this.request(`/media/${item.mediaId}/available`, mediaSchema, {
      method: 'POST',
      body: { is4k: false },
    });
    if (item.tmdbId !== undefined && media.tmdbId !== item.tmdbId) {
      log.warn(`${item.title}: Overseerr answered for TMDB ${media.tmdbId}, expected ${item.tmdbId}`);
      return false;
    }
    log.success(`${item.title}: marked available in Overseerr`);
    return true;
  }
}
