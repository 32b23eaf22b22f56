export type MediaKind = 'movie' | 'show';

/** One pending request, materialized per cycle from the request feed. */
export interface WorkItem {
  readonly requestId: number;
  /** IMDb id; addresses both the catalog surface and the metadata service. */
  readonly externalId: string;
  /** Display title, usually "Title (YYYY)". */
  readonly title: string;
  readonly mediaKind: MediaKind;
  /** Ascending, de-duplicated. Empty for movies. */
  readonly pendingSeasons: readonly number[];
  readonly mediaId?: number;
  readonly tmdbId?: number;
}

/** A request as delivered by the feed, before the work-item invariant is applied. */
export interface FeedRequest {
  requestId: number;
  mediaId?: number;
  tmdbId?: number;
  externalId: string;
  title: string;
  year?: number;
  mediaKind: MediaKind;
  pendingSeasons: number[];
}

export interface RequestFeed {
  fetchPending(): Promise<FeedRequest[]>;
  markAvailable?(item: WorkItem): Promise<boolean>;
}

export interface SeasonDetails {
  totalEpisodeCount: number;
  airedEpisodeCount: number;
}

export interface MetadataSource {
  getSeasonDetails(showId: string, season: number): Promise<SeasonDetails | null>;
  hasNextEpisodeAired(showId: string, season: number, airedCount: number): Promise<boolean>;
}
