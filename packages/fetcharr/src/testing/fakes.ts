import type { LibraryStats, LibraryStatsSource } from '../capability/library.js';
import type { ActionScope, CatalogSurface, ResultCandidate } from '../capability/types.js';
import type { DiscrepancyRecord, DiscrepancyStore } from '../discrepancy/types.js';
import { SurfaceFaultError, SurfaceMissError } from '../shared/errors.js';
import type { FeedRequest, MetadataSource, RequestFeed, SeasonDetails, WorkItem } from '../shared/types.js';

export interface PageContext {
  url: string;
  query: string;
  extrasFilter: boolean;
}

export type ResultScript = (ctx: PageContext) => Array<Partial<ResultCandidate> & { displayText: string }>;

export interface FakeSurfaceOptions {
  packagingFilter?: boolean;
  /** Whether a click on an actionable candidate succeeds. */
  clickSucceeds?: boolean;
  /** Result indices whose action control never takes. */
  failClicks?: number[];
  /** A successful click flips the candidate to fully available. */
  cacheOnClick?: boolean;
  missQueries?: string[];
  faultQueries?: string[];
  faultUrls?: string[];
  /** What libraryStats() yields; absent means the session is closed. */
  library?: LibraryStats | Error;
}

/** Scripted in-memory catalog page. Records every call in `calls`. */
export class FakeSurface implements CatalogSurface, LibraryStatsSource {
  readonly calls: string[] = [];
  usable = true;
  library: LibraryStats | Error | undefined;
  private ctx: PageContext = { url: '', query: '', extrasFilter: false };
  private shown: ResultCandidate[] = [];

  constructor(
    private readonly script: ResultScript = () => [],
    private readonly opts: FakeSurfaceOptions = {},
  ) {
    this.library = opts.library;
  }

  async navigate(url: string): Promise<void> {
    this.calls.push(`navigate ${url}`);
    if (this.opts.faultUrls?.includes(url)) {
      this.usable = false;
      throw new SurfaceFaultError(`target closed while loading ${url}`);
    }
    this.ctx = { url, query: '', extrasFilter: false };
    this.shown = [];
  }

  async submitQuery(text: string): Promise<void> {
    this.calls.push(`query ${text}`);
    if (this.opts.faultQueries?.includes(text)) throw new SurfaceFaultError('session lost');
    if (this.opts.missQueries?.includes(text)) throw new SurfaceMissError(`query box not found for "${text}"`);
    this.ctx = { ...this.ctx, query: text };
    this.shown = this.script(this.ctx).map((c, i) => ({
      index: c.index ?? i,
      displayText: c.displayText,
      labels: c.labels ?? [],
      fullyAvailable: c.fullyAvailable ?? false,
      actionable: c.actionable ?? false,
    }));
  }

  async hasQualifyingIndicator(_timeoutMs: number): Promise<boolean> {
    return this.shown.some((c) => c.fullyAvailable);
  }

  async clickActionControl(index: number, scope: ActionScope, _timeoutMs: number): Promise<boolean> {
    this.calls.push(`click ${index} ${scope}`);
    const target = this.shown.find((c) => c.index === index);
    if (!target || !target.actionable || this.opts.clickSucceeds === false) return false;
    if (this.opts.failClicks?.includes(index)) return false;
    if (this.opts.cacheOnClick) target.fullyAvailable = true;
    return true;
  }

  async enablePackagingFilter(): Promise<boolean> {
    this.calls.push('packaging-filter');
    const enabled = this.opts.packagingFilter ?? true;
    this.ctx = { ...this.ctx, extrasFilter: enabled };
    return enabled;
  }

  async listResultCandidates(): Promise<ResultCandidate[]> {
    return this.shown.map((c) => ({ ...c, labels: [...c.labels] }));
  }

  async isUsable(): Promise<boolean> {
    return this.usable;
  }

  async libraryStats(): Promise<LibraryStats | null> {
    this.calls.push('library-stats');
    if (this.library instanceof Error) throw this.library;
    return this.library ?? null;
  }

  queries(): string[] {
    return this.calls.filter((c) => c.startsWith('query ')).map((c) => c.slice('query '.length));
  }
}

export class FakeMetadata implements MetadataSource {
  readonly calls: string[] = [];

  constructor(
    private readonly seasons: Record<string, SeasonDetails | Error | null> = {},
    private readonly nextAired: Record<string, boolean> = {},
  ) {}

  async getSeasonDetails(showId: string, season: number): Promise<SeasonDetails | null> {
    this.calls.push(`season ${showId}:${season}`);
    const entry = this.seasons[`${showId}:${season}`];
    if (entry instanceof Error) throw entry;
    return entry ?? null;
  }

  async hasNextEpisodeAired(showId: string, season: number, airedCount: number): Promise<boolean> {
    this.calls.push(`next ${showId}:${season}:${airedCount + 1}`);
    return this.nextAired[`${showId}:${season}`] ?? false;
  }
}

export class MemoryDiscrepancyStore implements DiscrepancyStore {
  private readonly records = new Map<string, DiscrepancyRecord>();
  puts = 0;

  constructor(initial: DiscrepancyRecord[] = []) {
    for (const r of initial) this.records.set(`${r.showTitle}::${r.seasonNumber}`, r);
  }

  async get(showTitle: string, seasonNumber: number): Promise<DiscrepancyRecord | undefined> {
    return this.records.get(`${showTitle}::${seasonNumber}`);
  }

  async put(record: DiscrepancyRecord): Promise<void> {
    this.puts++;
    this.records.set(`${record.showTitle}::${record.seasonNumber}`, record);
  }

  async list(): Promise<DiscrepancyRecord[]> {
    return [...this.records.values()];
  }
}

export class FakeFeed implements RequestFeed {
  readonly marked: number[] = [];

  constructor(private readonly requests: FeedRequest[] = []) {}

  async fetchPending(): Promise<FeedRequest[]> {
    return this.requests;
  }

  async markAvailable(item: WorkItem): Promise<boolean> {
    this.marked.push(item.requestId);
    return true;
  }
}
