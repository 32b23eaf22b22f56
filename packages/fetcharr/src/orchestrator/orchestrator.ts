/**
 * Runs one resolution cycle: movies first, then shows season by season.
 * Normal seasons go through the cascade as a whole, discrepant seasons
 * episode by episode.
 */

import type { CatalogSurface } from '../capability/types.js';
import type { CascadeController, CascadeOutcome } from '../cascade/controller.js';
import { resolveEpisodes } from '../cascade/episodes.js';
import type { SearchUnit } from '../cascade/tiers.js';
import type { DiscrepancyTracker, SeasonClassification } from '../discrepancy/tracker.js';
import { extractYear } from '../matching/normalizer.js';
import { errorMessage, SurfaceFaultError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { MediaKind, WorkItem } from '../shared/types.js';

const log = createLogger('orchestrator');

export type UnitStatus = 'found' | 'exhausted' | 'failed' | 'skipped';

export interface EpisodeReport {
  label: string;
  status: UnitStatus;
}

export interface UnitReport {
  season?: number;
  mode?: 'normal' | 'discrepant';
  status: UnitStatus;
  tier?: string;
  query?: string;
  via?: CascadeOutcome['via'];
  episodes?: EpisodeReport[];
  error?: string;
}

export interface ItemReport {
  requestId: number;
  title: string;
  mediaKind: MediaKind;
  complete: boolean;
  units: UnitReport[];
}

export interface CycleReport {
  startedAt: string;
  completedAt: string;
  aborted: boolean;
  items: ItemReport[];
  summary: {
    items: number;
    complete: number;
    incomplete: number;
    unitsFound: number;
    unitsFailed: number;
  };
}

export interface OrchestratorDeps {
  surface: CatalogSurface;
  controller: CascadeController;
  tracker: DiscrepancyTracker;
  catalogBaseUrl: string;
  /** Called after a session fault when the surface reports itself unusable. */
  reestablish?: () => Promise<boolean>;
}

export function catalogUrl(baseUrl: string, item: WorkItem, season?: number): string {
  const base = baseUrl.replace(/\/$/, '');
  return item.mediaKind === 'movie' ? `${base}/movie/${item.externalId}` : `${base}/show/${item.externalId}/${season}`;
}

function fromOutcome(outcome: CascadeOutcome): Pick<UnitReport, 'status' | 'tier' | 'query' | 'via'> {
  return outcome.state === 'found'
    ? { status: 'found', tier: outcome.tier, query: outcome.query, via: outcome.via }
    : { status: 'exhausted' };
}

export class ResolutionOrchestrator {
  private faulted = false;
  private aborted = false;

  constructor(private readonly deps: OrchestratorDeps) {}

  async runCycle(items: readonly WorkItem[]): Promise<CycleReport> {
    const startedAt = new Date().toISOString();
    this.faulted = false;
    this.aborted = false;

    const ordered = [
      ...items.filter((i) => i.mediaKind === 'movie'),
      ...items.filter((i) => i.mediaKind === 'show'),
    ];
    log.info(`cycle: ${ordered.length} items (${ordered.filter((i) => i.mediaKind === 'movie').length} movies)`);

    const reports: ItemReport[] = [];
    for (const item of ordered) {
      const units = item.mediaKind === 'movie' ? await this.resolveMovie(item) : await this.resolveShow(item);
      const complete = units.length > 0 && units.every((u) => u.status === 'found');
      reports.push({ requestId: item.requestId, title: item.title, mediaKind: item.mediaKind, complete, units });
      if (complete) log.success(`${item.title}: complete`);
      else log.info(`${item.title}: incomplete, will retry next cycle`);
    }

    const allUnits = reports.flatMap((r) => r.units);
    const complete = reports.filter((r) => r.complete).length;
    return {
      startedAt,
      completedAt: new Date().toISOString(),
      aborted: this.aborted,
      items: reports,
      summary: {
        items: reports.length,
        complete,
        incomplete: reports.length - complete,
        unitsFound: allUnits.filter((u) => u.status === 'found').length,
        unitsFailed: allUnits.filter((u) => u.status === 'failed').length,
      },
    };
  }

  private async resolveMovie(item: WorkItem): Promise<UnitReport[]> {
    const unit: SearchUnit = {
      kind: 'movie',
      title: item.title,
      year: extractYear(item.title),
      url: catalogUrl(this.deps.catalogBaseUrl, item),
    };
    return [await this.guard({}, async () => fromOutcome(await this.deps.controller.resolve(unit)))];
  }

  private async resolveShow(item: WorkItem): Promise<UnitReport[]> {
    let classes: SeasonClassification[];
    try {
      classes = await this.deps.tracker.classifySeasons(
        { title: item.title, externalId: item.externalId, requestId: item.requestId },
        item.pendingSeasons,
      );
    } catch (err) {
      log.error(`${item.title}: could not classify seasons (${errorMessage(err)})`);
      return item.pendingSeasons.map((season): UnitReport => ({ season, status: 'failed', error: errorMessage(err) }));
    }

    const bySeason = (a: SeasonClassification, b: SeasonClassification) => a.season - b.season;
    const normal = classes.filter((c) => c.mode === 'normal').sort(bySeason);
    const discrepant = classes.filter((c) => c.mode === 'discrepant').sort(bySeason);
    const seasonUnit = (season: number): SearchUnit => ({
      kind: 'season',
      title: item.title,
      season,
      url: catalogUrl(this.deps.catalogBaseUrl, item, season),
    });

    const units: UnitReport[] = [];
    for (const c of normal) {
      units.push(
        await this.guard({ season: c.season, mode: 'normal' }, async () =>
          fromOutcome(await this.deps.controller.resolve(seasonUnit(c.season))),
        ),
      );
    }
    for (const c of discrepant) {
      if (c.mode !== 'discrepant') continue;
      const { record } = c;
      units.push(
        await this.guard({ season: c.season, mode: 'discrepant' }, async () => {
          const result = await resolveEpisodes(this.deps.controller, seasonUnit(c.season), record);
          return {
            status: result.found ? 'found' : 'exhausted',
            episodes: result.episodes.map((e) => ({ label: e.label, status: e.outcome.state })),
          };
        }),
      );
    }
    return units;
  }

  /**
   * Runs one unit. A session fault fails only that unit; the next unit first
   * checks the surface and, failing that, asks the caller to re-establish it.
   */
  private async guard(base: Pick<UnitReport, 'season' | 'mode'>, run: () => Promise<Omit<UnitReport, 'season' | 'mode'>>): Promise<UnitReport> {
    if (this.aborted) return { ...base, status: 'skipped' };
    if (this.faulted && !(await this.revalidate())) {
      this.aborted = true;
      log.error('catalog session could not be re-established; aborting cycle');
      return { ...base, status: 'skipped' };
    }

    try {
      return { ...base, ...(await run()) };
    } catch (err) {
      if (err instanceof SurfaceFaultError) this.faulted = true;
      log.error(`unit${base.season !== undefined ? ` season ${base.season}` : ''} failed: ${errorMessage(err)}`);
      return { ...base, status: 'failed', error: errorMessage(err) };
    }
  }

  private async revalidate(): Promise<boolean> {
    if (await this.deps.surface.isUsable()) {
      this.faulted = false;
      return true;
    }
    if (!this.deps.reestablish) return false;
    try {
      const ok = await this.deps.reestablish();
      if (ok) this.faulted = false;
      return ok;
    } catch (err) {
      log.error(`re-establishing catalog session failed: ${errorMessage(err)}`);
      return false;
    }
  }
}
