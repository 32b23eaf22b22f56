/**
 * Search cascade: walks the tier list for one unit of work until the catalog
 * shows a qualifying cached match, or every tier (and, for seasons, the
 * with-extras pass) has been tried.
 *
 *   idle -> searching(tier) -> found | exhausted
 */

import type { ActionScope, CatalogSurface, ResultCandidate } from '../capability/types.js';
import { evaluateCandidate, MatchRequest, PackagingRequirement } from '../matching/evaluator.js';
import { formatEpisodeId } from '../matching/normalizer.js';
import { SurfaceMissError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { renderQuery, SearchUnit, TierSet } from './tiers.js';

const log = createLogger('cascade');

export interface MatchingSettings {
  /** Cascade path. */
  titleThreshold: number;
  /** Pre-existing "fully cached" indicator path. */
  indicatorThreshold: number;
  yearTolerance: number;
}

export interface CascadeTimings {
  settleMs: number;
  indicatorTimeoutMs: number;
  actionTimeoutMs: number;
  instantFetchSettleMs: number;
  extrasActionTimeoutMs: number;
}

export interface CascadeOptions {
  tiers: TierSet;
  matching: MatchingSettings;
  timings: CascadeTimings;
  /** Run the with-extras pass for seasons once all tiers are exhausted. */
  extrasFallback?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

export type CascadePass = 'primary' | 'extras';

export type CascadeState =
  | { status: 'idle' }
  | { status: 'searching'; tierIndex: number; pass: CascadePass }
  | { status: 'found'; tierIndex: number; pass: CascadePass }
  | { status: 'exhausted' };

export type CascadeSignal = 'indicator' | 'instant-fetch' | 'extras-action' | 'none' | 'miss';

export interface CascadeAttempt {
  pass: CascadePass;
  tier: string;
  pattern: string;
  query: string;
  signal: CascadeSignal;
}

export interface CascadeOutcome {
  state: 'found' | 'exhausted';
  via?: Exclude<CascadeSignal, 'none' | 'miss'>;
  tier?: string;
  query?: string;
  matchedText?: string;
  attempts: CascadeAttempt[];
}

interface AttemptResult {
  signal: CascadeSignal;
  candidate?: ResultCandidate;
}

const BASE_PACKAGING: Record<SearchUnit['kind'], PackagingRequirement> = {
  movie: { unit: 'any', extras: 'exclude' },
  season: { unit: 'complete', extras: 'exclude' },
  episode: { unit: 'any', extras: 'exclude' },
};

const EXTRAS_PACKAGING: PackagingRequirement = { unit: 'complete', extras: 'require' };

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function scopeFor(unit: SearchUnit): ActionScope {
  return unit.kind === 'season' ? 'whole-season' : 'single-unit';
}

export function matchRequestFor(unit: SearchUnit, packaging: PackagingRequirement = BASE_PACKAGING[unit.kind]): MatchRequest {
  return {
    title: unit.title,
    year: unit.year,
    isShow: unit.kind !== 'movie',
    seasons: unit.season !== undefined ? [unit.season] : undefined,
    episodeId:
      unit.kind === 'episode' && unit.season !== undefined && unit.episode !== undefined
        ? formatEpisodeId(unit.season, unit.episode)
        : undefined,
    packaging,
  };
}

function unitLabel(unit: SearchUnit): string {
  if (unit.kind === 'episode' && unit.season !== undefined && unit.episode !== undefined) {
    return `${unit.title} ${formatEpisodeId(unit.season, unit.episode)}`;
  }
  if (unit.kind === 'season') return `${unit.title} season ${unit.season}`;
  return unit.title;
}

export class CascadeController {
  private current: CascadeState = { status: 'idle' };
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly surface: CatalogSurface,
    private readonly options: CascadeOptions,
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  get state(): CascadeState {
    return this.current;
  }

  private transition(next: CascadeState): void {
    this.current = next;
    log.debug(`state -> ${next.status}${'tierIndex' in next ? `(${next.tierIndex}, ${next.pass})` : ''}`);
  }

  async resolve(unit: SearchUnit): Promise<CascadeOutcome> {
    const tiers = this.options.tiers[unit.kind];
    const attempts: CascadeAttempt[] = [];
    const label = unitLabel(unit);
    this.transition({ status: 'idle' });

    try {
      await this.surface.navigate(unit.url);
    } catch (err) {
      if (!(err instanceof SurfaceMissError)) throw err;
      log.warn(`${label}: catalog page did not load (${err.message})`);
      this.transition({ status: 'exhausted' });
      return { state: 'exhausted', attempts };
    }

    for (let i = 0; i < tiers.length; i++) {
      const tier = tiers[i];
      this.transition({ status: 'searching', tierIndex: i, pass: 'primary' });
      for (const pattern of tier.patterns) {
        const query = renderQuery(pattern, unit);
        const result = await this.attemptPrimary(unit, query);
        attempts.push({ pass: 'primary', tier: tier.name, pattern, query, signal: result.signal });
        if (result.candidate) {
          this.transition({ status: 'found', tierIndex: i, pass: 'primary' });
          log.success(`${label}: matched "${result.candidate.displayText}" via ${result.signal} (tier ${tier.name}, query "${query}")`);
          return {
            state: 'found',
            via: result.signal === 'instant-fetch' ? 'instant-fetch' : 'indicator',
            tier: tier.name,
            query,
            matchedText: result.candidate.displayText,
            attempts,
          };
        }
      }
    }

    if (unit.kind === 'season' && this.options.extrasFallback) {
      const found = await this.extrasPass(unit, attempts);
      if (found) return found;
    }

    this.transition({ status: 'exhausted' });
    log.info(`${label}: no qualifying match after ${attempts.length} queries`);
    return { state: 'exhausted', attempts };
  }

  /** Submit one query, look for a cached match, then try a single instant-fetch click. */
  private async attemptPrimary(unit: SearchUnit, query: string): Promise<AttemptResult> {
    const { timings } = this.options;
    try {
      await this.surface.submitQuery(query);
      await this.sleep(timings.settleMs);

      const cached = await this.findCached(unit);
      if (cached) return { signal: 'indicator', candidate: cached };

      const [target] = await this.actionTargets(unit, BASE_PACKAGING[unit.kind]);
      if (!target) return { signal: 'none' };

      const clicked = await this.surface.clickActionControl(target.index, scopeFor(unit), timings.actionTimeoutMs);
      if (!clicked) return { signal: 'none' };
      await this.sleep(timings.instantFetchSettleMs);

      const confirmed = await this.findCached(unit);
      return confirmed ? { signal: 'instant-fetch', candidate: confirmed } : { signal: 'none' };
    } catch (err) {
      if (!(err instanceof SurfaceMissError)) throw err;
      log.debug(`query "${query}": ${err.message}`);
      return { signal: 'miss' };
    }
  }

  private async extrasPass(unit: SearchUnit, attempts: CascadeAttempt[]): Promise<CascadeOutcome | undefined> {
    const tiers = this.options.tiers[unit.kind];
    const { timings } = this.options;
    const label = unitLabel(unit);

    let enabled = false;
    try {
      enabled = await this.surface.enablePackagingFilter();
    } catch (err) {
      if (!(err instanceof SurfaceMissError)) throw err;
    }
    if (!enabled) {
      log.warn(`${label}: packaging filter could not be enabled; skipping with-extras pass`);
      return undefined;
    }
    log.info(`${label}: retrying with extras`);

    for (let i = 0; i < tiers.length; i++) {
      const tier = tiers[i];
      this.transition({ status: 'searching', tierIndex: i, pass: 'extras' });
      for (const pattern of tier.patterns) {
        const query = renderQuery(pattern, unit);
        let signal: CascadeSignal = 'none';
        let matched: ResultCandidate | undefined;
        try {
          await this.surface.submitQuery(query);
          await this.sleep(timings.settleMs);
          for (const target of await this.actionTargets(unit, EXTRAS_PACKAGING)) {
            if (await this.surface.clickActionControl(target.index, 'whole-season', timings.extrasActionTimeoutMs)) {
              signal = 'extras-action';
              matched = target;
              break;
            }
            log.debug(`${label}: action on result #${target.index} did not take; trying the next one`);
          }
        } catch (err) {
          if (!(err instanceof SurfaceMissError)) throw err;
          signal = 'miss';
        }
        attempts.push({ pass: 'extras', tier: tier.name, pattern, query, signal });
        if (matched) {
          this.transition({ status: 'found', tierIndex: i, pass: 'extras' });
          log.success(`${label}: fetched "${matched.displayText}" with extras (tier ${tier.name})`);
          return {
            state: 'found',
            via: 'extras-action',
            tier: tier.name,
            query,
            matchedText: matched.displayText,
            attempts,
          };
        }
      }
    }
    return undefined;
  }

  private async findCached(unit: SearchUnit): Promise<ResultCandidate | undefined> {
    const { timings, matching } = this.options;
    if (!(await this.surface.hasQualifyingIndicator(timings.indicatorTimeoutMs))) return undefined;
    const request = matchRequestFor(unit);
    const candidates = await this.surface.listResultCandidates();
    return candidates.find(
      (c) =>
        c.fullyAvailable &&
        evaluateCandidate(c, request, { threshold: matching.indicatorThreshold, yearTolerance: matching.yearTolerance }).accepted,
    );
  }

  /** Actionable, accepted candidates in page order. */
  private async actionTargets(unit: SearchUnit, packaging: PackagingRequirement): Promise<ResultCandidate[]> {
    const { matching } = this.options;
    const request = matchRequestFor(unit, packaging);
    const candidates = await this.surface.listResultCandidates();
    return candidates.filter(
      (c) =>
        c.actionable &&
        evaluateCandidate(c, request, { threshold: matching.titleThreshold, yearTolerance: matching.yearTolerance }).accepted,
    );
  }
}
