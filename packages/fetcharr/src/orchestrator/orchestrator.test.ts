import { describe, expect, it } from 'vitest';

import { CascadeController, CascadeOptions } from '../cascade/controller.js';
import { DEFAULT_TIERS } from '../cascade/tiers.js';
import { DiscrepancyTracker } from '../discrepancy/tracker.js';
import { FakeMetadata, FakeSurface, MemoryDiscrepancyStore, ResultScript } from '../testing/fakes.js';
import { catalogUrl, ResolutionOrchestrator } from './orchestrator.js';
import { createWorkItem } from './workItems.js';

const BASE = 'https://catalog.test';

const options: CascadeOptions = {
  tiers: DEFAULT_TIERS,
  matching: { titleThreshold: 75, indicatorThreshold: 65, yearTolerance: 1 },
  timings: { settleMs: 0, indicatorTimeoutMs: 0, actionTimeoutMs: 0, instantFetchSettleMs: 0, extrasActionTimeoutMs: 0 },
  extrasFallback: false,
  sleep: async () => {},
};

const inception = createWorkItem({
  requestId: 1, externalId: 'tt1375666', title: 'Inception', year: 2010, mediaKind: 'movie', pendingSeasons: [],
});
const heat = createWorkItem({
  requestId: 3, externalId: 'tt0113277', title: 'Heat', year: 1995, mediaKind: 'movie', pendingSeasons: [],
});
const dark = createWorkItem({
  requestId: 2, externalId: 'tt5753856', title: 'Dark', year: 2017, mediaKind: 'show', pendingSeasons: [2, 1],
});

// Every first-tier query is answered with a cached release named after the query.
const cachedEverywhere: ResultScript = ({ url, query }) => {
  if (url.endsWith('/movie/tt1375666') && query === 'Inception 2010') {
    return [{ displayText: 'Inception 2010 1080p', fullyAvailable: true }];
  }
  if (url.endsWith('/movie/tt0113277') && query === 'Heat 1995') {
    return [{ displayText: 'Heat 1995 1080p', fullyAvailable: true }];
  }
  if (url.includes('/show/tt5753856/') && /^S0\d(E0\d)?$/.test(query)) {
    return [{ displayText: `Dark ${query} 1080p`, fullyAvailable: true }];
  }
  return [];
};

function setup(surface: FakeSurface, metadata = new FakeMetadata(), reestablish?: () => Promise<boolean>) {
  const tracker = new DiscrepancyTracker(new MemoryDiscrepancyStore(), metadata, { checkNextEpisode: false });
  return new ResolutionOrchestrator({
    surface,
    controller: new CascadeController(surface, options),
    tracker,
    catalogBaseUrl: BASE,
    reestablish,
  });
}

const navigations = (surface: FakeSurface) =>
  surface.calls.filter((c) => c.startsWith('navigate ')).map((c) => c.slice('navigate '.length));

describe('ResolutionOrchestrator', () => {
  it('resolves movies before shows and seasons in ascending order', async () => {
    const surface = new FakeSurface(cachedEverywhere);

    const report = await setup(surface).runCycle([dark, inception]);

    expect(navigations(surface)).toEqual([
      `${BASE}/movie/tt1375666`,
      `${BASE}/show/tt5753856/1`,
      `${BASE}/show/tt5753856/2`,
    ]);
    expect(report.items.map((i) => [i.title, i.complete])).toEqual([
      ['Inception (2010)', true],
      ['Dark (2017)', true],
    ]);
    expect(report.summary).toEqual({ items: 2, complete: 2, incomplete: 0, unitsFound: 3, unitsFailed: 0 });
    expect(report.aborted).toBe(false);
  });

  it('searches discrepant seasons episode by episode after the normal ones', async () => {
    const surface = new FakeSurface(cachedEverywhere);
    const metadata = new FakeMetadata({ 'tt5753856:1': { totalEpisodeCount: 10, airedEpisodeCount: 2 } });

    const report = await setup(surface, metadata).runCycle([dark]);

    expect(navigations(surface)).toEqual([
      `${BASE}/show/tt5753856/2`,
      `${BASE}/show/tt5753856/1`,
      `${BASE}/show/tt5753856/1`,
    ]);
    expect(report.items[0].units).toEqual([
      { season: 2, mode: 'normal', status: 'found', tier: 'season-tag', query: 'S02', via: 'indicator' },
      {
        season: 1,
        mode: 'discrepant',
        status: 'found',
        episodes: [
          { label: 'E01', status: 'found' },
          { label: 'E02', status: 'found' },
        ],
      },
    ]);
    expect(report.items[0].complete).toBe(true);
  });

  it('marks an item incomplete when a season is exhausted', async () => {
    const script: ResultScript = (ctx) => (ctx.url.endsWith('/2') ? [] : cachedEverywhere(ctx));
    const report = await setup(new FakeSurface(script)).runCycle([dark]);

    expect(report.items[0].complete).toBe(false);
    expect(report.items[0].units.map((u) => u.status)).toEqual(['found', 'exhausted']);
    expect(report.summary.incomplete).toBe(1);
  });

  it('fails only the faulted unit when the session can be re-established', async () => {
    const surface = new FakeSurface(cachedEverywhere, { faultUrls: [`${BASE}/movie/tt1375666`] });
    let relaunches = 0;
    const reestablish = async () => {
      relaunches++;
      surface.usable = true;
      return true;
    };

    const report = await setup(surface, new FakeMetadata(), reestablish).runCycle([inception, heat]);

    expect(relaunches).toBe(1);
    expect(report.items[0].units[0]).toEqual({ status: 'failed', error: `target closed while loading ${BASE}/movie/tt1375666` });
    expect(report.items[1].complete).toBe(true);
    expect(report.aborted).toBe(false);
  });

  it('aborts the cycle when the session cannot be re-established', async () => {
    const surface = new FakeSurface(cachedEverywhere, { faultUrls: [`${BASE}/movie/tt1375666`] });

    const report = await setup(surface).runCycle([inception, heat, dark]);

    expect(report.aborted).toBe(true);
    expect(report.items.map((i) => i.units.map((u) => u.status))).toEqual([['failed'], ['skipped'], ['skipped', 'skipped']]);
    expect(navigations(surface)).toEqual([`${BASE}/movie/tt1375666`]);
  });
});

describe('catalogUrl', () => {
  it('addresses movies and show seasons', () => {
    expect(catalogUrl('https://catalog.test/', inception)).toBe('https://catalog.test/movie/tt1375666');
    expect(catalogUrl('https://catalog.test', dark, 3)).toBe('https://catalog.test/show/tt5753856/3');
  });
});
