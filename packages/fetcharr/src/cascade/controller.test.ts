import { describe, expect, it } from 'vitest';

import { SurfaceFaultError } from '../shared/errors.js';
import { FakeSurface, ResultScript } from '../testing/fakes.js';
import { CascadeController, CascadeOptions } from './controller.js';
import { DEFAULT_TIERS, SearchUnit } from './tiers.js';

const options: CascadeOptions = {
  tiers: DEFAULT_TIERS,
  matching: { titleThreshold: 75, indicatorThreshold: 65, yearTolerance: 1 },
  timings: { settleMs: 0, indicatorTimeoutMs: 0, actionTimeoutMs: 0, instantFetchSettleMs: 0, extrasActionTimeoutMs: 0 },
  extrasFallback: true,
  sleep: async () => {},
};

const movie: SearchUnit = { kind: 'movie', title: 'Inception (2010)', url: 'https://catalog.test/movie/tt1375666' };
const season: SearchUnit = { kind: 'season', title: 'Dark (2017)', season: 1, url: 'https://catalog.test/show/tt5753856/1' };

const SEASON_QUERIES = ['S01', 'Season 1', 'Season one', 'Series 1', 'Dark S01', 'Dark Season 1', ''];

describe('CascadeController', () => {
  it('stops at the first pattern that shows a cached match', async () => {
    const script: ResultScript = ({ query }) =>
      query === 'Inception' ? [{ displayText: 'Inception 2010 1080p BluRay', fullyAvailable: true }] : [];
    const surface = new FakeSurface(script);
    const controller = new CascadeController(surface, options);

    const outcome = await controller.resolve(movie);

    expect(outcome.state).toBe('found');
    expect(outcome.via).toBe('indicator');
    expect(outcome.tier).toBe('title');
    expect(outcome.matchedText).toBe('Inception 2010 1080p BluRay');
    expect(surface.queries()).toEqual(['Inception 2010', 'Inception']);
    expect(outcome.attempts.map((a) => a.signal)).toEqual(['none', 'indicator']);
    expect(controller.state).toEqual({ status: 'found', tierIndex: 1, pass: 'primary' });
  });

  it('reaches the broad tier only after every other tier came up empty', async () => {
    const script: ResultScript = ({ query }) =>
      query === '' ? [{ displayText: 'Inception 2010 2160p', fullyAvailable: true }] : [];
    const surface = new FakeSurface(script);

    const outcome = await new CascadeController(surface, options).resolve(movie);

    expect(outcome.tier).toBe('broad');
    expect(surface.queries()).toEqual(['Inception 2010', 'Inception', 'Inception', 'Inception', '']);
  });

  it('does not accept a cached release from the wrong year', async () => {
    const script: ResultScript = () => [{ displayText: 'Inception 2021 1080p', fullyAvailable: true }];
    const surface = new FakeSurface(script);
    const controller = new CascadeController(surface, options);

    const outcome = await controller.resolve(movie);

    expect(outcome.state).toBe('exhausted');
    expect(outcome.attempts).toHaveLength(5);
    expect(surface.calls).not.toContain('packaging-filter');
    expect(controller.state).toEqual({ status: 'exhausted' });
  });

  it('triggers an instant fetch and confirms it', async () => {
    const script: ResultScript = ({ query }) =>
      query === 'Inception 2010' ? [{ displayText: 'Inception 2010 1080p', actionable: true }] : [];
    const surface = new FakeSurface(script, { cacheOnClick: true });

    const outcome = await new CascadeController(surface, options).resolve(movie);

    expect(outcome.state).toBe('found');
    expect(outcome.via).toBe('instant-fetch');
    expect(outcome.tier).toBe('title-year');
    expect(surface.calls).toContain('click 0 single-unit');
  });

  it('clicks once per pattern and moves on when the fetch is not confirmed', async () => {
    const script: ResultScript = ({ query }) =>
      query === 'Inception 2010' ? [{ displayText: 'Inception 2010 1080p', actionable: true }] : [];
    const surface = new FakeSurface(script);

    const outcome = await new CascadeController(surface, options).resolve(movie);

    expect(outcome.state).toBe('exhausted');
    expect(surface.calls.filter((c) => c.startsWith('click'))).toEqual(['click 0 single-unit']);
  });

  it('treats an element miss as no signal and keeps going', async () => {
    const script: ResultScript = ({ query }) =>
      query === 'Inception' ? [{ displayText: 'Inception 2010 1080p', fullyAvailable: true }] : [];
    const surface = new FakeSurface(script, { missQueries: ['Inception 2010'] });

    const outcome = await new CascadeController(surface, options).resolve(movie);

    expect(outcome.state).toBe('found');
    expect(outcome.attempts[0].signal).toBe('miss');
  });

  it('propagates a session fault', async () => {
    const surface = new FakeSurface(() => [], { faultQueries: ['Inception'] });

    await expect(new CascadeController(surface, options).resolve(movie)).rejects.toBeInstanceOf(SurfaceFaultError);
  });

  it('runs the with-extras pass exactly once when every season tier fails', async () => {
    const surface = new FakeSurface(() => []);

    const outcome = await new CascadeController(surface, options).resolve(season);

    expect(outcome.state).toBe('exhausted');
    expect(surface.calls.filter((c) => c === 'packaging-filter')).toHaveLength(1);
    expect(outcome.attempts.filter((a) => a.pass === 'primary').map((a) => a.query)).toEqual(SEASON_QUERIES);
    expect(outcome.attempts.filter((a) => a.pass === 'extras').map((a) => a.query)).toEqual(SEASON_QUERIES);
  });

  it('clicks the first extras-labelled match in the with-extras pass', async () => {
    const script: ResultScript = ({ query, extrasFilter }) =>
      extrasFilter && query === 'S01'
        ? [{ displayText: 'Dark S01 1080p', labels: ['With extras'], actionable: true }]
        : [];
    const surface = new FakeSurface(script);

    const outcome = await new CascadeController(surface, options).resolve(season);

    expect(outcome.state).toBe('found');
    expect(outcome.via).toBe('extras-action');
    expect(outcome.tier).toBe('season-tag');
    expect(surface.calls).toContain('click 0 whole-season');
  });

  it('moves on to the next qualifying result when an extras click does not take', async () => {
    const script: ResultScript = ({ query, extrasFilter }) =>
      extrasFilter && query === 'S01'
        ? [
            { displayText: 'Dark S01 1080p', labels: ['With extras'], actionable: true },
            { displayText: 'Dark S01 720p', labels: ['With extras'], actionable: true },
          ]
        : [];
    const surface = new FakeSurface(script, { failClicks: [0] });

    const outcome = await new CascadeController(surface, options).resolve(season);

    expect(outcome.state).toBe('found');
    expect(outcome.via).toBe('extras-action');
    expect(outcome.query).toBe('S01');
    expect(outcome.matchedText).toBe('Dark S01 720p');
    expect(surface.calls.filter((c) => c.startsWith('click'))).toEqual(['click 0 whole-season', 'click 1 whole-season']);
  });

  it('ends the with-extras pass when the packaging filter cannot be enabled', async () => {
    const surface = new FakeSurface(() => [], { packagingFilter: false });

    const outcome = await new CascadeController(surface, options).resolve(season);

    expect(outcome.state).toBe('exhausted');
    expect(outcome.attempts.every((a) => a.pass === 'primary')).toBe(true);
  });

  it('skips the with-extras pass when disabled', async () => {
    const surface = new FakeSurface(() => []);

    await new CascadeController(surface, { ...options, extrasFallback: false }).resolve(season);

    expect(surface.calls).not.toContain('packaging-filter');
  });
});
