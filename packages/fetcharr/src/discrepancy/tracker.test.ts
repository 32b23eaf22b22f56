import { describe, expect, it } from 'vitest';

import { FakeMetadata, MemoryDiscrepancyStore } from '../testing/fakes.js';
import { DiscrepancyTracker, episodeLabels } from './tracker.js';
import type { DiscrepancyRecord } from './types.js';

const show = { title: 'Severance (2022)', externalId: 'tt11280740', requestId: 7 };
const now = () => new Date('2024-05-01T12:00:00Z');

describe('DiscrepancyTracker', () => {
  it('leaves fully aired seasons alone', async () => {
    const store = new MemoryDiscrepancyStore();
    const metadata = new FakeMetadata({ 'tt11280740:1': { totalEpisodeCount: 9, airedEpisodeCount: 9 } });
    const tracker = new DiscrepancyTracker(store, metadata, { now });

    const result = await tracker.classifySeasons(show, [1]);

    expect(result).toEqual([{ season: 1, mode: 'normal' }]);
    expect(store.puts).toBe(0);
  });

  it('counts the next episode when it has already aired', async () => {
    const store = new MemoryDiscrepancyStore();
    const metadata = new FakeMetadata(
      { 'tt11280740:2': { totalEpisodeCount: 10, airedEpisodeCount: 8 } },
      { 'tt11280740:2': true },
    );
    const tracker = new DiscrepancyTracker(store, metadata, { now });

    const [result] = await tracker.classifySeasons(show, [2]);

    const expected: DiscrepancyRecord = {
      showTitle: 'Severance (2022)',
      externalShowId: 'tt11280740',
      requestId: 7,
      seasonNumber: 2,
      totalEpisodeCount: 10,
      airedEpisodeCount: 9,
      timestamp: '2024-05-01T12:00:00.000Z',
      failedEpisodeLabels: ['E01', 'E02', 'E03', 'E04', 'E05', 'E06', 'E07', 'E08', 'E09'],
    };
    expect(result).toEqual({ season: 2, mode: 'discrepant', record: expected });
    expect(await store.get('Severance (2022)', 2)).toEqual(expected);
    expect(metadata.calls).toEqual(['season tt11280740:2', 'next tt11280740:2:9']);
  });

  it('keeps the aired count when the next episode is still upcoming', async () => {
    const store = new MemoryDiscrepancyStore();
    const metadata = new FakeMetadata({ 'tt11280740:2': { totalEpisodeCount: 10, airedEpisodeCount: 8 } });

    const [result] = await new DiscrepancyTracker(store, metadata, { now }).classifySeasons(show, [2]);

    expect(result.mode === 'discrepant' && result.record.failedEpisodeLabels).toHaveLength(8);
  });

  it('skips the next-episode check when disabled', async () => {
    const metadata = new FakeMetadata(
      { 'tt11280740:2': { totalEpisodeCount: 10, airedEpisodeCount: 8 } },
      { 'tt11280740:2': true },
    );
    const tracker = new DiscrepancyTracker(new MemoryDiscrepancyStore(), metadata, { now, checkNextEpisode: false });

    const [result] = await tracker.classifySeasons(show, [2]);

    expect(result.mode === 'discrepant' && result.record.airedEpisodeCount).toBe(8);
    expect(metadata.calls).toEqual(['season tt11280740:2']);
  });

  it('uses a stored record without asking the metadata service', async () => {
    const stored: DiscrepancyRecord = {
      showTitle: 'Severance (2022)',
      externalShowId: 'tt11280740',
      seasonNumber: 2,
      totalEpisodeCount: 10,
      airedEpisodeCount: 3,
      timestamp: '2024-04-01T00:00:00.000Z',
      failedEpisodeLabels: ['E01', 'E02', 'E03'],
    };
    const metadata = new FakeMetadata();
    const tracker = new DiscrepancyTracker(new MemoryDiscrepancyStore([stored]), metadata, { now });

    const [result] = await tracker.classifySeasons(show, [2]);

    expect(result).toEqual({ season: 2, mode: 'discrepant', record: stored });
    expect(metadata.calls).toEqual([]);
  });

  it('falls back to a whole-season search when metadata is unavailable', async () => {
    const store = new MemoryDiscrepancyStore();
    const metadata = new FakeMetadata({ 'tt11280740:1': new Error('503 from metadata service') });
    const tracker = new DiscrepancyTracker(store, metadata, { now });

    expect(await tracker.classifySeasons(show, [1, 3])).toEqual([
      { season: 1, mode: 'normal' },
      { season: 3, mode: 'normal' },
    ]);
    expect(store.puts).toBe(0);
  });
});

describe('episodeLabels', () => {
  it('numbers episodes from E01', () => {
    expect(episodeLabels(3)).toEqual(['E01', 'E02', 'E03']);
    expect(episodeLabels(0)).toEqual([]);
  });
});
