import { afterEach, describe, expect, it, vi } from 'vitest';

import { TraktClient } from './trakt.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const now = () => new Date('2024-05-01T12:00:00Z');

describe('TraktClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('reads episode counts for a season and caches the season list', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse([
        { number: 1, episode_count: 9, aired_episodes: 9 },
        { number: 2, episode_count: 10, aired_episodes: 8 },
      ]),
    );
    vi.stubGlobal('fetch', fetchMock);
    const client = new TraktClient({ clientId: 'test-client', now });

    expect(await client.getSeasonDetails('tt11280740', 2)).toEqual({ totalEpisodeCount: 10, airedEpisodeCount: 8 });
    expect(await client.getSeasonDetails('tt11280740', 3)).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]).toEqual([
      'https://api.trakt.tv/shows/tt11280740/seasons?extended=full',
      expect.objectContaining({
        headers: { 'Content-Type': 'application/json', 'trakt-api-version': '2', 'trakt-api-key': 'test-client' },
      }),
    ]);
  });

  it('checks whether the next episode has aired', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ season: 2, number: 9, first_aired: '2024-04-30T01:00:00.000Z' })));
    const client = new TraktClient({ clientId: 'test-client', now });
    expect(await client.hasNextEpisodeAired('tt11280740', 2, 8)).toBe(true);
  });

  it('treats a future or missing air date as not aired', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ season: 2, number: 9, first_aired: '2024-06-01T01:00:00.000Z' })));
    expect(await new TraktClient({ clientId: 'test-client', now }).hasNextEpisodeAired('tt11280740', 2, 8)).toBe(false);

    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'not found' }, 404)));
    expect(await new TraktClient({ clientId: 'test-client', now }).hasNextEpisodeAired('tt11280740', 2, 8)).toBe(false);
  });

  it('surfaces HTTP errors from season lookups', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({}, 503)));
    await expect(new TraktClient({ clientId: 'test-client' }).getSeasonDetails('tt1', 1)).rejects.toThrow(
      'Trakt request failed 503: https://api.trakt.tv/shows/tt1/seasons?extended=full',
    );
  });

  it('maps a TMDB id to an IMDb id', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        jsonResponse([{ type: 'movie', movie: { title: 'Inception', year: 2010, ids: { imdb: 'tt1375666', tmdb: 27205 } } }]),
      ),
    );
    expect(await new TraktClient({ clientId: 'test-client' }).lookupByTmdb(27205, 'movie')).toEqual({
      imdbId: 'tt1375666',
      title: 'Inception',
      year: 2010,
    });
  });

  it('requires a client id', () => {
    expect(() => new TraktClient({ clientId: '' })).toThrow('Trakt client id missing');
  });
});
