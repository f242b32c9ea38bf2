import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  groupSeasons,
  metaUrlFor,
  MetadataResolver,
  toEpisode,
} from '../../../src/core/catalog/metadata.js';
import { HttpClient } from '../../../src/core/http/client.js';
import {
  ContentType,
  MalformedResponseError,
  NetworkError,
  NotFoundError,
  type Episode,
} from '../../../src/core/types.js';
import { stubFetch } from '../../helpers/fetch.js';

const BASE = 'https://meta.test';

function episode(season: number, number: number): Episode {
  return toEpisode({ season, episode: number, name: `E${season}x${number}` });
}

function resolver(): MetadataResolver {
  const http = new HttpClient();
  http.open();
  return new MetadataResolver({ http, metaUrl: BASE });
}

describe('toEpisode', () => {
  it('should fall back to number, title and description', () => {
    const result = toEpisode({
      season: 2,
      number: 5,
      title: 'Titled',
      description: 'Plot',
      released: '2020-03-01T00:00:00.000Z',
    });

    expect(result).toEqual({
      coordinate: '2:5',
      season: 2,
      episode: 5,
      name: 'Titled',
      overview: 'Plot',
      thumbnailUrl: undefined,
      releaseDate: new Date('2020-03-01T00:00:00.000Z'),
    });
  });

  it('should name unnamed episodes by number and ignore bad dates', () => {
    const result = toEpisode({ season: 1, episode: 7, released: 'not a date' });

    expect(result.name).toBe('Episode 7');
    expect(result.releaseDate).toBeUndefined();
  });
});

describe('groupSeasons', () => {
  it('should bucket seasons contiguously and collect negative seasons as specials', () => {
    const special = episode(-1, 1);
    const zero = episode(0, 1);
    const first = episode(1, 1);
    const third = episode(3, 1);

    const seasons = groupSeasons([special, zero, first, third]);

    expect(seasons.numbered).toEqual([[zero], [first], [], [third]]);
    expect(seasons.specials).toEqual([special]);
  });

  it('should keep input order inside a season', () => {
    const a = episode(1, 2);
    const b = episode(1, 1);

    expect(groupSeasons([a, b]).numbered[1]).toEqual([a, b]);
  });

  it('should return no buckets for no episodes', () => {
    expect(groupSeasons([])).toEqual({ numbered: [], specials: [] });
  });
});

describe('MetadataResolver', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should resolve a movie', async () => {
    stubFetch({
      [metaUrlFor(BASE, ContentType.MOVIE, 'tt0133093')]: {
        body: {
          meta: {
            id: 'tt0133093',
            type: 'movie',
            name: 'The Matrix',
            year: 1999,
            runtime: '136 min',
            cast: ['Keanu Reeves'],
            imdbRating: '8.7',
            description: 'A hacker learns the truth.',
          },
        },
      },
    });

    const meta = await resolver().resolve(ContentType.MOVIE, 'tt0133093');

    expect(meta).toEqual({
      id: 'tt0133093',
      type: ContentType.MOVIE,
      name: 'The Matrix',
      posterUrl: undefined,
      year: '1999',
      runtimeLabel: '136 min',
      cast: ['Keanu Reeves'],
      imdbRating: '8.7',
      summary: 'A hacker learns the truth.',
      logoUrl: undefined,
    });
  });

  it('should group the videos of a series into seasons', async () => {
    stubFetch({
      [metaUrlFor(BASE, ContentType.SERIES, 'tt1')]: {
        body: {
          meta: {
            imdb_id: 'tt1',
            type: 'series',
            name: 'Show',
            releaseInfo: '2008-2013',
            videos: [
              { season: 1, episode: 1, name: 'Pilot' },
              { season: 1, episode: 2, name: 'Second' },
              { season: 3, episode: 1, name: 'Later' },
            ],
          },
        },
      },
    });

    const meta = await resolver().resolve(ContentType.SERIES, 'tt1');

    expect(meta.type).toBe(ContentType.SERIES);
    expect(meta.year).toBe('2008-2013');
    if (meta.type === ContentType.SERIES) {
      expect(meta.seasons.numbered.map((s) => s.length)).toEqual([0, 2, 0, 1]);
      expect(meta.seasons.numbered[1]?.[0]?.name).toBe('Pilot');
    }
  });

  it('should map a 404 to NotFoundError', async () => {
    stubFetch({});

    await expect(resolver().resolve(ContentType.MOVIE, 'tt404')).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it('should treat a null meta as not found', async () => {
    stubFetch({ [metaUrlFor(BASE, ContentType.MOVIE, 'tt2')]: { body: { meta: null } } });

    await expect(resolver().resolve(ContentType.MOVIE, 'tt2')).rejects.toThrow(
      'No movie found with id tt2'
    );
  });

  it('should reject a meta without a name', async () => {
    stubFetch({
      [metaUrlFor(BASE, ContentType.MOVIE, 'tt3')]: { body: { meta: { id: 'tt3', type: 'movie' } } },
    });

    await expect(resolver().resolve(ContentType.MOVIE, 'tt3')).rejects.toBeInstanceOf(
      MalformedResponseError
    );
  });

  it('should pass other HTTP failures through', async () => {
    stubFetch({ [metaUrlFor(BASE, ContentType.MOVIE, 'tt4')]: { status: 502, body: 'bad gateway' } });

    const error = await resolver()
      .resolve(ContentType.MOVIE, 'tt4')
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).not.toBeInstanceOf(NotFoundError);
  });
});
