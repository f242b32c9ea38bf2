/**
 * Detail records of catalog entries.
 *
 * @module core/catalog/metadata
 */

import type { HttpClient } from '../http/client.js';
import {
  ContentType,
  MalformedResponseError,
  NetworkError,
  NotFoundError,
  type Episode,
  type Metadata,
  type Seasons,
} from '../types.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import { formatIssues } from '../validation.js';
import { MetaResponseSchema, RawMetaSchema, type RawVideo } from './schemas.js';

export interface MetadataResolverOptions {
  http: HttpClient;

  /** Base URL of the metadata endpoint */
  metaUrl: string;

  logger?: Logger;
}

// =============================================================================
// Seasons
// =============================================================================

function parseReleaseDate(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Converts a validated video record into an episode.
 */
export function toEpisode(video: RawVideo): Episode {
  const episode = video.episode ?? video.number ?? 0;
  return {
    coordinate: `${video.season}:${episode}`,
    season: video.season,
    episode,
    name: video.name ?? video.title ?? `Episode ${episode}`,
    overview: video.overview ?? video.description ?? '',
    thumbnailUrl: video.thumbnail,
    releaseDate: parseReleaseDate(video.released),
  };
}

/**
 * Groups episodes into seasons.
 *
 * Numbered buckets run contiguously from season 0 to the highest season seen;
 * seasons that have no episodes get an empty bucket. Negative seasons are
 * collected as specials. Order inside each bucket follows the input.
 *
 * @example
 * groupSeasons(episodesOfSeasons(-1, 0, 1, 3))
 * // { numbered: [[s0], [s1], [], [s3]], specials: [s-1] }
 */
export function groupSeasons(episodes: readonly Episode[]): Seasons {
  const numbered: Episode[][] = [];
  const specials: Episode[] = [];

  for (const episode of episodes) {
    if (episode.season < 0) {
      specials.push(episode);
      continue;
    }
    while (numbered.length <= episode.season) {
      numbered.push([]);
    }
    numbered[episode.season].push(episode);
  }

  return { numbered, specials };
}

// =============================================================================
// Metadata Resolver
// =============================================================================

/**
 * Builds the metadata URL of an entry.
 */
export function metaUrlFor(metaUrl: string, type: ContentType, id: string): string {
  return `${metaUrl}/meta/${type}/${encodeURIComponent(id)}.json`;
}

/**
 * Fetches and normalizes the detail record of one entry.
 *
 * @example
 * ```typescript
 * const resolver = new MetadataResolver({ http, metaUrl });
 * const meta = await resolver.resolve(ContentType.SERIES, 'tt0903747');
 *
 * if (meta.type === ContentType.SERIES) {
 *   console.log(meta.seasons.numbered.length);
 * }
 * ```
 */
export class MetadataResolver {
  private readonly http: HttpClient;
  private readonly metaUrl: string;
  private readonly logger: Logger;

  constructor(options: MetadataResolverOptions) {
    this.http = options.http;
    this.metaUrl = options.metaUrl;
    this.logger = options.logger ?? createLogger('metadata');
  }

  /**
   * Resolves the metadata of an entry.
   *
   * @throws {NotFoundError} If the endpoint has no record for the entry
   * @throws {MalformedResponseError} If the record lacks required fields
   * @throws {NetworkError} On transport failures
   */
  async resolve(type: ContentType, id: string, signal?: AbortSignal): Promise<Metadata> {
    const url = metaUrlFor(this.metaUrl, type, id);

    let body: unknown;
    try {
      body = await this.http.getJson(url, signal);
    } catch (error) {
      if (error instanceof NetworkError && error.status === 404) {
        throw new NotFoundError(`No ${type} found with id ${id}`);
      }
      throw error;
    }

    const response = MetaResponseSchema.safeParse(body);
    if (!response.success || response.data.meta === null || response.data.meta === undefined) {
      throw new NotFoundError(`No ${type} found with id ${id}`);
    }

    const parsed = RawMetaSchema.safeParse(response.data.meta);
    if (!parsed.success) {
      throw new MalformedResponseError(formatIssues(parsed.error), url);
    }
    const raw = parsed.data;

    const base = {
      id: raw.imdb_id ?? raw.id ?? id,
      name: raw.name,
      posterUrl: raw.poster,
      year: raw.year ?? raw.releaseInfo ?? '',
      runtimeLabel: raw.runtime ?? '',
      cast: raw.cast ?? [],
      imdbRating: raw.imdbRating ?? raw.imdb_rating ?? '',
      summary: raw.description ?? '',
      logoUrl: raw.logo,
    };

    if (raw.type === ContentType.MOVIE) {
      return { ...base, type: ContentType.MOVIE };
    }

    const episodes = (raw.videos ?? []).map(toEpisode);
    const seasons = groupSeasons(episodes);
    this.logger.debug(
      `Resolved ${base.id} with ${episodes.length} episodes in ${seasons.numbered.length} seasons`
    );

    return { ...base, type: ContentType.SERIES, seasons };
  }
}
