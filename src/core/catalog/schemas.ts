/**
 * Payload validation for the catalog, metadata and stream endpoints.
 *
 * Raw JSON is checked here and turned into the typed records of
 * `core/types`; nothing loosely typed travels further inward.
 *
 * @module core/catalog/schemas
 */

import { z } from 'zod';
import { formatIssues } from '../validation.js';
import { ContentType, MalformedResponseError, type Entry, type Stream } from '../types.js';

// =============================================================================
// Shared Pieces
// =============================================================================

/** Optional string that some upstream records send as null */
const optionalString = z
  .string()
  .nullish()
  .transform((value) => (value ? value : undefined));

/** Optional label sent as either a string or a number */
const optionalLabel = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));

const contentTypeSchema = z.nativeEnum(ContentType);

// =============================================================================
// Catalog Search
// =============================================================================

export const RawEntrySchema = z
  .object({
    id: optionalString,
    imdb_id: optionalString,
    type: contentTypeSchema,
    name: z.string().min(1),
    poster: optionalString,
  })
  .refine((raw) => Boolean(raw.imdb_id ?? raw.id), {
    message: 'entry has neither imdb_id nor id',
  });

export const SearchResponseSchema = z.object({
  metas: z.array(z.unknown()),
});

/**
 * Result of parsing one catalog search response
 */
export interface ParsedEntries {
  entries: Entry[];

  /** Number of records dropped because they were malformed */
  dropped: number;
}

/**
 * Parses a catalog search response.
 *
 * Individual malformed entries are dropped; a body without a `metas` array
 * is rejected as a whole.
 *
 * @throws {MalformedResponseError} If the body has no `metas` array
 */
export function parseSearchResponse(body: unknown, source: string): ParsedEntries {
  const response = SearchResponseSchema.safeParse(body);
  if (!response.success) {
    throw new MalformedResponseError(formatIssues(response.error), source);
  }

  const entries: Entry[] = [];
  let dropped = 0;

  for (const item of response.data.metas) {
    const parsed = RawEntrySchema.safeParse(item);
    if (!parsed.success) {
      dropped++;
      continue;
    }
    const raw = parsed.data;
    entries.push({
      id: raw.imdb_id ?? raw.id ?? '',
      type: raw.type,
      name: raw.name,
      posterUrl: raw.poster,
    });
  }

  return { entries, dropped };
}

// =============================================================================
// Metadata
// =============================================================================

export const RawVideoSchema = z
  .object({
    season: z.number().int(),
    episode: z.number().int().nullish(),
    number: z.number().int().nullish(),
    name: optionalString,
    title: optionalString,
    overview: optionalString,
    description: optionalString,
    thumbnail: optionalString,
    released: optionalString,
  })
  .refine((raw) => typeof (raw.episode ?? raw.number) === 'number', {
    message: 'video has no episode number',
  });

export type RawVideo = z.infer<typeof RawVideoSchema>;

export const RawMetaSchema = z
  .object({
    id: optionalString,
    imdb_id: optionalString,
    type: contentTypeSchema,
    name: z.string().min(1),
    poster: optionalString,
    year: optionalLabel,
    releaseInfo: optionalLabel,
    runtime: optionalLabel,
    cast: z.array(z.string()).nullish(),
    imdbRating: optionalLabel,
    imdb_rating: optionalLabel,
    description: optionalString,
    logo: optionalString,
    videos: z.array(RawVideoSchema).nullish(),
  })
  .refine((raw) => Boolean(raw.imdb_id ?? raw.id), {
    message: 'meta has neither imdb_id nor id',
  });

export type RawMeta = z.infer<typeof RawMetaSchema>;

export const MetaResponseSchema = z.object({
  meta: z.unknown(),
});

// =============================================================================
// Streams
// =============================================================================

const INFO_HASH_PATTERN = /^[0-9a-f]{40}$/i;

export const RawStreamSchema = z.object({
  name: optionalString,
  title: optionalString,
  description: optionalString,
  infoHash: z.string().regex(INFO_HASH_PATTERN, 'infoHash must be 40 hex characters'),
  fileIdx: z.number().int().nonnegative().nullish(),
  sources: z.array(z.string()).nullish(),
  behaviorHints: z.object({
    filename: z.string().min(1),
  }),
});

export const StreamResponseSchema = z.object({
  streams: z.array(z.unknown()),
});

/**
 * Normalizes a stream's source list.
 *
 * `tracker:` entries contribute their URL with the prefix stripped, `dht:`
 * entries are peer discovery hints the engine finds on its own and are
 * dropped, everything else passes through unchanged.
 *
 * @example
 * normalizeSources(['tracker:udp://a', 'dht:x', 'udp://peer1'])
 * // ['udp://a', 'udp://peer1']
 */
export function normalizeSources(sources: readonly string[]): string[] {
  const normalized: string[] = [];
  for (const source of sources) {
    if (source.startsWith('tracker:')) {
      normalized.push(source.slice('tracker:'.length));
    } else if (!source.startsWith('dht:')) {
      normalized.push(source);
    }
  }
  return normalized;
}

/**
 * Result of parsing one stream provider response
 */
export interface ParsedStreams {
  streams: Stream[];

  /** Number of records dropped because they were malformed */
  dropped: number;
}

/**
 * Parses a stream provider response.
 *
 * Streams without a valid info hash or filename hint cannot be played and
 * are dropped; a body without a `streams` array is rejected as a whole.
 *
 * @throws {MalformedResponseError} If the body has no `streams` array
 */
export function parseStreamResponse(body: unknown, provider: string, source: string): ParsedStreams {
  const response = StreamResponseSchema.safeParse(body);
  if (!response.success) {
    throw new MalformedResponseError(formatIssues(response.error), source);
  }

  const streams: Stream[] = [];
  let dropped = 0;

  for (const item of response.data.streams) {
    const parsed = RawStreamSchema.safeParse(item);
    if (!parsed.success) {
      dropped++;
      continue;
    }
    const raw = parsed.data;
    streams.push({
      title: raw.title ?? raw.description ?? raw.name ?? raw.behaviorHints.filename,
      infoHash: raw.infoHash.toLowerCase(),
      fileIndex: raw.fileIdx ?? undefined,
      sources: normalizeSources(raw.sources ?? []),
      filenameHint: raw.behaviorHints.filename,
      provider,
    });
  }

  return { streams, dropped };
}

/**
 * Builds the magnet link of a stream.
 */
export function magnetLink(stream: Pick<Stream, 'infoHash'>): string {
  return `magnet:?xt=urn:btih:${stream.infoHash}`;
}
