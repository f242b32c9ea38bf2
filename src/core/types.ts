/**
 * Core Type Definitions for Marquee
 *
 * This module contains the data model shared by the catalog, stream and
 * playback layers, together with the error taxonomy every layer reports
 * failures through.
 *
 * @module core/types
 */

// =============================================================================
// Enums
// =============================================================================

/**
 * Kind of catalog entry
 */
export enum ContentType {
  MOVIE = 'movie',
  SERIES = 'series',
}

/**
 * States of the download-to-playback state machine
 */
export enum PlaybackState {
  IDLE = 'idle',
  REGISTERING = 'registering',
  RESOLVING_METADATA = 'resolving_metadata',
  SELECTING_FILE = 'selecting_file',
  BUFFERING = 'buffering',
  PLAYING = 'playing',
  CLEANUP = 'cleanup',
  FINISHED = 'finished',
  FAILED = 'failed',
}

/**
 * File priority handed to the torrent engine.
 *
 * Only two levels are used: the selected file is wanted, everything else is
 * skipped so no bandwidth is spent on it.
 */
export enum FilePriority {
  SKIP = 0,
  WANTED = 1,
}

// =============================================================================
// Catalog Types
// =============================================================================

/**
 * One catalog search result
 */
export interface Entry {
  /** IMDb identifier (e.g. "tt0903747") */
  id: string;

  /** Whether this is a movie or a series */
  type: ContentType;

  /** Display name */
  name: string;

  /** Poster image URL, if the catalog has one */
  posterUrl?: string;
}

/**
 * One episode of a series
 */
export interface Episode {
  /** Identity within the series, "season:episode" */
  coordinate: string;

  season: number;
  episode: number;
  name: string;
  overview: string;
  thumbnailUrl?: string;
  releaseDate?: Date;
}

/**
 * Episodes of a series grouped into seasons.
 *
 * `numbered[n]` holds season n; numbering is contiguous from 0, seasons the
 * catalog does not list are empty buckets. Negative season numbers are
 * collected in `specials`.
 */
export interface Seasons {
  numbered: Episode[][];
  specials: Episode[];
}

/**
 * Fields shared by movie and series metadata
 */
export interface BaseMetadata extends Entry {
  year: string;
  runtimeLabel: string;
  cast: string[];
  imdbRating: string;
  summary: string;
  logoUrl?: string;
}

export interface MovieMetadata extends BaseMetadata {
  type: ContentType.MOVIE;
}

export interface SeriesMetadata extends BaseMetadata {
  type: ContentType.SERIES;
  seasons: Seasons;
}

/**
 * Full detail record of a catalog entry
 */
export type Metadata = MovieMetadata | SeriesMetadata;

// =============================================================================
// Stream Types
// =============================================================================

/**
 * One candidate peer-to-peer transfer source
 */
export interface Stream {
  /** Provider-supplied description (quality, size, seeders) */
  title: string;

  /** 40-character lower-case hex info hash */
  infoHash: string;

  /** File index inside the torrent, as reported by the provider */
  fileIndex?: number;

  /** Tracker URLs and passthrough sources, already normalized */
  sources: string[];

  /** Name of the file to play inside the torrent */
  filenameHint: string;

  /** Base URL of the provider the stream came from */
  provider: string;
}

/**
 * What to look streams up for.
 *
 * Series lookups need a season and episode; the item id then becomes
 * `imdbId:season:episode`.
 */
export type StreamTarget =
  | { type: ContentType.MOVIE; id: string }
  | { type: ContentType.SERIES; id: string; season: number; episode: number };

// =============================================================================
// Playback Types
// =============================================================================

/**
 * Final result of a playback that ran to the end
 */
export interface PlaybackOutcome {
  status: 'completed';

  /** Player exit code, null when it was terminated by a signal */
  exitCode: number | null;

  /** Bytes downloaded when the player exited */
  downloadedBytes: number;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Base error class for all Marquee errors.
 */
export class MarqueeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MarqueeError';
  }
}

/**
 * Error thrown when a request times out or the server answers non-2xx.
 */
export class NetworkError extends MarqueeError {
  /** The URL that failed */
  readonly url: string;

  /** HTTP status, when a response was received */
  readonly status?: number;

  constructor(message: string, url: string, status?: number) {
    super(message);
    this.name = 'NetworkError';
    this.url = url;
    this.status = status;
  }
}

/**
 * Error thrown when the upstream record does not exist.
 */
export class NotFoundError extends MarqueeError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when an upstream payload lacks required fields.
 */
export class MalformedResponseError extends MarqueeError {
  /** Where the payload came from */
  readonly source: string;

  constructor(message: string, source: string) {
    super(message);
    this.name = 'MalformedResponseError';
    this.source = source;
  }
}

/**
 * Error thrown when the selected stream's file is not part of the transfer.
 */
export class FileNotFoundError extends MarqueeError {
  /** The filename that was searched for */
  readonly filename: string;

  constructor(filename: string, availableFiles: string[]) {
    super(
      `File "${filename}" not found in transfer (${availableFiles.length} files available)`
    );
    this.name = 'FileNotFoundError';
    this.filename = filename;
  }
}

/**
 * Error thrown when the user aborts an operation.
 */
export class CancelledError extends MarqueeError {
  constructor(message = 'Cancelled by user') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Error thrown when the torrent engine rejects a request.
 */
export class EngineError extends MarqueeError {
  constructor(message: string) {
    super(message);
    this.name = 'EngineError';
  }
}

/**
 * Error thrown when the external player cannot be started.
 */
export class PlayerError extends MarqueeError {
  /** The command that failed */
  readonly command: string;

  constructor(message: string, command: string) {
    super(message);
    this.name = 'PlayerError';
    this.command = command;
  }
}

/**
 * Error thrown when reading or writing persisted state fails.
 */
export class StorageError extends MarqueeError {
  /** The file path that caused the error */
  readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(message);
    this.name = 'StorageError';
    this.filePath = filePath;
  }
}

/**
 * Error thrown when a playback is requested while another one is active.
 */
export class PlaybackBusyError extends MarqueeError {
  constructor() {
    super('Another playback is already in progress');
    this.name = 'PlaybackBusyError';
  }
}

/**
 * Error thrown when the configuration file is invalid.
 */
export class ConfigError extends MarqueeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Extracts the errno code from an unknown thrown value.
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Extracts a human-readable message from an unknown thrown value.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Severity of a log line
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * HTTP client settings
 */
export interface HttpConfig {
  /** Per-request timeout in milliseconds */
  timeout: number;

  /** User-Agent header sent with every request */
  userAgent: string;
}

/**
 * Download-to-playback settings
 */
export interface PlaybackConfig {
  /** Bytes that must be downloaded before the player starts */
  bufferThreshold: number;

  /** Delay between engine status polls in milliseconds */
  pollInterval: number;

  /** Delete downloaded data when a transfer is removed */
  deleteDataOnCleanup: boolean;
}

/**
 * External media player invocation
 */
export interface PlayerConfig {
  /** Executable name or path */
  command: string;

  /** Arguments placed after the buffer path */
  args: string[];
}

/**
 * Logging settings
 */
export interface LoggingConfig {
  /** Minimum level written */
  level: LogLevel;

  /** Log file path; defaults to marquee.log inside the data directory */
  file?: string;
}

/**
 * Complete application configuration
 */
export interface AppConfig {
  /** Directory holding caches, session state, logs and downloads */
  dataDir: string;

  /** Base URL of the catalog search endpoint */
  catalogUrl: string;

  /** Base URL of the metadata endpoint */
  metaUrl: string;

  /** Content types searched, one request each */
  contentTypes: ContentType[];

  /** Base URLs of the stream providers, one request each */
  streamProviders: string[];

  /** Plain-text list of bootstrap trackers, refreshed daily */
  trackerListUrl: string;

  /** DHT routers used to join the network ("host:port") */
  dhtBootstrapNodes: string[];

  http: HttpConfig;
  playback: PlaybackConfig;
  player: PlayerConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for overrides; nested sections are merged key by key.
 */
export type PartialAppConfig = Partial<
  Omit<AppConfig, 'http' | 'playback' | 'player' | 'logging'>
> & {
  http?: Partial<HttpConfig>;
  playback?: Partial<PlaybackConfig>;
  player?: Partial<PlayerConfig>;
  logging?: Partial<LoggingConfig>;
};
