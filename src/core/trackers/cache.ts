/**
 * Daily-refreshed bootstrap tracker list.
 *
 * The cache file holds the date of the last refresh on its first line and
 * the tracker list exactly as downloaded after it:
 *
 * ```
 * 2024-05-01
 * udp://tracker.example:1337/announce
 *
 * udp://other.example:6969/announce
 * ```
 *
 * @module core/trackers/cache
 */

import type { HttpClient } from '../http/client.js';
import { CancelledError } from '../types.js';
import { readFileIfExists, writeFileAtomic } from '../storage/atomic.js';
import { createLogger, type Logger } from '../../utils/logger.js';

// =============================================================================
// Types
// =============================================================================

export interface TrackerCacheOptions {
  http: HttpClient;

  /** Plain-text tracker list, one URL per line */
  url: string;

  /** Path of the cache file */
  cacheFile: string;

  /** Today's date as YYYY-MM-DD (default: local date) */
  today?: () => string;

  logger?: Logger;
}

interface CacheContents {
  dateStamp: string;
  trackers: string[];
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Formats a date as a local YYYY-MM-DD stamp.
 */
export function localDateStamp(date: Date = new Date()): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Splits a downloaded tracker list on whitespace, dropping blanks.
 */
export function parseTrackerList(text: string): string[] {
  return text.split(/\s+/).filter((tracker) => tracker.length > 0);
}

/**
 * Concatenates tracker lists, keeping the first occurrence of each URL.
 *
 * @example
 * mergeTrackers(['udp://a', 'udp://b'], ['udp://b', 'udp://c'])
 * // ['udp://a', 'udp://b', 'udp://c']
 */
export function mergeTrackers(...lists: ReadonlyArray<readonly string[]>): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const list of lists) {
    for (const tracker of list) {
      if (!seen.has(tracker)) {
        seen.add(tracker);
        merged.push(tracker);
      }
    }
  }
  return merged;
}

// =============================================================================
// Tracker Cache
// =============================================================================

/**
 * Bootstrap tracker list refreshed at most once per calendar day.
 *
 * @example
 * ```typescript
 * const cache = new TrackerCache({ http, url, cacheFile: paths.trackerCache });
 * const trackers = await cache.getBootstrapTrackers();
 * ```
 */
export class TrackerCache {
  private readonly http: HttpClient;
  private readonly url: string;
  private readonly cacheFile: string;
  private readonly today: () => string;
  private readonly logger: Logger;

  constructor(options: TrackerCacheOptions) {
    this.http = options.http;
    this.url = options.url;
    this.cacheFile = options.cacheFile;
    this.today = options.today ?? (() => localDateStamp());
    this.logger = options.logger ?? createLogger('trackers');
  }

  /**
   * Returns today's tracker list.
   *
   * A cache written today is used as is. Otherwise the list is downloaded
   * and cached; if the download fails the previous list (or an empty one)
   * is returned instead.
   *
   * @throws {StorageError} If the cache file cannot be read or written
   * @throws {CancelledError} If the signal aborts the download
   */
  async getBootstrapTrackers(signal?: AbortSignal): Promise<string[]> {
    const today = this.today();
    const cached = await this.read();

    if (cached && cached.dateStamp === today) {
      this.logger.debug(`Using ${cached.trackers.length} cached trackers from ${today}`);
      return cached.trackers;
    }

    let text: string;
    try {
      text = await this.http.getText(this.url, signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const fallback = cached?.trackers ?? [];
      this.logger.warn(
        `Tracker list refresh failed, using ${fallback.length} cached trackers`,
        error
      );
      return fallback;
    }

    await writeFileAtomic(this.cacheFile, `${today}\n${text}`);
    const trackers = parseTrackerList(text);
    this.logger.info(`Refreshed tracker list: ${trackers.length} trackers`);
    return trackers;
  }

  private async read(): Promise<CacheContents | null> {
    const data = await readFileIfExists(this.cacheFile);
    if (data === null) {
      return null;
    }

    const text = data.toString('utf-8');
    const newline = text.indexOf('\n');
    const dateStamp = (newline === -1 ? text : text.slice(0, newline)).trim();
    const trackers = newline === -1 ? [] : parseTrackerList(text.slice(newline + 1));
    return { dateStamp, trackers };
  }
}
