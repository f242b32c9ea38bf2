/**
 * Catalog search across content types.
 *
 * @module core/catalog/aggregator
 */

import type { HttpClient } from '../http/client.js';
import type { ContentType, Entry } from '../types.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import { fanOut } from './fanout.js';
import { parseSearchResponse } from './schemas.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Search outcome for one content type
 */
export type CatalogResult =
  | { contentType: ContentType; ok: true; entries: Entry[] }
  | { contentType: ContentType; ok: false; error: Error };

export interface CatalogAggregatorOptions {
  http: HttpClient;

  /** Base URL of the catalog endpoint */
  catalogUrl: string;

  /** Content types searched, one request each */
  contentTypes: readonly ContentType[];

  logger?: Logger;
}

// =============================================================================
// Catalog Aggregator
// =============================================================================

/**
 * Builds the search URL for one content type.
 *
 * @example
 * searchUrl('https://catalog.example', 'series', 'breaking bad')
 * // 'https://catalog.example/catalog/series/top/search=breaking%20bad.json'
 */
export function searchUrl(catalogUrl: string, contentType: ContentType, query: string): string {
  return `${catalogUrl}/catalog/${contentType}/top/search=${encodeURIComponent(query)}.json`;
}

/**
 * Searches every configured content type concurrently.
 *
 * @example
 * ```typescript
 * const catalog = new CatalogAggregator({ http, catalogUrl, contentTypes });
 *
 * for await (const result of catalog.search('dune')) {
 *   if (result.ok) showRow(result.contentType, result.entries);
 * }
 * ```
 */
export class CatalogAggregator {
  private readonly http: HttpClient;
  private readonly catalogUrl: string;
  private readonly contentTypes: readonly ContentType[];
  private readonly logger: Logger;

  constructor(options: CatalogAggregatorOptions) {
    this.http = options.http;
    this.catalogUrl = options.catalogUrl;
    this.contentTypes = options.contentTypes;
    this.logger = options.logger ?? createLogger('catalog');
  }

  /**
   * Yields one result per content type, in the order responses arrive.
   *
   * A blank query yields nothing.
   */
  async *search(query: string, signal?: AbortSignal): AsyncGenerator<CatalogResult, void, undefined> {
    const trimmed = query.trim();
    if (!trimmed) {
      return;
    }

    this.logger.debug(`Searching ${this.contentTypes.length} content types for "${trimmed}"`);

    const outcomes = fanOut(
      this.contentTypes,
      async (contentType, taskSignal) => {
        const url = searchUrl(this.catalogUrl, contentType, trimmed);
        const body = await this.http.getJson(url, taskSignal);
        const { entries, dropped } = parseSearchResponse(body, url);
        if (dropped > 0) {
          this.logger.warn(`Dropped ${dropped} malformed ${contentType} entries`);
        }
        return entries;
      },
      signal
    );

    for await (const outcome of outcomes) {
      if (outcome.ok) {
        yield { contentType: outcome.key, ok: true, entries: outcome.value };
      } else {
        this.logger.warn(`Search failed for ${outcome.key}`, outcome.error);
        yield { contentType: outcome.key, ok: false, error: outcome.error };
      }
    }
  }
}
