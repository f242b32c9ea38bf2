/**
 * Stream lookup across providers.
 *
 * `StreamAggregator` fans a lookup out to every provider. `StreamLookup` sits
 * on the consumer side and keeps at most one target identity active: asking
 * for a different item aborts the running lookup and discards everything it
 * delivered, while asking again for the same item appends to what is there.
 *
 * @module core/catalog/streams
 */

import type { HttpClient } from '../http/client.js';
import { ContentType, type Stream, type StreamTarget } from '../types.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import { fanOut } from './fanout.js';
import { parseStreamResponse } from './schemas.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Lookup outcome for one provider
 */
export type StreamBatch =
  | { provider: string; ok: true; streams: Stream[] }
  | { provider: string; ok: false; error: Error };

/**
 * Anything that can produce stream batches for a target
 */
export interface StreamSource {
  streamsFor(target: StreamTarget, signal?: AbortSignal): AsyncIterable<StreamBatch>;
}

export interface StreamAggregatorOptions {
  http: HttpClient;

  /** Base URLs of the stream providers, one request each */
  providers: readonly string[];

  logger?: Logger;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Identity of a lookup target as providers address it.
 *
 * @example
 * itemIdFor({ type: ContentType.MOVIE, id: 'tt0133093' }) // 'tt0133093'
 * itemIdFor({ type: ContentType.SERIES, id: 'tt0903747', season: 1, episode: 2 })
 * // 'tt0903747:1:2'
 */
export function itemIdFor(target: StreamTarget): string {
  if (target.type === ContentType.SERIES) {
    return `${target.id}:${target.season}:${target.episode}`;
  }
  return target.id;
}

/**
 * Builds the stream URL of one provider.
 *
 * Each part of the item id is encoded on its own; the ':' separators stay
 * literal.
 */
export function streamUrl(provider: string, target: StreamTarget): string {
  const itemId = itemIdFor(target).split(':').map(encodeURIComponent).join(':');
  return `${provider}/stream/${target.type}/${itemId}.json`;
}

// =============================================================================
// Stream Aggregator
// =============================================================================

/**
 * Queries every configured stream provider concurrently.
 */
export class StreamAggregator implements StreamSource {
  private readonly http: HttpClient;
  private readonly providers: readonly string[];
  private readonly logger: Logger;

  constructor(options: StreamAggregatorOptions) {
    this.http = options.http;
    this.providers = options.providers;
    this.logger = options.logger ?? createLogger('streams');
  }

  /**
   * Yields one batch per provider, in the order responses arrive.
   */
  async *streamsFor(target: StreamTarget, signal?: AbortSignal): AsyncGenerator<StreamBatch, void, undefined> {
    const outcomes = fanOut(
      this.providers,
      async (provider, taskSignal) => {
        const url = streamUrl(provider, target);
        const body = await this.http.getJson(url, taskSignal);
        const { streams, dropped } = parseStreamResponse(body, provider, url);
        if (dropped > 0) {
          this.logger.warn(`Dropped ${dropped} unplayable streams from ${provider}`);
        }
        return streams;
      },
      signal
    );

    for await (const outcome of outcomes) {
      if (outcome.ok) {
        yield { provider: outcome.key, ok: true, streams: outcome.value };
      } else {
        this.logger.warn(`Stream lookup failed for ${outcome.key}`, outcome.error);
        yield { provider: outcome.key, ok: false, error: outcome.error };
      }
    }
  }
}

// =============================================================================
// Stream Lookup
// =============================================================================

/**
 * What a lookup has accumulated so far
 */
export interface StreamLookupSnapshot {
  /** Identity being looked up, null before the first request */
  itemId: string | null;

  /** Bumped every time the identity changes */
  generation: number;

  /** Streams of every accepted batch, in delivery order */
  streams: Stream[];

  /** Providers that failed for the current identity */
  failures: Array<{ provider: string; error: Error }>;

  /** True while at least one lookup for the current identity is running */
  loading: boolean;
}

export type StreamLookupListener = (snapshot: StreamLookupSnapshot) => void;

/**
 * Exclusive stream lookup session.
 *
 * @example
 * ```typescript
 * const lookup = new StreamLookup(aggregator);
 * lookup.subscribe(({ streams }) => render(streams));
 *
 * lookup.request({ type: ContentType.SERIES, id: 'tt0903747', season: 1, episode: 1 });
 * // switching episodes aborts the first lookup and clears its results
 * lookup.request({ type: ContentType.SERIES, id: 'tt0903747', season: 1, episode: 2 });
 * ```
 */
export class StreamLookup {
  private readonly source: StreamSource;
  private readonly logger: Logger;
  private readonly listeners = new Set<StreamLookupListener>();
  private readonly running = new Set<Promise<void>>();

  private itemId: string | null = null;
  private generation = 0;
  private controller: AbortController | null = null;
  private streams: Stream[] = [];
  private failures: Array<{ provider: string; error: Error }> = [];

  constructor(source: StreamSource, logger?: Logger) {
    this.source = source;
    this.logger = logger ?? createLogger('lookup');
  }

  /**
   * Current accumulated state
   */
  get snapshot(): StreamLookupSnapshot {
    return {
      itemId: this.itemId,
      generation: this.generation,
      streams: [...this.streams],
      failures: [...this.failures],
      loading: this.running.size > 0,
    };
  }

  /**
   * Starts a lookup for a target.
   *
   * A new identity aborts the previous lookup and clears its results; the
   * same identity keeps them and appends.
   */
  request(target: StreamTarget): void {
    const itemId = itemIdFor(target);

    if (itemId !== this.itemId || !this.controller) {
      this.controller?.abort();
      this.generation++;
      this.itemId = itemId;
      this.controller = new AbortController();
      this.streams = [];
      this.failures = [];
      this.logger.debug(`Lookup ${this.generation} started for ${itemId}`);
    }

    const run = this.run(target, this.generation, this.controller.signal);
    this.running.add(run);
    const forget = () => {
      this.running.delete(run);
      this.notify();
    };
    run.then(forget, forget);
    this.notify();
  }

  /**
   * Aborts the current lookup; results already delivered stay visible.
   */
  cancel(): void {
    if (this.controller) {
      this.controller.abort();
      this.controller = null;
    }
  }

  /**
   * Cancels and drops every subscriber.
   */
  dispose(): void {
    this.cancel();
    this.generation++;
    this.listeners.clear();
  }

  /**
   * Subscribes to snapshots, delivered after every accepted batch.
   *
   * @returns Function that removes the subscription
   */
  subscribe(listener: StreamLookupListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once every running lookup has finished.
   */
  async settled(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.allSettled([...this.running]);
    }
  }

  private async run(target: StreamTarget, generation: number, signal: AbortSignal): Promise<void> {
    try {
      for await (const batch of this.source.streamsFor(target, signal)) {
        if (generation !== this.generation) {
          this.logger.debug(`Discarded stale batch from ${batch.provider}`);
          continue;
        }
        if (batch.ok) {
          this.streams.push(...batch.streams);
        } else if (!signal.aborted) {
          this.failures.push({ provider: batch.provider, error: batch.error });
        }
        this.notify();
      }
    } catch (error) {
      if (generation === this.generation) {
        this.logger.error(`Lookup for ${itemIdFor(target)} failed`, error);
      }
    }
  }

  private notify(): void {
    const snapshot = this.snapshot;
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
