import { describe, it, expect, afterEach, vi } from 'vitest';
import { HttpClient } from '../../../src/core/http/client.js';
import {
  itemIdFor,
  StreamAggregator,
  StreamLookup,
  streamUrl,
  type StreamBatch,
  type StreamLookupSnapshot,
  type StreamSource,
} from '../../../src/core/catalog/streams.js';
import { ContentType, type Stream, type StreamTarget } from '../../../src/core/types.js';
import { stubFetch } from '../../helpers/fetch.js';

const HASH = '0123456789abcdef0123456789abcdef01234567';

const MOVIE: StreamTarget = { type: ContentType.MOVIE, id: 'tt0133093' };
const EPISODE_1: StreamTarget = { type: ContentType.SERIES, id: 'tt1', season: 1, episode: 1 };
const EPISODE_2: StreamTarget = { type: ContentType.SERIES, id: 'tt1', season: 1, episode: 2 };

function stream(title: string, provider = 'p'): Stream {
  return { title, infoHash: HASH, sources: [], filenameHint: title + '.mkv', provider };
}

/**
 * Source whose batches are released by the test, one gate per request.
 */
class GatedSource implements StreamSource {
  readonly requests: Array<{ target: StreamTarget; signal?: AbortSignal; release: (batches: StreamBatch[]) => void }> = [];

  async *streamsFor(target: StreamTarget, signal?: AbortSignal): AsyncGenerator<StreamBatch> {
    const batches = await new Promise<StreamBatch[]>((resolve) => {
      this.requests.push({ target, signal, release: resolve });
    });
    yield* batches;
  }
}

describe('itemIdFor', () => {
  it('should use the bare id for movies', () => {
    expect(itemIdFor(MOVIE)).toBe('tt0133093');
  });

  it('should append season and episode for series', () => {
    expect(itemIdFor(EPISODE_2)).toBe('tt1:1:2');
  });
});

describe('streamUrl', () => {
  it('should keep the item id separators literal in the provider path', () => {
    expect(streamUrl('https://provider.test', EPISODE_2)).toBe(
      'https://provider.test/stream/series/tt1:1:2.json'
    );
  });

  it('should encode each part of the item id', () => {
    expect(streamUrl('https://provider.test', { ...EPISODE_2, id: 'tt 1/x' })).toBe(
      'https://provider.test/stream/series/tt%201%2Fx:1:2.json'
    );
  });
});

describe('StreamAggregator', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should yield one batch per provider', async () => {
    stubFetch({
      [streamUrl('https://a.test', MOVIE)]: {
        body: { streams: [{ title: 'A', infoHash: HASH, behaviorHints: { filename: 'a.mkv' } }] },
      },
      [streamUrl('https://b.test', MOVIE)]: { status: 500, body: 'down' },
    });
    const http = new HttpClient();
    http.open();
    const aggregator = new StreamAggregator({ http, providers: ['https://a.test', 'https://b.test'] });

    const batches: StreamBatch[] = [];
    for await (const batch of aggregator.streamsFor(MOVIE)) {
      batches.push(batch);
    }

    expect(batches).toHaveLength(2);
    const a = batches.find((b) => b.provider === 'https://a.test');
    const b = batches.find((b) => b.provider === 'https://b.test');
    expect(a?.ok && a.streams.map((s) => s.provider)).toEqual(['https://a.test']);
    expect(b?.ok).toBe(false);
  });
});

describe('StreamLookup', () => {
  it('should accumulate batches for the current item', async () => {
    const source = new GatedSource();
    const lookup = new StreamLookup(source);

    lookup.request(MOVIE);
    expect(lookup.snapshot.loading).toBe(true);
    expect(lookup.snapshot.itemId).toBe('tt0133093');

    await vi.waitFor(() => expect(source.requests).toHaveLength(1));
    source.requests[0]?.release([
      { provider: 'a', ok: true, streams: [stream('one')] },
      { provider: 'b', ok: false, error: new Error('down') },
    ]);
    await lookup.settled();

    const snapshot = lookup.snapshot;
    expect(snapshot.streams.map((s) => s.title)).toEqual(['one']);
    expect(snapshot.failures.map((f) => f.provider)).toEqual(['b']);
    expect(snapshot.loading).toBe(false);
  });

  it('should append when the same item is requested again', async () => {
    const source = new GatedSource();
    const lookup = new StreamLookup(source);

    lookup.request(EPISODE_1);
    lookup.request(EPISODE_1);
    await vi.waitFor(() => expect(source.requests).toHaveLength(2));
    source.requests[0]?.release([{ provider: 'a', ok: true, streams: [stream('first')] }]);
    source.requests[1]?.release([{ provider: 'a', ok: true, streams: [stream('second')] }]);
    await lookup.settled();

    expect(lookup.snapshot.generation).toBe(1);
    expect(lookup.snapshot.streams.map((s) => s.title)).toEqual(['first', 'second']);
  });

  it('should abort and discard results of a previous item', async () => {
    const source = new GatedSource();
    const lookup = new StreamLookup(source);

    lookup.request(EPISODE_1);
    await vi.waitFor(() => expect(source.requests).toHaveLength(1));
    lookup.request(EPISODE_2);
    await vi.waitFor(() => expect(source.requests).toHaveLength(2));

    expect(source.requests[0]?.signal?.aborted).toBe(true);
    expect(lookup.snapshot.itemId).toBe('tt1:1:2');
    expect(lookup.snapshot.generation).toBe(2);

    source.requests[0]?.release([{ provider: 'a', ok: true, streams: [stream('stale')] }]);
    source.requests[1]?.release([{ provider: 'a', ok: true, streams: [stream('fresh')] }]);
    await lookup.settled();

    expect(lookup.snapshot.streams.map((s) => s.title)).toEqual(['fresh']);
  });

  it('should notify subscribers until they unsubscribe', async () => {
    const source = new GatedSource();
    const lookup = new StreamLookup(source);
    const seen: StreamLookupSnapshot[] = [];
    const unsubscribe = lookup.subscribe((snapshot) => seen.push(snapshot));

    lookup.request(MOVIE);
    expect(seen).toHaveLength(1);
    expect(seen[0]?.loading).toBe(true);

    unsubscribe();
    await vi.waitFor(() => expect(source.requests).toHaveLength(1));
    source.requests[0]?.release([{ provider: 'a', ok: true, streams: [stream('one')] }]);
    await lookup.settled();

    expect(seen).toHaveLength(1);
  });

  it('should keep delivered results when cancelled and ignore failures caused by the abort', async () => {
    const source = new GatedSource();
    const lookup = new StreamLookup(source);

    lookup.request(MOVIE);
    await vi.waitFor(() => expect(source.requests).toHaveLength(1));
    lookup.cancel();
    source.requests[0]?.release([
      { provider: 'a', ok: true, streams: [stream('kept')] },
      { provider: 'b', ok: false, error: new Error('aborted') },
    ]);
    await lookup.settled();

    expect(lookup.snapshot.streams.map((s) => s.title)).toEqual(['kept']);
    expect(lookup.snapshot.failures).toEqual([]);
  });

  it('should start a fresh lookup after a cancel even for the same item', async () => {
    const source = new GatedSource();
    const lookup = new StreamLookup(source);

    lookup.request(MOVIE);
    lookup.cancel();
    lookup.request(MOVIE);

    expect(lookup.snapshot.generation).toBe(2);
    await vi.waitFor(() => expect(source.requests).toHaveLength(2));
    source.requests[0]?.release([]);
    source.requests[1]?.release([]);
    await lookup.settled();
  });
});
