import { describe, it, expect } from 'vitest';
import { fanOut, type Settled } from '../../../src/core/catalog/fanout.js';

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('aborted'));
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener('abort', () => {
      clearTimeout(timer);
      reject(new Error('aborted'));
    });
  });
}

async function collect<K, T>(source: AsyncIterable<Settled<K, T>>): Promise<Settled<K, T>[]> {
  const out: Settled<K, T>[] = [];
  for await (const item of source) {
    out.push(item);
  }
  return out;
}

describe('fanOut', () => {
  it('should yield outcomes in the order they settle', async () => {
    const delays: Record<string, number> = { slow: 30, fast: 1, middle: 15 };

    const outcomes = await collect(
      fanOut(['slow', 'fast', 'middle'], async (key, signal) => {
        await delay(delays[key] ?? 0, signal);
        return key.toUpperCase();
      })
    );

    expect(outcomes.map((o) => o.key)).toEqual(['fast', 'middle', 'slow']);
    expect(outcomes[0]).toEqual({ key: 'fast', ok: true, value: 'FAST' });
  });

  it('should turn a failed task into an error element', async () => {
    const outcomes = await collect(
      fanOut(['good', 'bad'], async (key) => {
        if (key === 'bad') {
          throw new Error('provider down');
        }
        return 1;
      })
    );

    expect(outcomes).toHaveLength(2);
    const bad = outcomes.find((o) => o.key === 'bad');
    expect(bad?.ok).toBe(false);
    if (bad && !bad.ok) {
      expect(bad.error.message).toBe('provider down');
    }
  });

  it('should wrap thrown non-errors', async () => {
    const outcomes = await collect(
      fanOut(['x'], async () => {
        throw 'plain string';
      })
    );

    const [only] = outcomes;
    expect(only?.ok).toBe(false);
    if (only && !only.ok) {
      expect(only.error).toBeInstanceOf(Error);
      expect(only.error.message).toBe('plain string');
    }
  });

  it('should yield nothing for no keys', async () => {
    const outcomes = await collect(fanOut([], async () => 1));

    expect(outcomes).toEqual([]);
  });

  it('should abort outstanding tasks when the consumer stops early', async () => {
    const aborted: string[] = [];

    for await (const outcome of fanOut(['fast', 'slow'], async (key, signal) => {
      try {
        await delay(key === 'fast' ? 1 : 1000, signal);
      } catch (err) {
        aborted.push(key);
        throw err;
      }
      return key;
    })) {
      expect(outcome.key).toBe('fast');
      break;
    }

    expect(aborted).toEqual(['slow']);
  });

  it('should abort tasks when the outer signal aborts', async () => {
    const controller = new AbortController();
    const seen: AbortSignal[] = [];

    const outcomes = fanOut(
      ['a'],
      async (_key, signal) => {
        seen.push(signal);
        await delay(1000, signal);
        return 1;
      },
      controller.signal
    );

    const first = outcomes.next();
    controller.abort();
    const result = await first;

    expect(seen[0]?.aborted).toBe(true);
    expect(result.value).toMatchObject({ key: 'a', ok: false });
  });

  it('should start with an aborted task signal when the outer signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcomes = await collect(
      fanOut(['a'], async (_key, signal) => signal.aborted, controller.signal)
    );

    expect(outcomes).toEqual([{ key: 'a', ok: true, value: true }]);
  });
});
