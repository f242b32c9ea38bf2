/**
 * Concurrent fan-out / fan-in.
 *
 * Runs one task per key concurrently and yields each outcome as soon as it
 * settles, so consumers can render partial results. Every key produces
 * exactly one element; a failed task yields an error element instead of
 * rejecting the sequence, so one slow or broken provider never holds back
 * or cancels its siblings.
 *
 * @module core/catalog/fanout
 */

/**
 * Outcome of one task
 */
export type Settled<K, T> =
  | { key: K; ok: true; value: T }
  | { key: K; ok: false; error: Error };

/**
 * Task run for a single key; it should stop work when `signal` aborts
 */
export type FanOutTask<K, T> = (key: K, signal: AbortSignal) => Promise<T>;

/**
 * Runs `task` for every key concurrently and yields outcomes in arrival order.
 *
 * Outstanding tasks are aborted when the outer signal aborts or when the
 * consumer stops iterating early.
 *
 * @example
 * ```typescript
 * for await (const outcome of fanOut(['a', 'b'], fetchOne)) {
 *   if (outcome.ok) render(outcome.key, outcome.value);
 * }
 * ```
 */
export async function* fanOut<K, T>(
  keys: readonly K[],
  task: FanOutTask<K, T>,
  signal?: AbortSignal
): AsyncGenerator<Settled<K, T>, void, undefined> {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  const pending = new Map<number, Promise<{ index: number; outcome: Settled<K, T> }>>();

  keys.forEach((key, index) => {
    const run = async (): Promise<Settled<K, T>> => {
      try {
        const value = await task(key, controller.signal);
        return { key, ok: true, value };
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        return { key, ok: false, error };
      }
    };
    pending.set(
      index,
      run().then((outcome) => ({ index, outcome }))
    );
  });

  try {
    while (pending.size > 0) {
      const { index, outcome } = await Promise.race(pending.values());
      pending.delete(index);
      yield outcome;
    }
  } finally {
    signal?.removeEventListener('abort', onAbort);
    if (pending.size > 0) {
      controller.abort();
    }
  }
}
