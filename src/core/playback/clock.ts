/**
 * Time source for polling loops.
 *
 * @module core/playback/clock
 */

import { CancelledError } from '../types.js';

/**
 * Cancellable wait primitive
 */
export interface Clock {
  /**
   * Resolves after `ms` milliseconds.
   *
   * @throws {CancelledError} If the signal aborts first
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Clock backed by real timers.
 */
export const systemClock: Clock = {
  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }

      const onAbort = () => {
        clearTimeout(timeoutId);
        reject(new CancelledError());
      };
      const timeoutId = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  },
};
