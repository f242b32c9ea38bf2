/**
 * Shared HTTP client for Marquee
 *
 * One long-lived instance serves the catalog, metadata, stream and tracker
 * list requests. It has an explicit lifecycle: requests are only accepted
 * between `open()` and `close()`, and `close()` waits for every in-flight
 * request to settle before it resolves.
 *
 * @module core/http/client
 */

import {
  CancelledError,
  MalformedResponseError,
  NetworkError,
} from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options for the HTTP client.
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;

  /** User-Agent header (default: 'Marquee/0.1') */
  userAgent?: string;
}

type ClientState = 'created' | 'open' | 'closed';

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_USER_AGENT = 'Marquee/0.1';

// =============================================================================
// HTTP Client
// =============================================================================

/**
 * Fetch-based HTTP client with per-request timeouts and cancellation.
 *
 * @example
 * ```typescript
 * const http = new HttpClient({ timeout: 10000 });
 * http.open();
 *
 * const body = await http.getJson('https://example.com/data.json');
 *
 * await http.close();
 * ```
 */
export class HttpClient {
  private readonly timeout: number;
  private readonly userAgent: string;
  private readonly inFlight = new Set<Promise<unknown>>();
  private state: ClientState = 'created';
  private closing: Promise<void> | null = null;

  constructor(options: HttpClientOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  /**
   * Starts accepting requests. Calling it again while open has no effect.
   *
   * @throws {NetworkError} If the client was already closed
   */
  open(): void {
    if (this.state === 'closed') {
      throw new NetworkError('HTTP client has been closed', '');
    }
    this.state = 'open';
  }

  /**
   * Stops accepting requests and waits for in-flight ones to settle.
   *
   * Repeated calls return the same promise.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.state = 'closed';
      this.closing = this.drain();
    }
    return this.closing;
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  /** Number of requests that have not settled yet */
  get pendingRequests(): number {
    return this.inFlight.size;
  }

  /**
   * GET a URL and parse the body as JSON.
   *
   * @throws {NetworkError} On timeout, connection failure or non-2xx status
   * @throws {MalformedResponseError} If the body is not valid JSON
   * @throws {CancelledError} If the signal aborts the request
   */
  getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    return this.track(
      this.request(url, signal, async (response) => {
        const text = await response.text();
        try {
          const body: unknown = JSON.parse(text);
          return body;
        } catch {
          throw new MalformedResponseError('Response is not valid JSON', url);
        }
      })
    );
  }

  /**
   * GET a URL and return the body as text.
   *
   * @throws {NetworkError} On timeout, connection failure or non-2xx status
   * @throws {CancelledError} If the signal aborts the request
   */
  getText(url: string, signal?: AbortSignal): Promise<string> {
    return this.track(this.request(url, signal, (response) => response.text()));
  }

  private async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private track<T>(promise: Promise<T>): Promise<T> {
    this.inFlight.add(promise);
    const forget = () => {
      this.inFlight.delete(promise);
    };
    promise.then(forget, forget);
    return promise;
  }

  private async request<T>(
    url: string,
    signal: AbortSignal | undefined,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    if (this.state !== 'open') {
      throw new NetworkError('HTTP client is not open', url);
    }
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
        },
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new NetworkError(
          `HTTP error ${response.status}: ${response.statusText}`,
          url,
          response.status
        );
      }

      return await read(response);
    } catch (error) {
      if (error instanceof NetworkError || error instanceof MalformedResponseError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        if (timedOut) {
          throw new NetworkError(`Request timed out after ${this.timeout}ms`, url);
        }
        throw new CancelledError();
      }

      if (error instanceof Error) {
        throw new NetworkError(`Network error: ${error.message}`, url);
      }

      throw new NetworkError('Unknown error occurred', url);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
