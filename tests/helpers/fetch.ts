import { vi } from 'vitest';

/**
 * Canned response for a stubbed fetch; a function may inspect the URL.
 */
export type FetchRoute = { status?: number; body: unknown } | Error;

/**
 * Replaces global fetch with a stub answering from a URL → response table.
 *
 * Unknown URLs answer 404. Bodies that are strings are sent as-is, anything
 * else as JSON. Returns the stub so tests can inspect its calls.
 */
export function stubFetch(routes: Record<string, FetchRoute>) {
  const stub = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    if (init?.signal?.aborted) {
      throw new DOMException('The operation was aborted.', 'AbortError');
    }
    const route = routes[url];
    if (route === undefined) {
      return new Response('not found', { status: 404, statusText: 'Not Found' });
    }
    if (route instanceof Error) {
      throw route;
    }
    const body = typeof route.body === 'string' ? route.body : JSON.stringify(route.body);
    return new Response(body, { status: route.status ?? 200 });
  });
  vi.stubGlobal('fetch', stub);
  return stub;
}

/**
 * Replaces global fetch with one that never answers until aborted.
 */
export function stubHangingFetch() {
  const stub = vi.fn(
    (_input: string | URL | Request, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(new DOMException('The operation was aborted.', 'AbortError'));
        });
      })
  );
  vi.stubGlobal('fetch', stub);
  return stub;
}
