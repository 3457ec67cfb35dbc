import type { FetchFn } from '../../src/infra/kube-rest-client/index.js';

export interface RecordedRequest {
  readonly url: URL;
  readonly method: string | undefined;
  readonly authorization: string | null;
}

type Route = (url: URL, signal: AbortSignal | undefined) => Response | Promise<Response>;

/**
 * fetch stand-in that answers from a route function and records each request.
 */
export function createFakeFetch(route: Route): { readonly fetchFn: FetchFn; readonly requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    const url = new URL(String(input));
    requests.push({
      url,
      method: init?.method,
      authorization: new Headers(init?.headers).get('authorization'),
    });
    return route(url, init?.signal ?? undefined);
  };
  return { fetchFn, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

/** Never answers; rejects once the request is aborted. */
export function hangUntilAborted(signal: AbortSignal | undefined): Promise<Response> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')), { once: true });
  });
}
