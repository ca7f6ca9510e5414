/**
 * `fetch` stand-in routing REST calls to in-test handlers.
 * @module testing/rest-mock
 */

import { vi } from 'vitest';
import { TEST_TOKEN } from './ws-mock.js';

/** Base URL the REST tests configure. */
export const TEST_URL = 'http://ha.test:8123';

/** A request as seen by a route handler. */
export interface RecordedRequest {
  readonly method: string;
  readonly path: string;
  readonly body: unknown;
}

/** What a route answers with. A bare value becomes a 200 JSON body. */
export interface RouteReply {
  readonly status: number;
  readonly body?: unknown;
  readonly text?: string;
}

export type RouteHandler = (req: RecordedRequest) => unknown;

/** Routes keyed by `METHOD /path`, e.g. `GET /api/states`. */
export type Routes = Record<string, RouteHandler>;

function isReply(value: unknown): value is RouteReply {
  return typeof value === 'object' && value !== null && 'status' in value;
}

function inputUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

/**
 * Replace the global `fetch` with a router over `routes`. Requests without
 * the test bearer token get a 401; unknown routes get a 404.
 * Undo with `vi.unstubAllGlobals()`.
 *
 * @returns Every request made, in order
 */
export function mockFetch(routes: Routes): RecordedRequest[] {
  const requests: RecordedRequest[] = [];

  const fetchStub = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(inputUrl(input));
    const method = init?.method ?? 'GET';
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    const req: RecordedRequest = { method, path: url.pathname, body };
    requests.push(req);

    const headers = new Headers(init?.headers);
    if (headers.get('Authorization') !== `Bearer ${TEST_TOKEN}`) {
      return new Response('401: Unauthorized', { status: 401 });
    }

    const handler = routes[`${method} ${url.pathname}`];
    if (!handler) {
      return new Response('404: Not Found', { status: 404 });
    }

    const reply = handler(req);
    if (isReply(reply)) {
      const text = reply.text ?? JSON.stringify(reply.body ?? {});
      return new Response(text, { status: reply.status });
    }
    return new Response(JSON.stringify(reply ?? {}), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  };

  vi.stubGlobal('fetch', vi.fn(fetchStub));
  return requests;
}
