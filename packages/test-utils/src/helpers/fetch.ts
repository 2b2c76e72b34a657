/**
 * fetch stand-ins
 *
 * Builds real `Response` objects so code under test reads status and body exactly as it
 * would from the network.
 */

import { vi, type Mock } from 'vitest';

export type FetchMock = Mock<typeof fetch>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(text: string, status: number): Response {
  return new Response(text, { status });
}

export function noContentResponse(): Response {
  return new Response(null, { status: 204 });
}

/**
 * A fetch mock that answers with the given responses in order, then fails loudly
 */
export function createFetchMock(...responses: Array<Response | Error>): FetchMock {
  const queue = [...responses];
  return vi.fn<typeof fetch>(async () => {
    const next = queue.shift();
    if (!next) {
      throw new Error('Unexpected fetch: no response queued');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
}

export interface RecordedRequest {
  url: URL;
  method: string;
  headers: Headers;
  body?: string;
}

/**
 * The request a fetch mock received on its `index`-th call
 */
export function requestAt(mock: FetchMock, index = 0): RecordedRequest {
  const call = mock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was called ${mock.mock.calls.length} times; no call #${index}`);
  }
  const [input, init] = call;
  const url = new URL(input instanceof Request ? input.url : String(input));
  return {
    url,
    method: init?.method ?? 'GET',
    headers: new Headers(init?.headers),
    body: typeof init?.body === 'string' ? init.body : undefined,
  };
}

/**
 * JSON body of the `index`-th request
 */
export function requestJson(mock: FetchMock, index = 0): unknown {
  const { body } = requestAt(mock, index);
  return body === undefined ? undefined : JSON.parse(body);
}
