import { vi } from 'vitest';

export const INSTANCE_URL = 'https://example.my.salesforce.com';
export const API_BASE = `${INSTANCE_URL}/services/data/v58.0`;
export const CREDENTIALS = { instanceUrl: INSTANCE_URL, accessToken: 'test-token' };

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function binaryResponse(data: Buffer): Response {
  return new Response(new Uint8Array(data), {
    status: 200,
    headers: { 'Content-Type': 'application/octet-stream' },
  });
}

/**
 * In-process stand-in for fetch: answers each call with the next queued
 * response, or rejects with the queued error.
 */
export function stubFetch(...responses: Array<Response | Error>) {
  const fetchMock = vi.fn(async (input: string, _init?: RequestInit): Promise<Response> => {
    throw new Error(`Unexpected request: ${input}`);
  });
  for (const response of responses) {
    if (response instanceof Error) {
      fetchMock.mockRejectedValueOnce(response);
    } else {
      fetchMock.mockResolvedValueOnce(response);
    }
  }
  return fetchMock;
}

export function requestAt(fetchMock: ReturnType<typeof stubFetch>, index: number) {
  const call = fetchMock.mock.calls[index];
  if (!call) throw new Error(`No request #${index}`);
  const [url, init] = call;
  return {
    url,
    method: init?.method ?? 'GET',
    headers: new Headers(init?.headers),
    body: typeof init?.body === 'string' ? init.body : undefined,
  };
}
