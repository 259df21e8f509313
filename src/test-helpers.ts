import { vi } from 'vitest';
import type { ApiRequest, ApiResponse } from './types';

export type Route = (req: Request) => Response | Promise<Response>;

/** A fetch stand-in that never leaves the process. */
export function fakeFetch(route: Route) {
  return vi.fn(async (input: Request, _init?: RequestInit): Promise<Response> => route(input));
}

export function json(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export const noSleep = async (_ms: number, _signal?: AbortSignal): Promise<void> => {};

export function request(overrides: Partial<ApiRequest> = {}): ApiRequest {
  return { method: 'GET', url: 'http://api.test/users', headers: [], ...overrides };
}

export function response(overrides: Partial<ApiResponse> = {}): ApiResponse {
  const body = overrides.body ?? Buffer.from('{"id":1,"name":"Alice"}');
  return {
    statusCode: 200,
    statusText: 'OK',
    headers: { 'content-type': ['application/json'] },
    contentType: 'application/json',
    contentLength: body.length,
    durationMs: 5,
    timestamp: new Date('2024-01-01T00:00:00Z'),
    request: request({ path: '/users' }),
    ...overrides,
    body,
  };
}
