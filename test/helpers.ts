import { vi } from 'vitest';
import { Clock } from '../src/clock.js';
import { createLogger, Logger } from '../src/log.js';
import { ServiceConfig } from '../src/types.js';

export const TEST_CONFIG: ServiceConfig = {
  port: 0,
  tokenUrl: 'https://auth.test/oauth/token',
  tokenClientId: 'test-client',
  tokenClientSecret: 'test-secret',
  tokenScope: 'amenities.read',
  tokenGrantType: 'client_credentials',
  tokenApiKey: 'test-token-key',
  tokenSafetyMarginMs: 60_000,
  amenitiesApiKey: 'test-api-key',
  amenitiesUrl: 'https://amenities.test/Amenities',
  amenitiesInfoUrl: 'https://amenities.test/AmenitiesInfo',
  geocoderUrl: 'https://geo.test/search',
  userAgent: 'StopResolution/test',
  deviceOs: 'web',
  requestTimeoutMs: 1_000,
  searchTimeoutMs: 1_000,
  overallTimeoutMs: 5_000,
  defaultRadiusMeters: 321_869,
  maxResults: 5,
  sessionTtlMs: 30 * 60 * 1000
};

export const TOKEN_ENDPOINT = 'https://auth.test/oauth/token';
export const SEARCH_ENDPOINT = 'https://amenities.test/Amenities';
export const DETAIL_ENDPOINT = 'https://amenities.test/AmenitiesInfo';
export const GEOCODER_ENDPOINT = 'https://geo.test/search';

export class ManualClock implements Clock {
  constructor(public current = 1_700_000_000_000) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export const silentLogger: Logger = createLogger({}, () => undefined);

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

export function tokenResponse(token = 'test-access-token', expiresIn = 3600): Response {
  return json({ access_token: token, token_type: 'Bearer', expires_in: expiresIn });
}

export type Route = (url: URL, init: RequestInit | undefined) => Response | Promise<Response>;

function requestUrl(input: string | URL | Request): URL {
  if (typeof input === 'string') return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

/** Routes stubbed fetch calls by origin + path; unknown endpoints reject like a dead network. */
export function mockFetch(routes: Record<string, Route>) {
  return vi.spyOn(globalThis, 'fetch').mockImplementation(async (input, init) => {
    const url = requestUrl(input);
    const route = routes[`${url.origin}${url.pathname}`];
    if (!route) {
      throw new TypeError(`fetch failed: no route for ${url.href}`);
    }
    return route(url, init);
  });
}

/** URLs of every stubbed call whose path matches `endpoint`. */
export function callsTo(spy: ReturnType<typeof mockFetch>, endpoint: string): URL[] {
  return spy.mock.calls
    .map(([input]) => requestUrl(input))
    .filter((url) => `${url.origin}${url.pathname}` === endpoint);
}

export function headersOf(init: RequestInit | undefined): Record<string, string> {
  const headers = init?.headers;
  if (!headers || headers instanceof Headers || Array.isArray(headers)) {
    return {};
  }
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name] = typeof value === 'string' ? value : value.join(', ');
  }
  return result;
}
