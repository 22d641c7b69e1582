import { ServiceConfig } from './types.js';

const DEFAULT_PORT = 3000;
const DEFAULT_AMENITIES_URL = 'https://api.example.com/driver/v2/Amenities';
const DEFAULT_AMENITIES_INFO_URL = 'https://api.example.com/driver/v2/AmenitiesInfo';
const DEFAULT_GEOCODER_URL = 'https://nominatim.openstreetmap.org/search';
const DEFAULT_USER_AGENT = 'StopResolution/1.0';
const DEFAULT_DEVICE_OS = 'web';
const DEFAULT_GRANT_TYPE = 'client_credentials';
const DEFAULT_REQUEST_TIMEOUT = 10_000;
const DEFAULT_SEARCH_TIMEOUT = 15_000;
const DEFAULT_OVERALL_TIMEOUT = 30_000;
const DEFAULT_RADIUS_METERS = 321_869; // ~200 miles
const DEFAULT_MAX_RESULTS = 1;
const MAX_RESULTS_CEILING = 5;
const DEFAULT_SESSION_TTL = 30 * 60 * 1000;
const DEFAULT_TOKEN_SAFETY_MARGIN = 60 * 1000;

type Env = Record<string, string | undefined>;

function parseInteger(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function loadConfig(env: Env = process.env): ServiceConfig {
  return {
    port: parseInteger(env.PORT, DEFAULT_PORT),
    tokenUrl: optionalString(env.TOKEN_URL),
    tokenClientId: optionalString(env.TOKEN_CLIENT_ID),
    tokenClientSecret: optionalString(env.TOKEN_CLIENT_SECRET),
    tokenScope: optionalString(env.TOKEN_SCOPE),
    tokenGrantType: optionalString(env.TOKEN_GRANT_TYPE) ?? DEFAULT_GRANT_TYPE,
    tokenApiKey: optionalString(env.TOKEN_X_API_KEY),
    tokenSafetyMarginMs: parseInteger(env.TOKEN_SAFETY_MARGIN_MS, DEFAULT_TOKEN_SAFETY_MARGIN),
    amenitiesApiKey: optionalString(env.AMENITIES_API_KEY),
    amenitiesUrl: optionalString(env.AMENITIES_API) ?? DEFAULT_AMENITIES_URL,
    amenitiesInfoUrl: optionalString(env.AMENITIES_INFO_API) ?? DEFAULT_AMENITIES_INFO_URL,
    geocoderUrl: optionalString(env.GEOCODER_URL) ?? DEFAULT_GEOCODER_URL,
    userAgent: optionalString(env.USER_AGENT) ?? DEFAULT_USER_AGENT,
    deviceOs: optionalString(env.DEVICE_OS) ?? DEFAULT_DEVICE_OS,
    requestTimeoutMs: parseInteger(env.REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT),
    searchTimeoutMs: parseInteger(env.SEARCH_TIMEOUT_MS, DEFAULT_SEARCH_TIMEOUT),
    overallTimeoutMs: parseInteger(env.OVERALL_TIMEOUT_MS, DEFAULT_OVERALL_TIMEOUT),
    defaultRadiusMeters: parseInteger(env.DEFAULT_RADIUS_METERS, DEFAULT_RADIUS_METERS),
    maxResults: clamp(parseInteger(env.MAX_RESULTS, DEFAULT_MAX_RESULTS), 1, MAX_RESULTS_CEILING),
    sessionTtlMs: parseInteger(env.SESSION_TTL_MS, DEFAULT_SESSION_TTL)
  };
}
