import { CredentialBroker } from './credentials.js';
import { StopResolutionError, UpstreamError } from './errors.js';
import { SENTINEL_DISTANCE_MILES, haversineDistanceMiles, parseGeoString } from './geo.js';
import { requestJson } from './http.js';
import { Logger, logger } from './log.js';
import {
  Coordinate,
  DetailDirective,
  RankedStation,
  RankingMode,
  ServiceConfig,
  StationCandidate,
  UNKNOWN
} from './types.js';
import { ajv, formatErrors, isRecord } from './validation.js';

const AMENITIES_TYPE = 1;

const outputSchema = {
  type: 'array',
  items: {
    type: 'object',
    required: [
      'name',
      'distanceMiles',
      'location',
      'financials',
      'hasRealtimeCapability',
      'stationId',
      'realtimeCode',
      'recommendationNote',
      'detailDirective',
      'mapsUrl'
    ],
    additionalProperties: false,
    properties: {
      name: { type: 'string' },
      distanceMiles: { type: 'number', minimum: 0 },
      location: { type: 'string' },
      financials: {
        type: 'object',
        required: ['driverPrice', 'savings'],
        additionalProperties: false,
        properties: {
          driverPrice: { type: 'string' },
          savings: { type: 'string' }
        }
      },
      hasRealtimeCapability: { type: 'boolean' },
      stationId: { type: 'string' },
      realtimeCode: { type: ['string', 'null'] },
      recommendationNote: { type: 'string' },
      detailDirective: {
        type: ['object', 'null'],
        required: ['urgency', 'stationId', 'realtimeCode'],
        additionalProperties: false,
        properties: {
          urgency: { type: 'string', enum: ['recommended', 'optional'] },
          stationId: { type: 'string' },
          realtimeCode: { type: 'string', minLength: 1 }
        }
      },
      mapsUrl: { type: ['string', 'null'], format: 'uri' }
    }
  }
};

const validateOutput = ajv.compile<RankedStation[]>(outputSchema);

function toNumberOrNull(value: unknown): number | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

function toStringOrNull(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const str = String(value).trim();
  return str.length > 0 ? str : null;
}

function formatMoney(value: number | null): string {
  return value === null ? UNKNOWN : `$${value.toFixed(2)}`;
}

export function toCandidate(raw: Record<string, unknown>): StationCandidate {
  return {
    name: toStringOrNull(raw.name),
    city: toStringOrNull(raw.city),
    state: toStringOrNull(raw.state),
    locationGeo: toStringOrNull(raw.locationGeo),
    locationId: toStringOrNull(raw.locationId),
    locationCd: toStringOrNull(raw.locationCd),
    customerPrice: toNumberOrNull(raw.customerPrice),
    savings: toNumberOrNull(raw.savings)
  };
}

/**
 * Chooses the note and machine-readable directive for a station.
 *
 * Priority mode makes a detail fetch for capable stations mandatory (`recommended`);
 * nearest mode only offers it (`optional`).
 */
export function buildRecommendation(
  mode: RankingMode,
  stationId: string,
  realtimeCode: string | null
): { note: string; directive: DetailDirective | null } {
  if (mode === 'amenity_priority') {
    if (realtimeCode) {
      return {
        note: `RECOMMENDED: fetch amenity detail (stationId=${stationId}, realtimeCode=${realtimeCode})`,
        directive: { urgency: 'recommended', stationId, realtimeCode }
      };
    }
    return { note: 'No real-time amenities data available for this station.', directive: null };
  }

  if (realtimeCode) {
    return {
      note: 'Optional: fetch amenity detail if the driver asks for specifics.',
      directive: { urgency: 'optional', stationId, realtimeCode }
    };
  }
  return { note: 'Basic fuel station.', directive: null };
}

export function normalizeCandidate(
  candidate: StationCandidate,
  center: Coordinate,
  mode: RankingMode
): RankedStation {
  const position = parseGeoString(candidate.locationGeo);
  const stationId = candidate.locationId ?? '';
  const realtimeCode = candidate.locationCd;
  const { note, directive } = buildRecommendation(mode, stationId, realtimeCode);
  const location = [candidate.city, candidate.state].filter((part) => part !== null).join(', ');

  return {
    name: candidate.name ?? 'Unnamed station',
    distanceMiles: haversineDistanceMiles(center, position),
    location: location || UNKNOWN,
    financials: {
      driverPrice: formatMoney(candidate.customerPrice),
      savings: formatMoney(candidate.savings)
    },
    hasRealtimeCapability: realtimeCode !== null,
    stationId,
    realtimeCode,
    recommendationNote: note,
    detailDirective: directive,
    mapsUrl: position
      ? `https://www.google.com/maps/search/?api=1&query=${position.latitude},${position.longitude}`
      : null
  };
}

/**
 * Stable ordering; real-time capable stations first in priority mode. Stations without a
 * usable position come after every located one, however far away that one is.
 */
export function sortStations(stations: RankedStation[], mode: RankingMode): RankedStation[] {
  return [...stations].sort((a, b) => {
    if (mode === 'amenity_priority' && a.hasRealtimeCapability !== b.hasRealtimeCapability) {
      return a.hasRealtimeCapability ? -1 : 1;
    }
    const unlocatedA = a.distanceMiles === SENTINEL_DISTANCE_MILES;
    const unlocatedB = b.distanceMiles === SENTINEL_DISTANCE_MILES;
    if (unlocatedA !== unlocatedB) {
      return unlocatedA ? 1 : -1;
    }
    return a.distanceMiles - b.distanceMiles;
  });
}

function extractItems(body: unknown): unknown[] | null {
  if (Array.isArray(body)) {
    return body;
  }
  if (isRecord(body) && Array.isArray(body.data)) {
    return body.data;
  }
  return null;
}

type RankerConfig = Pick<ServiceConfig, 'amenitiesUrl' | 'searchTimeoutMs' | 'maxResults'>;

export class StationRanker {
  private readonly log: Logger;

  constructor(
    private readonly config: RankerConfig,
    private readonly broker: CredentialBroker,
    log: Logger = logger
  ) {
    this.log = log.child({ component: 'stationRanker' });
  }

  /**
   * Searches the amenity API around `center` and returns at most `maxResults` stations.
   * Every candidate takes part in the ordering before the list is cut.
   */
  async search(
    center: Coordinate,
    radiusMeters: number,
    mode: RankingMode,
    signal?: AbortSignal
  ): Promise<RankedStation[]> {
    const headers = await this.broker.authorizedHeaders();
    const response = await requestJson(
      {
        service: 'amenities',
        url: this.config.amenitiesUrl,
        query: {
          latitude: center.latitude,
          longitude: center.longitude,
          radius: radiusMeters,
          amenitiesType: AMENITIES_TYPE
        },
        headers,
        timeoutMs: this.config.searchTimeoutMs,
        signal
      },
      this.log
    );

    if (!response.ok) {
      throw new UpstreamError('amenities', `Amenity search returned status ${response.status}`, {
        status: response.status
      });
    }

    const items = extractItems(response.body);
    if (items === null) {
      throw new UpstreamError('amenities', 'Amenity search response is malformed', { status: response.status });
    }

    const stations = items
      .filter(isRecord)
      .map((item) => normalizeCandidate(toCandidate(item), center, mode));
    const limited = sortStations(stations, mode).slice(0, this.config.maxResults);

    if (!validateOutput(limited)) {
      this.log.error('Output validation failed', { errors: formatErrors(validateOutput.errors) });
      throw new StopResolutionError('amenities', 'Internal output validation failed');
    }

    this.log.info('Ranked stations', {
      mode,
      candidates: items.length,
      count: limited.length,
      realtimeCapable: stations.filter((station) => station.hasRealtimeCapability).length
    });

    return limited;
  }
}
