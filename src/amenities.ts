import { CredentialBroker } from './credentials.js';
import { MissingCodeError, UpstreamError, describeError } from './errors.js';
import { requestJson } from './http.js';
import { Logger, logger } from './log.js';
import { AmenityDetail, Count, ServiceConfig, UNKNOWN } from './types.js';
import { isRecord } from './validation.js';

const OFFLINE_MESSAGE = 'Real-time system offline.';
const CODE_PREFIX_THRESHOLD = 3;

/**
 * Turns a station's real-time code into the key the detail API expects.
 *
 * Codes longer than three characters lose their first character ("T123" -> "123");
 * shorter codes are sent as they are. The upstream format behind this rule is unconfirmed.
 */
export function normalizeRealtimeCode(code: string): string {
  const trimmed = code.trim();
  return trimmed.length > CODE_PREFIX_THRESHOLD ? trimmed.slice(1) : trimmed;
}

function toCount(value: unknown): Count {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : UNKNOWN;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : UNKNOWN;
  }
  return UNKNOWN;
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = data[key];
  return isRecord(value) ? value : {};
}

/** Shapes the `data` object of a detail response; absent values become "unknown". */
export function shapeAmenityDetail(stationId: string, data: Record<string, unknown>): AmenityDetail {
  const site = data.site;
  const parking = section(data, 'parking');
  const reserved = section(data, 'reserve_it');
  const shower = section(data, 'shower');

  return {
    stationId,
    foodOptions: typeof site === 'string' && site.trim() !== '' ? site.trim() : UNKNOWN,
    parking: {
      total: toCount(parking.total_spaces),
      available: toCount(parking.available_spaces),
      reservedAvailable: toCount(reserved.available_spaces)
    },
    showers: {
      available: toCount(shower.available_showers)
    }
  };
}

type DetailConfig = Pick<ServiceConfig, 'amenitiesInfoUrl' | 'requestTimeoutMs'>;

export class AmenityDetailFetcher {
  private readonly log: Logger;

  constructor(
    private readonly config: DetailConfig,
    private readonly broker: CredentialBroker,
    log: Logger = logger
  ) {
    this.log = log.child({ component: 'amenityDetailFetcher' });
  }

  async fetch(stationId: string, realtimeCode: string | null | undefined, signal?: AbortSignal): Promise<AmenityDetail> {
    if (!realtimeCode || !realtimeCode.trim()) {
      throw new MissingCodeError(stationId);
    }

    const lookupKey = normalizeRealtimeCode(realtimeCode);
    const headers = await this.broker.authorizedHeaders();

    this.log.debug('Fetching amenity detail', { stationId, lookupKey });
    const response = await requestJson(
      {
        service: 'amenitiesInfo',
        url: this.config.amenitiesInfoUrl,
        query: { locationId: lookupKey },
        headers,
        timeoutMs: this.config.requestTimeoutMs,
        signal
      },
      this.log
    ).catch((error: unknown) => {
      if (error instanceof UpstreamError) {
        this.log.error('Amenity detail payload unreadable', { stationId, error: describeError(error) });
        throw new UpstreamError('amenitiesInfo', OFFLINE_MESSAGE, { cause: error, status: error.status });
      }
      throw error;
    });

    if (!response.ok) {
      throw new UpstreamError('amenitiesInfo', OFFLINE_MESSAGE, { status: response.status });
    }

    const body = response.body;
    if (!isRecord(body)) {
      this.log.error('Amenity detail payload is not an object', { stationId });
      throw new UpstreamError('amenitiesInfo', OFFLINE_MESSAGE, { status: response.status });
    }

    const data = body.data;
    if (data !== undefined && data !== null && !isRecord(data)) {
      this.log.error('Amenity detail data is not an object', { stationId });
      throw new UpstreamError('amenitiesInfo', OFFLINE_MESSAGE, { status: response.status });
    }

    const detail = shapeAmenityDetail(stationId, isRecord(data) ? data : {});
    this.log.info('Fetched amenity detail', { stationId });
    return detail;
  }
}
