import { NotFoundError } from './errors.js';
import { requestJson } from './http.js';
import { Logger, logger } from './log.js';
import { ResolvedPlace, ServiceConfig } from './types.js';
import { ajv } from './validation.js';

interface GeocodeMatch {
  lat: string | number;
  lon: string | number;
  display_name?: string;
}

const validateMatches = ajv.compile<GeocodeMatch[]>({
  type: 'array',
  items: {
    type: 'object',
    required: ['lat', 'lon'],
    properties: {
      lat: { type: ['string', 'number'] },
      lon: { type: ['string', 'number'] },
      display_name: { type: 'string' }
    }
  }
});

type GeoResolverConfig = Pick<ServiceConfig, 'geocoderUrl' | 'userAgent' | 'requestTimeoutMs'>;

/** Turns a place name into a coordinate with a Nominatim-compatible geocoder. No caching. */
export class GeoResolver {
  private readonly log: Logger;

  constructor(
    private readonly config: GeoResolverConfig,
    log: Logger = logger
  ) {
    this.log = log.child({ component: 'geoResolver' });
  }

  async resolve(placeName: string, signal?: AbortSignal): Promise<ResolvedPlace> {
    const query = placeName.trim();
    if (!query) {
      throw new NotFoundError('geocoder', 'Place name is empty');
    }

    const response = await requestJson(
      {
        service: 'geocoder',
        url: this.config.geocoderUrl,
        query: { q: query, format: 'json', limit: 1 },
        headers: { 'User-Agent': this.config.userAgent, accept: 'application/json' },
        timeoutMs: this.config.requestTimeoutMs,
        signal
      },
      this.log
    );

    if (!response.ok) {
      throw new NotFoundError('geocoder', `Geocoder returned status ${response.status} for '${query}'`);
    }

    const matches = response.body;
    if (!validateMatches(matches) || matches.length === 0) {
      throw new NotFoundError('geocoder', `City '${query}' not found.`);
    }

    const [best] = matches;
    const latitude = Number(best.lat);
    const longitude = Number(best.lon);
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      throw new NotFoundError('geocoder', `City '${query}' not found.`);
    }

    const resolved: ResolvedPlace = {
      coordinate: { latitude, longitude },
      displayName: best.display_name ?? query
    };
    this.log.info('Resolved place', { place: query, latitude, longitude });
    return resolved;
  }
}
