import { AmenityDetailFetcher } from './amenities.js';
import {
  SEARCH_FIRST_ANSWER,
  composeAmenityAnswer,
  composeStationSummary,
  unavailableAnswer
} from './answers.js';
import { Clock, systemClock } from './clock.js';
import { CredentialBroker } from './credentials.js';
import { InvalidInputError, NetworkError, StopResolutionError, describeError } from './errors.js';
import { GeoResolver } from './geocoder.js';
import { Logger, logger } from './log.js';
import { ConversationMemory, mentionsAmenity } from './memory.js';
import { StationRanker } from './ranker.js';
import {
  AmenityLookup,
  EngineQuery,
  EngineResult,
  FollowUpOutcome,
  RankedStation,
  RankingMode,
  SearchOrigin,
  ServiceConfig
} from './types.js';
import { ajv } from './validation.js';

const MAX_RADIUS_METERS = 1_000_000;

const validateQuery = ajv.compile<EngineQuery>({
  type: 'object',
  required: ['userId', 'text'],
  additionalProperties: false,
  properties: {
    userId: { type: 'string', minLength: 1, maxLength: 200 },
    text: { type: 'string', maxLength: 2000 },
    placeName: { type: 'string', maxLength: 200 },
    latitude: { type: 'number', minimum: -90, maximum: 90 },
    longitude: { type: 'number', minimum: -180, maximum: 180 },
    radiusMeters: { type: 'integer', minimum: 1, maximum: MAX_RADIUS_METERS },
    mode: { type: 'string', enum: ['nearest', 'amenity_priority'] }
  },
  dependencies: {
    latitude: ['longitude'],
    longitude: ['latitude']
  }
});

const PLACE_PATTERN = /\b(?:in|near|around|outside)\s+([a-z][a-z .,'-]*?)[\s?.!]*$/i;
const SELF_REFERENCES = new Set([
  'me',
  'here',
  'us',
  'there',
  'it',
  'that',
  'that one',
  'this one',
  'my location',
  'my position',
  'this area',
  'my area'
]);

/** Pulls "Chicago" out of "truck stop in Chicago"; ignores "near me". */
export function extractPlaceName(text: string): string | null {
  const match = PLACE_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  const place = match[1].replace(/,+$/, '').trim();
  if (!place || SELF_REFERENCES.has(place.toLowerCase())) {
    return null;
  }
  return place;
}

export function inferRankingMode(text: string): RankingMode {
  return mentionsAmenity(text) ? 'amenity_priority' : 'nearest';
}

export function followUpAnswer(outcome: FollowUpOutcome): string {
  switch (outcome.status) {
    case 'no-search':
      return SEARCH_FIRST_ANSWER;
    case 'unavailable':
      return unavailableAnswer(outcome.station);
    case 'answered':
      return composeAmenityAnswer(outcome.station, outcome.detail, outcome.topics);
  }
}

export interface EngineComponents {
  geoResolver: GeoResolver;
  ranker: StationRanker;
  fetcher: AmenityDetailFetcher;
  memory: ConversationMemory;
}

type EngineConfig = Pick<ServiceConfig, 'defaultRadiusMeters' | 'overallTimeoutMs'>;

/**
 * Routes one driver query: amenity follow-ups are answered from memory, anything else
 * becomes geocode (when a place is named) then search then remember.
 */
export class StopResolutionEngine {
  private readonly log: Logger;

  constructor(
    private readonly config: EngineConfig,
    private readonly components: EngineComponents,
    log: Logger = logger
  ) {
    this.log = log.child({ component: 'engine' });
  }

  async handle(rawQuery: unknown, signal?: AbortSignal): Promise<EngineResult> {
    if (!validateQuery(rawQuery)) {
      this.log.error('Input validation failed', { errors: validateQuery.errors });
      throw new InvalidInputError('Invalid input', validateQuery.errors);
    }
    const query = rawQuery;

    const overallController = new AbortController();
    const timeout = setTimeout(() => {
      overallController.abort(new NetworkError('engine', 'Operation timed out'));
    }, this.config.overallTimeoutMs);
    const combined = signal ? AbortSignal.any([signal, overallController.signal]) : overallController.signal;

    try {
      return await this.route(query, combined);
    } finally {
      clearTimeout(timeout);
    }
  }

  reset(userId: string): boolean {
    return this.components.memory.reset(userId);
  }

  private async route(query: EngineQuery, signal: AbortSignal): Promise<EngineResult> {
    const { memory, ranker } = this.components;
    const explicitPlace = query.placeName?.trim() || null;

    // Only an explicit placeName overrides the classifier; "in there" is not a place.
    if (!explicitPlace && memory.classifyFollowUp(query.text)) {
      const outcome = await memory.resolveFollowUp(query.userId, query.text, signal);
      return { kind: 'follow-up', outcome, answer: followUpAnswer(outcome) };
    }

    const origin = await this.resolveOrigin(query, explicitPlace ?? extractPlaceName(query.text), signal);
    const mode = query.mode ?? inferRankingMode(query.text);
    const radiusMeters = query.radiusMeters ?? this.config.defaultRadiusMeters;
    const stations = await ranker.search(origin.coordinate, radiusMeters, mode, signal);

    // A cancelled query must not overwrite what the user last saw.
    signal.throwIfAborted();
    memory.remember(query.userId, stations, { placeName: origin.placeName, coordinate: origin.coordinate });

    const amenities = await this.followDirective(stations[0], signal);
    let answer = composeStationSummary(stations, origin, amenities?.status === 'ok' ? amenities.detail : null);
    if (amenities?.status === 'unavailable') {
      answer += `\nReal-time amenities unavailable: ${amenities.reason}`;
    }

    this.log.info('Resolved stations', {
      userId: query.userId,
      mode,
      count: stations.length,
      place: origin.placeName
    });

    return { kind: 'stations', mode, origin, stations, amenities, answer };
  }

  private async resolveOrigin(
    query: EngineQuery,
    placeName: string | null,
    signal: AbortSignal
  ): Promise<SearchOrigin> {
    if (placeName) {
      const place = await this.components.geoResolver.resolve(placeName, signal);
      return { coordinate: place.coordinate, placeName, displayName: place.displayName };
    }

    if (query.latitude !== undefined && query.longitude !== undefined) {
      return {
        coordinate: { latitude: query.latitude, longitude: query.longitude },
        placeName: null,
        displayName: null
      };
    }

    const session = this.components.memory.get(query.userId);
    if (session.lastCoordinate) {
      return { coordinate: session.lastCoordinate, placeName: session.lastPlaceName, displayName: null };
    }

    throw new InvalidInputError('A place name or coordinates are required');
  }

  private async followDirective(
    top: RankedStation | undefined,
    signal: AbortSignal
  ): Promise<AmenityLookup | null> {
    if (!top?.detailDirective || top.detailDirective.urgency !== 'recommended') {
      return null;
    }
    const { stationId, realtimeCode } = top.detailDirective;
    try {
      const detail = await this.components.fetcher.fetch(stationId, realtimeCode, signal);
      return { status: 'ok', detail };
    } catch (error) {
      if (signal.aborted || !(error instanceof StopResolutionError)) {
        throw error;
      }
      this.log.warn('Amenity detail unavailable for recommended station', {
        stationId,
        error: describeError(error)
      });
      return { status: 'unavailable', reason: error.message };
    }
  }
}

export function createEngine(
  config: ServiceConfig,
  log: Logger = logger,
  clock: Clock = systemClock
): StopResolutionEngine {
  const broker = new CredentialBroker(config, clock, log);
  const fetcher = new AmenityDetailFetcher(config, broker, log);
  return new StopResolutionEngine(
    config,
    {
      geoResolver: new GeoResolver(config, log),
      ranker: new StationRanker(config, broker, log),
      fetcher,
      memory: new ConversationMemory(fetcher, config.sessionTtlMs, clock, log)
    },
    log
  );
}
