export const UNKNOWN = 'unknown';
export type Unknown = typeof UNKNOWN;

/** A count reported by an upstream system, or the marker for "not reported". */
export type Count = number | Unknown;

export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

export interface Credential {
  token: string;
  scheme: string;
  expiresAt: number;
}

export type RankingMode = 'nearest' | 'amenity_priority';

export interface StationCandidate {
  name: string | null;
  city: string | null;
  state: string | null;
  locationGeo: string | null;
  locationId: string | null;
  locationCd: string | null;
  customerPrice: number | null;
  savings: number | null;
}

export type DetailUrgency = 'recommended' | 'optional';

export interface DetailDirective {
  urgency: DetailUrgency;
  stationId: string;
  realtimeCode: string;
}

export interface RankedStation {
  name: string;
  distanceMiles: number;
  location: string;
  financials: {
    driverPrice: string;
    savings: string;
  };
  hasRealtimeCapability: boolean;
  stationId: string;
  realtimeCode: string | null;
  recommendationNote: string;
  detailDirective: DetailDirective | null;
  mapsUrl: string | null;
}

export interface AmenityDetail {
  stationId: string;
  foodOptions: string;
  parking: {
    total: Count;
    available: Count;
    reservedAvailable: Count;
  };
  showers: {
    available: Count;
  };
}

export interface ResolvedPlace {
  coordinate: Coordinate;
  displayName: string;
}

export interface SearchOrigin {
  coordinate: Coordinate;
  placeName: string | null;
  displayName: string | null;
}

export interface ConversationSession {
  userId: string;
  lastStations: RankedStation[];
  lastPlaceName: string | null;
  lastCoordinate: Coordinate | null;
  updatedAt: number;
}

export type AmenityTopic = 'food' | 'showers' | 'parking';

export type FollowUpOutcome =
  | { status: 'no-search' }
  | { status: 'unavailable'; station: RankedStation }
  | { status: 'answered'; station: RankedStation; detail: AmenityDetail; topics: AmenityTopic[] };

export interface EngineQuery {
  userId: string;
  text: string;
  placeName?: string;
  latitude?: number;
  longitude?: number;
  radiusMeters?: number;
  mode?: RankingMode;
}

export type AmenityLookup =
  | { status: 'ok'; detail: AmenityDetail }
  | { status: 'unavailable'; reason: string };

export type EngineResult =
  | {
      kind: 'stations';
      mode: RankingMode;
      origin: SearchOrigin;
      stations: RankedStation[];
      amenities: AmenityLookup | null;
      answer: string;
    }
  | {
      kind: 'follow-up';
      outcome: FollowUpOutcome;
      answer: string;
    };

export interface ServiceConfig {
  port: number;
  tokenUrl: string | undefined;
  tokenClientId: string | undefined;
  tokenClientSecret: string | undefined;
  tokenScope: string | undefined;
  tokenGrantType: string;
  tokenApiKey: string | undefined;
  tokenSafetyMarginMs: number;
  amenitiesApiKey: string | undefined;
  amenitiesUrl: string;
  amenitiesInfoUrl: string;
  geocoderUrl: string;
  userAgent: string;
  deviceOs: string;
  requestTimeoutMs: number;
  searchTimeoutMs: number;
  overallTimeoutMs: number;
  defaultRadiusMeters: number;
  maxResults: number;
  sessionTtlMs: number;
}
