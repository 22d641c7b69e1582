import { AmenityDetailFetcher } from './amenities.js';
import { ALL_TOPICS } from './answers.js';
import { Clock, systemClock } from './clock.js';
import { Logger, logger } from './log.js';
import { AmenityTopic, ConversationSession, Coordinate, FollowUpOutcome, RankedStation } from './types.js';

const AMENITY_KEYWORDS = new Set(['parking', 'park', 'shower', 'showers', 'food', 'amenities', 'amenity']);
const SEARCH_KEYWORDS = new Set(['find', 'search', 'look', 'get', 'show', 'where', 'which', 'locate']);

const TOPIC_KEYWORDS: Record<AmenityTopic, string[]> = {
  food: ['food'],
  showers: ['shower', 'showers'],
  parking: ['parking', 'park']
};

function words(utterance: string): string[] {
  return utterance.toLowerCase().match(/[a-z]+/g) ?? [];
}

export function mentionsAmenity(utterance: string): boolean {
  return words(utterance).some((word) => AMENITY_KEYWORDS.has(word));
}

/** True for "is there parking?", false for "find a station with parking". */
export function classifyFollowUp(utterance: string): boolean {
  const tokens = words(utterance);
  return tokens.some((word) => AMENITY_KEYWORDS.has(word)) && !tokens.some((word) => SEARCH_KEYWORDS.has(word));
}

/** The single category an utterance asks about, or every category when it names none or several. */
export function requestedTopics(utterance: string): AmenityTopic[] {
  const tokens = new Set(words(utterance));
  const mentioned = ALL_TOPICS.filter((topic) => TOPIC_KEYWORDS[topic].some((keyword) => tokens.has(keyword)));
  return mentioned.length === 1 ? mentioned : ALL_TOPICS;
}

export interface SearchContext {
  placeName?: string | null;
  coordinate?: Coordinate | null;
}

/**
 * Per-user short-term memory of the last ranked search.
 *
 * Sessions are created lazily and expire after `ttlMs` without access; an expired session
 * is emptied in place. Concurrent writes for the same user are last-writer-wins.
 */
export class ConversationMemory {
  private readonly sessions = new Map<string, ConversationSession>();
  private readonly log: Logger;

  constructor(
    private readonly fetcher: AmenityDetailFetcher,
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock,
    log: Logger = logger
  ) {
    this.log = log.child({ component: 'conversationMemory' });
  }

  get(userId: string): ConversationSession {
    const now = this.clock.now();
    let session = this.sessions.get(userId);

    if (!session) {
      session = { userId, lastStations: [], lastPlaceName: null, lastCoordinate: null, updatedAt: now };
      this.sessions.set(userId, session);
      return session;
    }

    if (now - session.updatedAt > this.ttlMs) {
      this.log.info('Session expired', { userId, idleMs: now - session.updatedAt });
      session.lastStations = [];
      session.lastPlaceName = null;
      session.lastCoordinate = null;
    }

    session.updatedAt = now;
    return session;
  }

  remember(userId: string, stations: RankedStation[], context: SearchContext = {}): void {
    const session = this.get(userId);
    session.lastStations = [...stations];
    if (context.placeName !== undefined) {
      session.lastPlaceName = context.placeName;
    }
    if (context.coordinate !== undefined) {
      session.lastCoordinate = context.coordinate;
    }
    this.log.debug('Remembered stations', { userId, count: stations.length });
  }

  reset(userId: string): boolean {
    return this.sessions.delete(userId);
  }

  classifyFollowUp(utterance: string): boolean {
    return classifyFollowUp(utterance);
  }

  /**
   * Answers an amenity question about the top remembered station without a new search.
   * Fetch failures propagate as the fetcher's typed errors.
   */
  async resolveFollowUp(userId: string, utterance: string, signal?: AbortSignal): Promise<FollowUpOutcome> {
    const [station] = this.get(userId).lastStations;
    if (!station) {
      return { status: 'no-search' };
    }
    if (!station.realtimeCode) {
      return { status: 'unavailable', station };
    }

    const detail = await this.fetcher.fetch(station.stationId, station.realtimeCode, signal);
    const topics = requestedTopics(utterance);
    this.log.info('Answered follow-up', { userId, stationId: station.stationId, topics });
    return { status: 'answered', station, detail, topics };
  }
}
