import { afterEach, describe, expect, it, vi } from 'vitest';
import { createEngine, extractPlaceName, inferRankingMode } from '../src/engine.js';
import { InvalidInputError, NotFoundError } from '../src/errors.js';
import {
  DETAIL_ENDPOINT,
  GEOCODER_ENDPOINT,
  ManualClock,
  SEARCH_ENDPOINT,
  TEST_CONFIG,
  TOKEN_ENDPOINT,
  callsTo,
  json,
  mockFetch,
  silentLogger,
  tokenResponse
} from './helpers.js';

const chicagoMatch = {
  lat: '41.8755616',
  lon: '-87.6244212',
  display_name: 'Chicago, Cook County, Illinois, United States'
};

const chicagoStations = [
  {
    name: 'Midway Truck Plaza',
    city: 'Chicago',
    state: 'IL',
    locationGeo: '41.7868,-87.7522',
    locationId: 202,
    locationCd: 'T456',
    customerPrice: 3.759,
    savings: 0.4
  },
  {
    name: 'Lakeshore Fuel',
    city: 'Chicago',
    state: 'IL',
    locationGeo: '41.88,-87.63',
    locationId: 101,
    locationCd: 'T123',
    customerPrice: 3.899,
    savings: 0.25
  },
  { name: 'Broken Geo Stop', city: 'Cicero', state: 'IL', locationGeo: 'n/a', locationId: 303 }
];

const lakeshoreDetail = {
  data: {
    site: 'Subway, Taco Bell',
    parking: { total_spaces: 120, available_spaces: 14 },
    reserve_it: { available_spaces: 3 },
    shower: { available_showers: 2 }
  }
};

function routes() {
  return mockFetch({
    [TOKEN_ENDPOINT]: () => tokenResponse(),
    [GEOCODER_ENDPOINT]: () => json([chicagoMatch]),
    [SEARCH_ENDPOINT]: () => json({ data: chicagoStations }),
    [DETAIL_ENDPOINT]: () => json(lakeshoreDetail)
  });
}

function newEngine(clock = new ManualClock()) {
  return createEngine(TEST_CONFIG, silentLogger, clock);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('extractPlaceName', () => {
  it('takes the place after a trailing preposition', () => {
    expect(extractPlaceName('truck stop in Chicago')).toBe('Chicago');
    expect(extractPlaceName('cheapest diesel near St. Louis?')).toBe('St. Louis');
    expect(extractPlaceName('fuel around Gary, Indiana.')).toBe('Gary, Indiana');
  });

  it('ignores self references and plain requests', () => {
    expect(extractPlaceName('truck stop near me')).toBeNull();
    expect(extractPlaceName('fuel around here!')).toBeNull();
    expect(extractPlaceName('any showers in there?')).toBeNull();
    expect(extractPlaceName('diesel near that one')).toBeNull();
    expect(extractPlaceName('cheapest diesel')).toBeNull();
  });
});

describe('inferRankingMode', () => {
  it('prioritizes amenities when the driver mentions one', () => {
    expect(inferRankingMode('find a stop with showers')).toBe('amenity_priority');
    expect(inferRankingMode('cheapest diesel')).toBe('nearest');
  });
});

describe('StopResolutionEngine.handle', () => {
  it('geocodes, ranks and remembers, then answers a follow-up from memory', async () => {
    const spy = routes();
    const engine = newEngine();

    const first = await engine.handle({ userId: 'driver-1', text: 'truck stop in Chicago' });

    expect(first.kind).toBe('stations');
    if (first.kind !== 'stations') return;
    expect(first.mode).toBe('nearest');
    expect(first.origin).toEqual({
      coordinate: { latitude: 41.8755616, longitude: -87.6244212 },
      placeName: 'Chicago',
      displayName: 'Chicago, Cook County, Illinois, United States'
    });
    expect(first.stations.map((item) => [item.name, item.distanceMiles])).toEqual([
      ['Lakeshore Fuel', 0.42],
      ['Midway Truck Plaza', 8.99],
      ['Broken Geo Stop', 9999]
    ]);
    expect(first.amenities).toBeNull();
    expect(first.answer).toBe(
      [
        'I found Lakeshore Fuel 0.42 miles away in Chicago, IL.',
        'Price: $3.90 (Savings: $0.25).',
        'Navigate: https://www.google.com/maps/search/?api=1&query=41.88,-87.63'
      ].join('\n')
    );

    const [geocodeUrl] = callsTo(spy, GEOCODER_ENDPOINT);
    expect(geocodeUrl.searchParams.get('q')).toBe('Chicago');
    const [searchUrl] = callsTo(spy, SEARCH_ENDPOINT);
    expect(searchUrl.searchParams.get('latitude')).toBe('41.8755616');
    expect(searchUrl.searchParams.get('longitude')).toBe('-87.6244212');
    expect(callsTo(spy, DETAIL_ENDPOINT)).toHaveLength(0);

    const followUp = await engine.handle({ userId: 'driver-1', text: 'does it have showers?' });

    expect(followUp).toMatchObject({
      kind: 'follow-up',
      outcome: { status: 'answered', topics: ['showers'] },
      answer: 'Lakeshore Fuel: Showers: 2 available.'
    });
    const detailCalls = callsTo(spy, DETAIL_ENDPOINT);
    expect(detailCalls.map((url) => url.searchParams.get('locationId'))).toEqual(['123']);
    expect(callsTo(spy, GEOCODER_ENDPOINT)).toHaveLength(1);
    expect(callsTo(spy, SEARCH_ENDPOINT)).toHaveLength(1);
  });

  it('follows a recommended directive in priority mode', async () => {
    const spy = routes();

    const result = await newEngine().handle({
      userId: 'driver-2',
      text: 'find a stop with showers',
      latitude: 41.8755616,
      longitude: -87.6244212
    });

    expect(result.kind).toBe('stations');
    if (result.kind !== 'stations') return;
    expect(result.mode).toBe('amenity_priority');
    expect(result.stations[0].detailDirective).toEqual({
      urgency: 'recommended',
      stationId: '101',
      realtimeCode: 'T123'
    });
    expect(result.amenities).toEqual({
      status: 'ok',
      detail: {
        stationId: '101',
        foodOptions: 'Subway, Taco Bell',
        parking: { total: 120, available: 14, reservedAvailable: 3 },
        showers: { available: 2 }
      }
    });
    expect(result.answer.split('\n').slice(2, 5)).toEqual([
      'Parking: 14 of 120 spots open, 3 reserved spots available.',
      'Showers: 2 available.',
      'Food: Subway, Taco Bell.'
    ]);
    expect(callsTo(spy, GEOCODER_ENDPOINT)).toHaveLength(0);
  });

  it('keeps the search result when the recommended detail fetch fails', async () => {
    mockFetch({
      [TOKEN_ENDPOINT]: () => tokenResponse(),
      [SEARCH_ENDPOINT]: () => json(chicagoStations),
      [DETAIL_ENDPOINT]: () => json({}, 500)
    });

    const result = await newEngine().handle({
      userId: 'driver-3',
      text: 'find parking',
      latitude: 41.8755616,
      longitude: -87.6244212,
      mode: 'amenity_priority'
    });

    expect(result).toMatchObject({
      kind: 'stations',
      amenities: { status: 'unavailable', reason: 'Real-time system offline.' }
    });
    expect(result.answer.endsWith('\nReal-time amenities unavailable: Real-time system offline.')).toBe(true);
  });

  it('asks for a search before answering a follow-up with no history', async () => {
    const spy = routes();

    const result = await newEngine().handle({ userId: 'driver-4', text: 'is there parking?' });

    expect(result).toEqual({
      kind: 'follow-up',
      outcome: { status: 'no-search' },
      answer: "I don't have a recent station search for you. Search for a stop first."
    });
    expect(spy).not.toHaveBeenCalled();
  });

  it('searches the explicit placeName even when the text reads as a follow-up', async () => {
    const spy = routes();

    const result = await newEngine().handle({ userId: 'driver-5', text: 'is there parking?', placeName: 'Chicago' });

    expect(result.kind).toBe('stations');
    expect(callsTo(spy, GEOCODER_ENDPOINT).map((url) => url.searchParams.get('q'))).toEqual(['Chicago']);
  });

  it('answers a follow-up that ends in a preposition phrase from memory', async () => {
    const spy = routes();
    const engine = newEngine();

    await engine.handle({ userId: 'driver-11', text: 'truck stop in Chicago' });
    const followUp = await engine.handle({ userId: 'driver-11', text: 'are there showers in there?' });

    expect(followUp).toMatchObject({
      kind: 'follow-up',
      outcome: { status: 'answered', topics: ['showers'] },
      answer: 'Lakeshore Fuel: Showers: 2 available.'
    });
    expect(callsTo(spy, GEOCODER_ENDPOINT).map((url) => url.searchParams.get('q'))).toEqual(['Chicago']);
    expect(callsTo(spy, SEARCH_ENDPOINT)).toHaveLength(1);
  });

  it('lets the classifier decide when the text names a place', async () => {
    const spy = routes();

    const result = await newEngine().handle({ userId: 'driver-12', text: 'is there parking in Chicago?' });

    expect(result).toMatchObject({ kind: 'follow-up', outcome: { status: 'no-search' } });
    expect(spy).not.toHaveBeenCalled();
  });

  it('reuses the last search origin when a query has no location', async () => {
    const spy = routes();
    const engine = newEngine();

    await engine.handle({ userId: 'driver-6', text: 'truck stop in Chicago' });
    const again = await engine.handle({ userId: 'driver-6', text: 'cheapest diesel' });

    expect(again.kind).toBe('stations');
    if (again.kind !== 'stations') return;
    expect(again.origin.placeName).toBe('Chicago');
    expect(callsTo(spy, GEOCODER_ENDPOINT)).toHaveLength(1);
    expect(callsTo(spy, SEARCH_ENDPOINT)).toHaveLength(2);
  });

  it('requires a location for a first search', async () => {
    routes();

    await expect(newEngine().handle({ userId: 'driver-7', text: 'cheapest diesel' })).rejects.toThrow(
      'A place name or coordinates are required'
    );
  });

  it('rejects malformed input', async () => {
    const engine = newEngine();

    await expect(engine.handle({ text: 'truck stop' })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(engine.handle({ userId: 'driver-8', text: 'x', latitude: 41.8 })).rejects.toBeInstanceOf(
      InvalidInputError
    );
    await expect(engine.handle({ userId: 'driver-8', text: 'x', mode: 'cheapest' })).rejects.toBeInstanceOf(
      InvalidInputError
    );
  });

  it('surfaces geocoding misses', async () => {
    mockFetch({ [GEOCODER_ENDPOINT]: () => json([]) });

    await expect(newEngine().handle({ userId: 'driver-9', text: 'fuel near Atlantis' })).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it('does not remember results of a cancelled query', async () => {
    routes();
    const engine = newEngine();
    const controller = new AbortController();
    controller.abort(new Error('client went away'));

    await expect(
      engine.handle({ userId: 'driver-10', text: 'cheapest diesel', latitude: 41.87, longitude: -87.62 }, controller.signal)
    ).rejects.toThrow('client went away');

    const followUp = await engine.handle({ userId: 'driver-10', text: 'is there parking?' });
    expect(followUp).toMatchObject({ outcome: { status: 'no-search' } });
  });
});
