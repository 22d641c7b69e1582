import { SENTINEL_DISTANCE_MILES } from './geo.js';
import { AmenityDetail, AmenityTopic, Count, RankedStation, SearchOrigin, UNKNOWN } from './types.js';

export const ALL_TOPICS: AmenityTopic[] = ['parking', 'showers', 'food'];

function formatCount(value: Count): string {
  return value === UNKNOWN ? UNKNOWN : String(value);
}

function formatDistance(distanceMiles: number): string {
  return distanceMiles === SENTINEL_DISTANCE_MILES ? 'at an unknown distance' : `${distanceMiles} miles away`;
}

export function describeTopic(topic: AmenityTopic, detail: AmenityDetail): string {
  switch (topic) {
    case 'parking':
      return (
        `Parking: ${formatCount(detail.parking.available)} of ${formatCount(detail.parking.total)} spots open, ` +
        `${formatCount(detail.parking.reservedAvailable)} reserved spots available.`
      );
    case 'showers':
      return `Showers: ${formatCount(detail.showers.available)} available.`;
    case 'food':
      return `Food: ${detail.foodOptions}.`;
  }
}

export function composeAmenityAnswer(
  station: RankedStation,
  detail: AmenityDetail,
  topics: AmenityTopic[] = ALL_TOPICS
): string {
  return [`${station.name}:`, ...topics.map((topic) => describeTopic(topic, detail))].join(' ');
}

export function composeStationSummary(
  stations: RankedStation[],
  origin: SearchOrigin,
  detail: AmenityDetail | null
): string {
  const [top] = stations;
  if (!top) {
    const where = origin.displayName ?? origin.placeName ?? `${origin.coordinate.latitude},${origin.coordinate.longitude}`;
    return `No stations found near ${where}.`;
  }

  const lines = [
    `I found ${top.name} ${formatDistance(top.distanceMiles)} in ${top.location}.`,
    `Price: ${top.financials.driverPrice} (Savings: ${top.financials.savings}).`
  ];
  if (detail) {
    lines.push(...ALL_TOPICS.map((topic) => describeTopic(topic, detail)));
  }
  if (top.mapsUrl) {
    lines.push(`Navigate: ${top.mapsUrl}`);
  }
  return lines.join('\n');
}

export const SEARCH_FIRST_ANSWER = "I don't have a recent station search for you. Search for a stop first.";

export function unavailableAnswer(station: RankedStation): string {
  return `Real-time amenities are not available for ${station.name}.`;
}
