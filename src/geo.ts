import { Coordinate } from './types.js';

const EARTH_RADIUS_MILES = 3958.8;

/** Distance reported when either endpoint is unknown; sorts after every real distance. */
export const SENTINEL_DISTANCE_MILES = 9999.0;

function isValidCoordinate(point: Coordinate | null | undefined): point is Coordinate {
  return (
    point !== null &&
    point !== undefined &&
    Number.isFinite(point.latitude) &&
    Number.isFinite(point.longitude) &&
    Math.abs(point.latitude) <= 90 &&
    Math.abs(point.longitude) <= 180
  );
}

/**
 * Calculates the great-circle distance between two coordinates using the Haversine formula.
 * @returns Distance in miles rounded to two decimals, or {@link SENTINEL_DISTANCE_MILES}
 * when either point is missing or out of range.
 */
export function haversineDistanceMiles(
  from: Coordinate | null | undefined,
  to: Coordinate | null | undefined
): number {
  if (!isValidCoordinate(from) || !isValidCoordinate(to)) {
    return SENTINEL_DISTANCE_MILES;
  }
  const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(from.latitude)) *
      Math.cos(toRadians(to.latitude)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return Math.round(EARTH_RADIUS_MILES * c * 100) / 100;
}

/**
 * Parses an upstream "lat,lon" string.
 * @returns The coordinate, or null when the string is missing or malformed.
 */
export function parseGeoString(value: string | null | undefined): Coordinate | null {
  if (!value || !value.includes(',')) {
    return null;
  }
  const [latPart, lonPart] = value.split(',');
  if (!latPart?.trim() || !lonPart?.trim()) {
    return null;
  }
  const latitude = Number(latPart);
  const longitude = Number(lonPart);
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    return null;
  }
  return { latitude, longitude };
}
