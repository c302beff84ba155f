/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Bearings & Distances
 * =============================================================================
 *
 * Pure functions, O(1) complexity, no I/O.
 * Shared by the seat schedule builder and the lookup adapters.
 * =============================================================================
 */

import { Coordinate } from '../types/geo.types';

/**
 * Earth's radius constants
 */
export const EARTH_RADIUS = {
  KM: 6371,
};

/**
 * Convert degrees to radians
 */
export function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Convert radians to degrees
 */
export function toDegrees(radians: number): number {
  return radians * (180 / Math.PI);
}

/**
 * Initial compass bearing along the great-circle path (forward azimuth)
 *
 * 0 = North, clockwise. When `from` and `to` are the same point the bearing
 * is undefined; atan2(0, 0) makes this return 0.
 *
 * @returns Bearing in degrees, in [0, 360)
 */
export function bearing(from: Coordinate, to: Coordinate): number {
  const lat1 = toRadians(from.latitude);
  const lat2 = toRadians(to.latitude);
  const diffLong = toRadians(to.longitude - from.longitude);

  const x = Math.sin(diffLong) * Math.cos(lat2);
  const y =
    Math.cos(lat1) * Math.sin(lat2) -
    Math.sin(lat1) * Math.cos(lat2) * Math.cos(diffLong);

  return (toDegrees(Math.atan2(x, y)) + 360) % 360;
}

/**
 * Distance between two GPS coordinates using the Haversine formula
 *
 * @returns Distance in kilometers
 */
export function haversineDistanceKm(from: Coordinate, to: Coordinate): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLng = toRadians(to.longitude - from.longitude);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(from.latitude)) *
      Math.cos(toRadians(to.latitude)) *
      Math.sin(dLng / 2) *
      Math.sin(dLng / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS.KM * c;
}
