/**
 * =============================================================================
 * GEO TYPES
 * =============================================================================
 *
 * Coordinate shapes shared by the lookup adapters and the schedule core.
 *
 * ORDERING:
 * - Coordinate is named (latitude, longitude) and used by all bearing math
 * - LngLatPair is the (longitude, latitude) tuple order of GeoJSON and
 *   OpenRouteService; convert before doing any math with it
 * =============================================================================
 */

export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

/** [longitude, latitude] */
export type LngLatPair = readonly [number, number];

/**
 * Driving route in traversal order, as returned by the routing provider.
 * Holds at least two points once accepted by a RouteProvider.
 */
export type RoutePolyline = readonly LngLatPair[];

export function toLngLat(coordinate: Coordinate): LngLatPair {
  return [coordinate.longitude, coordinate.latitude];
}

export function fromLngLat([longitude, latitude]: LngLatPair): Coordinate {
  return { latitude, longitude };
}
