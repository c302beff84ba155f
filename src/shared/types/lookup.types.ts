/**
 * =============================================================================
 * LOOKUP PROVIDER CONTRACTS
 * =============================================================================
 *
 * Boundaries to the external geocoding and routing services. The seat
 * schedule service only depends on these interfaces, so tests can hand it
 * in-process stubs.
 * =============================================================================
 */

import { Coordinate, RoutePolyline } from './geo.types';

export interface GeocodingProvider {
  /**
   * Resolve a free-text place name
   * @throws LocationNotFoundError when nothing matches
   */
  resolve(placeName: string): Promise<Coordinate>;
}

export interface RouteProvider {
  /**
   * Driving route between two points, (longitude, latitude) ordered
   * @throws RouteUnavailableError when no path exists
   */
  route(origin: Coordinate, destination: Coordinate): Promise<RoutePolyline>;
}

/**
 * Settings shared by HTTP lookup adapters
 */
export interface HttpLookupOptions {
  baseUrl: string;
  requestTimeoutMs: number;
}
