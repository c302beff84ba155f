/**
 * =============================================================================
 * OPENROUTESERVICE ROUTING - Driving Route Polylines
 * =============================================================================
 *
 * POST {baseUrl}/v2/directions/driving-car/geojson
 *   body:  { "coordinates": [[lng, lat], [lng, lat]] }
 *   auth:  API key in the Authorization header
 *
 * - Polylines stay in the provider's [longitude, latitude] order
 * - Routes cached for 1 hour, keyed by endpoints at ~1 m precision
 * - "No route" answers become RouteUnavailableError; outages become
 *   ServiceUnavailableError so callers can tell them apart
 * =============================================================================
 */

import { CACHE, ErrorCode } from '../../core/constants';
import { RouteUnavailableError, ServiceUnavailableError } from '../../core/errors/AppError';
import { CacheService } from '../../shared/services/cache.service';
import { logger } from '../../shared/services/logger.service';
import { Coordinate, LngLatPair, RoutePolyline, toLngLat } from '../../shared/types/geo.types';
import { HttpLookupOptions, RouteProvider } from '../../shared/types/lookup.types';
import { haversineDistanceKm } from '../../shared/utils/geospatial.utils';
import { fetchJson } from '../../shared/utils/http.utils';
import {
  NO_ROUTE_ERROR_CODES,
  ROUTING_CONFIG,
  directionsErrorSchema,
  directionsGeoJsonSchema,
} from './routing.schema';

export interface OpenRouteServiceOptions extends HttpLookupOptions {
  apiKey: string;
}

export class OpenRouteService implements RouteProvider {
  constructor(
    private readonly options: OpenRouteServiceOptions,
    private readonly cache: CacheService
  ) {}

  /**
   * Check if service is available (API key configured)
   */
  isAvailable(): boolean {
    return this.options.apiKey.length > 0;
  }

  async route(origin: Coordinate, destination: Coordinate): Promise<RoutePolyline> {
    if (!this.isAvailable()) {
      logger.warn('OpenRouteService API key not configured');
      throw new ServiceUnavailableError(
        'Routing service not configured. Add ORS_API_KEY.',
        ErrorCode.ROUTING_FAILED
      );
    }

    const precision = ROUTING_CONFIG.COORDINATE_PRECISION;
    const cacheKey = CacheService.buildKey(CACHE.PREFIX.ROUTE, {
      profile: ROUTING_CONFIG.PROFILE,
      from: `${origin.latitude.toFixed(precision)},${origin.longitude.toFixed(precision)}`,
      to: `${destination.latitude.toFixed(precision)},${destination.longitude.toFixed(precision)}`,
    });

    const cached = await this.cache.get<LngLatPair[]>(cacheKey);
    if (cached) {
      logger.debug(`📍 Route cache HIT (${cached.length} points)`);
      return cached;
    }

    const response = await fetchJson(
      `${this.options.baseUrl}/v2/directions/${ROUTING_CONFIG.PROFILE}/geojson`,
      {
        method: 'POST',
        headers: {
          'Authorization': this.options.apiKey,
          'Content-Type': 'application/json',
          'Accept': 'application/geo+json, application/json',
        },
        body: JSON.stringify({ coordinates: [toLngLat(origin), toLngLat(destination)] }),
      },
      {
        service: 'OpenRouteService',
        timeoutMs: this.options.requestTimeoutMs,
        failureCode: ErrorCode.ROUTING_FAILED,
      }
    );

    if (!response.ok) {
      throw this.errorForStatus(response.status, response.body);
    }

    const parsed = directionsGeoJsonSchema.safeParse(response.body);
    if (!parsed.success) {
      logger.error('OpenRouteService returned an unexpected payload');
      throw new ServiceUnavailableError('Unexpected routing response', ErrorCode.ROUTING_FAILED);
    }

    const feature = parsed.data.features[0];
    if (!feature || feature.geometry.coordinates.length < 2) {
      throw new RouteUnavailableError('Routing service returned no usable path', {
        points: feature ? feature.geometry.coordinates.length : 0,
      });
    }

    const polyline: LngLatPair[] = feature.geometry.coordinates;
    logger.debug(
      `📍 OpenRouteService: ${polyline.length} points, ` +
      `${haversineDistanceKm(origin, destination).toFixed(1)} km straight line - ${response.durationMs}ms`
    );

    await this.cache.set(cacheKey, polyline, CACHE.TTL.ROUTE);
    return polyline;
  }

  private errorForStatus(status: number, body: unknown): Error {
    const parsedError = directionsErrorSchema.safeParse(body);
    const providerError = parsedError.success ? parsedError.data.error : undefined;
    const providerCode = typeof providerError === 'object' ? providerError.code : undefined;
    const providerMessage = typeof providerError === 'object' ? providerError.message : providerError;

    if (status === 404 || (providerCode !== undefined && NO_ROUTE_ERROR_CODES.has(providerCode))) {
      logger.info('OpenRouteService found no route', { status, providerCode });
      return new RouteUnavailableError(
        providerMessage ?? 'No driving route between the given locations',
        { status, providerCode }
      );
    }

    logger.error(`OpenRouteService error: HTTP ${status}`, { providerCode, providerMessage });
    return new ServiceUnavailableError(
      `Routing failed with HTTP ${status}`,
      ErrorCode.ROUTING_FAILED,
      { status }
    );
  }
}
