/**
 * =============================================================================
 * NOMINATIM GEOCODING SERVICE - Place Name to Coordinates
 * =============================================================================
 *
 * Forward geocoding against an OpenStreetMap Nominatim instance:
 *   GET {baseUrl}/search?q=<place>&format=json&limit=1
 *
 * - Best match only (limit=1)
 * - Results cached for 24 hours, keyed by the normalized place name
 * - The public instance requires an identifying User-Agent
 * =============================================================================
 */

import { z } from 'zod';
import { CACHE, ErrorCode } from '../../core/constants';
import { InvalidInputError, LocationNotFoundError, ServiceUnavailableError } from '../../core/errors/AppError';
import { CacheService } from '../../shared/services/cache.service';
import { logger } from '../../shared/services/logger.service';
import { Coordinate } from '../../shared/types/geo.types';
import { GeocodingProvider, HttpLookupOptions } from '../../shared/types/lookup.types';
import { fetchJson } from '../../shared/utils/http.utils';

// =============================================================================
// TYPES
// =============================================================================

export interface NominatimOptions extends HttpLookupOptions {
  userAgent: string;
}

// Nominatim returns coordinates as decimal strings
const nominatimSearchSchema = z.array(
  z.object({
    lat: z.coerce.number().min(-90).max(90),
    lon: z.coerce.number().min(-180).max(180),
    display_name: z.string().optional(),
  })
);

// =============================================================================
// NOMINATIM SERVICE CLASS
// =============================================================================

export class NominatimGeocodingService implements GeocodingProvider {
  constructor(
    private readonly options: NominatimOptions,
    private readonly cache: CacheService
  ) {}

  async resolve(placeName: string): Promise<Coordinate> {
    const query = placeName.trim();
    if (query.length === 0) {
      throw new InvalidInputError('Place name must not be empty', { placeName });
    }

    const cacheKey = CacheService.buildKey(CACHE.PREFIX.GEOCODE, { q: query.toLowerCase() });
    const cached = await this.cache.get<Coordinate>(cacheKey);
    if (cached) {
      logger.debug(`📍 Geocoding cache HIT for "${query}"`);
      return cached;
    }

    const params = new URLSearchParams({ q: query, format: 'json', limit: '1' });
    const response = await fetchJson(
      `${this.options.baseUrl}/search?${params.toString()}`,
      {
        method: 'GET',
        headers: {
          'Accept': 'application/json',
          'User-Agent': this.options.userAgent,
        },
      },
      {
        service: 'Nominatim geocoder',
        timeoutMs: this.options.requestTimeoutMs,
        failureCode: ErrorCode.GEOCODING_FAILED,
      }
    );

    if (!response.ok) {
      logger.error(`Nominatim error: HTTP ${response.status}`, { query });
      throw new ServiceUnavailableError(
        `Geocoding failed with HTTP ${response.status}`,
        ErrorCode.GEOCODING_FAILED,
        { status: response.status }
      );
    }

    const parsed = nominatimSearchSchema.safeParse(response.body);
    if (!parsed.success) {
      logger.error('Nominatim returned an unexpected payload', { query });
      throw new ServiceUnavailableError('Unexpected geocoding response', ErrorCode.GEOCODING_FAILED);
    }

    const match = parsed.data[0];
    if (!match) {
      logger.info(`Geocoding: no match for "${query}"`);
      throw new LocationNotFoundError(placeName);
    }

    const coordinate: Coordinate = { latitude: match.lat, longitude: match.lon };
    logger.debug(`📍 Nominatim: "${query}" -> ${match.display_name ?? 'unnamed'} - ${response.durationMs}ms`, {
      latitude: coordinate.latitude,
      longitude: coordinate.longitude,
    });

    await this.cache.set(cacheKey, coordinate, CACHE.TTL.GEOCODE);
    return coordinate;
  }
}
