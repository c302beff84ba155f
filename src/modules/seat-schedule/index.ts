/**
 * Seat schedule module - public surface and default wiring
 */

import { config as appConfig } from '../../config/environment';
import { CacheService } from '../../shared/services/cache.service';
import { NominatimGeocodingService } from '../geocoding/nominatim.service';
import { OpenRouteService } from '../routing/openroute.service';
import { SeatScheduleService } from './seat-schedule.service';

export { SeatScheduleService, validateTripInput } from './seat-schedule.service';
export { buildSeatSchedule } from './schedule-builder';
export { interpolatedPosition } from './route-sampler';
export { sunAzimuth, decideSeat } from './sun-position';
export { createSeatScheduleRouter } from './seat-schedule.routes';
export * from './seat-schedule.schema';

export interface SeatScheduleServiceConfig {
  openRouteService: { apiKey: string; baseUrl: string };
  nominatim: { baseUrl: string; userAgent: string };
  lookup: { requestTimeoutMs: number };
}

/**
 * Wire the service to the real lookup providers.
 * Credentials come in through `settings`, never from module state.
 */
export function createSeatScheduleService(
  cache: CacheService,
  settings: SeatScheduleServiceConfig = appConfig
): SeatScheduleService {
  const geocoder = new NominatimGeocodingService(
    {
      baseUrl: settings.nominatim.baseUrl,
      userAgent: settings.nominatim.userAgent,
      requestTimeoutMs: settings.lookup.requestTimeoutMs,
    },
    cache
  );

  const router = new OpenRouteService(
    {
      apiKey: settings.openRouteService.apiKey,
      baseUrl: settings.openRouteService.baseUrl,
      requestTimeoutMs: settings.lookup.requestTimeoutMs,
    },
    cache
  );

  return new SeatScheduleService(geocoder, router);
}
