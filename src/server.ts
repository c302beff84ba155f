/**
 * =============================================================================
 * SUNSEAT BACKEND - MAIN SERVER
 * =============================================================================
 *
 * Sunlight-aware seat recommendations for road journeys.
 *
 * MODULES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ SEAT SCHEDULE │ Which side the sun is on, interval by interval        │
 * │ GEOCODING     │ Place name -> coordinates (Nominatim)                 │
 * │ ROUTING       │ Driving route polyline (OpenRouteService)             │
 * └─────────────────────────────────────────────────────────────────────────┘
 * =============================================================================
 */

import { createServer } from 'http';
import { createApp } from './app';
import { config } from './config/environment';
import { validateAndLogEnvironment } from './core/config/env.validation';
import { API_PREFIX } from './core/constants';
import { createSeatScheduleService } from './modules/seat-schedule';
import { createCacheService } from './shared/services/cache.service';
import { logger } from './shared/services/logger.service';

async function bootstrap(): Promise<void> {
  // Fail fast if config is invalid
  validateAndLogEnvironment();

  const cache = await createCacheService({
    redisEnabled: config.redis.enabled,
    redisUrl: config.redis.url,
  });

  const seatScheduleService = createSeatScheduleService(cache);
  const app = createApp({ seatScheduleService, cache });
  const server = createServer(app);

  server.listen(config.port, config.host, () => {
    logger.info(`🚀 SunSeat backend listening on http://${config.host}:${config.port}`);
    logger.info(`   Schedule endpoint: POST ${API_PREFIX}/seat-schedule`);
    if (!config.openRouteService.enabled) {
      logger.warn('   ORS_API_KEY not set - schedule requests will fail with 503');
    }
  });

  // =============================================================================
  // GRACEFUL SHUTDOWN
  // =============================================================================
  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down`);
    server.close((closeError) => {
      if (closeError) {
        logger.error('Error while closing HTTP server', { error: closeError.message });
      }
      cache.close()
        .then(() => process.exit(closeError ? 1 : 0))
        .catch((error: unknown) => {
          logger.error('Error while closing cache', {
            error: error instanceof Error ? error.message : String(error)
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((error: unknown) => {
  logger.error('❌ Failed to start server', {
    error: error instanceof Error ? error.message : String(error)
  });
  process.exit(1);
});
