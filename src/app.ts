/**
 * =============================================================================
 * EXPRESS APPLICATION
 * =============================================================================
 *
 * Builds the HTTP app from its collaborators so tests can mount it with
 * stub lookup providers and no network access.
 *
 * MIDDLEWARE ORDER:
 *   request id -> security headers -> CORS -> compression -> JSON body
 *   -> request logging -> rate limiting -> routes -> 404 -> error handler
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { config } from './config/environment';
import { API_PREFIX } from './core/constants';
import { createSeatScheduleRouter } from './modules/seat-schedule/seat-schedule.routes';
import { SeatScheduleService } from './modules/seat-schedule/seat-schedule.service';
import { errorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { rateLimiter } from './shared/middleware/rate-limiter.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { requestIdMiddleware, securityHeaders } from './shared/middleware/security.middleware';
import { createHealthRouter } from './shared/routes/health.routes';
import { CacheService } from './shared/services/cache.service';

export interface AppDependencies {
  seatScheduleService: SeatScheduleService;
  cache: CacheService;
  /** Clock used to default the trip date */
  now?: () => Date;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', 1);

  app.use(requestIdMiddleware);
  app.use(securityHeaders);
  app.use(cors({ origin: config.cors.origin }));
  app.use(compression());
  app.use(express.json({ limit: '10kb' }));
  app.use(requestLogger);
  app.use(rateLimiter);

  app.use(createHealthRouter(deps.cache));
  app.use(`${API_PREFIX}/seat-schedule`, createSeatScheduleRouter(deps.seatScheduleService, deps.now));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
