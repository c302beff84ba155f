/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health        - Quick health check (for load balancers)
 * - GET /health/live   - Liveness probe (is the process running?)
 * - GET /health/ready  - Readiness probe (is the lookup cache usable?)
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { CacheService } from '../services/cache.service';
import { logger } from '../services/logger.service';
import { asyncHandler } from '../middleware/error.middleware';

export function createHealthRouter(cache: CacheService): Router {
  const router = Router();
  const startTime = Date.now();

  /**
   * Basic health check - for load balancers
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString()
    });
  });

  /**
   * Liveness probe - is the process alive?
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    });
  });

  /**
   * Readiness probe - round-trips a value through the cache
   */
  router.get('/health/ready', asyncHandler(async (_req: Request, res: Response) => {
    let cacheOk = false;
    try {
      await cache.set('health_check', 'ok', 10);
      cacheOk = (await cache.get<string>('health_check')) === 'ok';
    } catch (error) {
      logger.warn('Readiness cache check failed', {
        error: error instanceof Error ? error.message : String(error)
      });
    }

    res.status(cacheOk ? 200 : 503).json({
      status: cacheOk ? 'ready' : 'not_ready',
      checks: { cache: cacheOk },
      timestamp: new Date().toISOString()
    });
  }));

  return router;
}
