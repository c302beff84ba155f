/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Prevents abuse by limiting request rates.
 *
 * - Global limiter for every route, configured from the environment
 * - Tighter limiter on the schedule endpoint: each request fans out to
 *   two geocoding calls and one routing call against rate-limited providers
 * - In-memory store per instance
 * =============================================================================
 */

import rateLimit from 'express-rate-limit';
import { config } from '../../config/environment';
import { ErrorCode, RATE_LIMITS } from '../../core/constants';
import { logger } from '../services/logger.service';

/**
 * Default rate limiter for all routes
 */
export const rateLimiter = rateLimit({
  windowMs: config.rateLimit.windowMs,
  limit: config.rateLimit.maxRequests,
  message: {
    success: false,
    error: {
      code: ErrorCode.RATE_LIMIT_EXCEEDED,
      message: 'Too many requests. Please try again later.'
    }
  },
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Seat schedule limiter
 * Protects the upstream geocoding/routing quotas
 */
export const scheduleRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.SCHEDULE.windowMs,
  limit: RATE_LIMITS.SCHEDULE.max,
  keyGenerator: (req) => `schedule:${req.ip || 'unknown'}`,
  handler: (req, res, _next, options) => {
    logger.warn(`🚫 Schedule rate limit exceeded: ${req.ip || 'unknown'}`);
    res.status(options.statusCode).json({
      success: false,
      error: {
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: 'Too many schedule requests. Please slow down.'
      }
    });
  },
  standardHeaders: true,
  legacyHeaders: false,
});
