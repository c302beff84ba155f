/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 * Import from '../core/constants' in other modules.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Type safety with enums
 * =============================================================================
 */

// =============================================================================
// SEAT SIDES
// =============================================================================

/**
 * Side of the vehicle the sun shines on
 */
export enum SeatSide {
  LEFT = 'left',
  RIGHT = 'right',
  NO_PREFERENCE = 'no_preference'   // Sun is down, any seat will do
}

/**
 * Seat side display names (for rendered schedules)
 */
export const SEAT_SIDE_DISPLAY_NAMES: Record<SeatSide, string> = {
  [SeatSide.LEFT]: 'Left',
  [SeatSide.RIGHT]: 'Right',
  [SeatSide.NO_PREFERENCE]: 'Any (Night)'
};

// =============================================================================
// SCHEDULE MODEL
// =============================================================================

export const SCHEDULE_CONFIG = {
  // Minutes between heading/sun samples
  STEP_MINUTES: 10,

  // Linear daylight window, hours of day (inclusive)
  SUNRISE_HOUR: 6,
  SUNSET_HOUR: 18,

  // 180° arc over 12 hours
  AZIMUTH_DEGREES_PER_HOUR: 15,

  // Accepted trip durations
  MIN_DURATION_MINUTES: 10,
  MAX_DURATION_MINUTES: 1440
} as const;

// =============================================================================
// API CONFIGURATION
// =============================================================================

/**
 * API versioning
 */
export const API_VERSION = 'v1';
export const API_PREFIX = `/api/${API_VERSION}`;

/**
 * Rate limiting tiers
 */
export const RATE_LIMITS = {
  // Each schedule request costs two geocodes and one route
  SCHEDULE: { windowMs: 60 * 1000, max: 30 }      // 30 req/min
} as const;

// =============================================================================
// HTTP STATUS CODES (for consistency)
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  UNPROCESSABLE: 422,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Application-specific error codes
 *
 * Callers branch on these codes, never on error messages.
 */
export enum ErrorCode {
  // Validation
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',

  // Lookups
  LOCATION_NOT_FOUND = 'LOCATION_NOT_FOUND',
  ROUTE_UNAVAILABLE = 'ROUTE_UNAVAILABLE',

  // System / infrastructure
  GEOCODING_FAILED = 'GEOCODING_FAILED',
  ROUTING_FAILED = 'ROUTING_FAILED',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  NOT_FOUND = 'NOT_FOUND'
}

// =============================================================================
// CACHE KEYS & TTL
// =============================================================================

export const CACHE = {
  // Key prefixes
  PREFIX: {
    ROOT: 'sunseat:',
    GEOCODE: 'geocode:v1',
    ROUTE: 'route:v1'
  },

  // TTL in seconds
  TTL: {
    GEOCODE: 24 * 60 * 60,   // 24 hours - place names are stable
    ROUTE: 60 * 60           // 1 hour
  }
} as const;
