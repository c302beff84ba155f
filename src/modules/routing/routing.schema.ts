/**
 * =============================================================================
 * ROUTING MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Payload shapes of the OpenRouteService directions API (GeoJSON format).
 *
 * KEY CONCEPTS:
 * - Coordinates travel as [longitude, latitude] in both directions
 * - features[0].geometry.coordinates is the route polyline
 * - Positions may carry a third (elevation) value, which is dropped
 * =============================================================================
 */

import { z } from 'zod';

// =============================================================================
// CONFIGURATION
// =============================================================================

export const ROUTING_CONFIG = {
  PROFILE: 'driving-car',

  // Cache key precision, 5 decimals is ~1 m
  COORDINATE_PRECISION: 5,
} as const;

/**
 * OpenRouteService error codes meaning "no route", not "service broken"
 * 2004: route distance exceeds the server limit
 * 2009: route could not be found
 * 2010: point not within a routable radius
 */
export const NO_ROUTE_ERROR_CODES: ReadonlySet<number> = new Set([2004, 2009, 2010]);

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

const positionSchema = z
  .array(z.number().finite())
  .min(2)
  .transform((position): [number, number] => [position[0], position[1]]);

export const directionsGeoJsonSchema = z.object({
  type: z.literal('FeatureCollection').optional(),
  features: z.array(
    z.object({
      geometry: z.object({
        type: z.literal('LineString'),
        coordinates: z.array(positionSchema),
      }),
      properties: z.object({
        summary: z.object({
          distance: z.number().optional(),
          duration: z.number().optional(),
        }).optional(),
      }).optional(),
    })
  ),
});

export const directionsErrorSchema = z.object({
  error: z.union([
    z.object({
      code: z.number(),
      message: z.string().optional(),
    }),
    z.string(),
  ]),
});
