import { Coordinate, RoutePolyline, fromLngLat } from '../../shared/types/geo.types';

/**
 * Position along the route for a sampling step.
 *
 * Maps `stepIndex / totalSteps` linearly onto the point indices and takes
 * the nearest preceding point, so samples follow point density rather than
 * travelled distance. The point is converted from the provider's
 * (longitude, latitude) order.
 *
 * With `totalSteps` of 0 only step 0 exists and the first point is returned.
 */
export function interpolatedPosition(
  route: RoutePolyline,
  totalSteps: number,
  stepIndex: number
): Coordinate {
  if (route.length === 0) {
    throw new RangeError('Route polyline has no points');
  }

  const progress = totalSteps > 0 ? stepIndex / totalSteps : 0;
  const index = Math.min(Math.floor(progress * (route.length - 1)), route.length - 1);

  return fromLngLat(route[Math.max(index, 0)]);
}
