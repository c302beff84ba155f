/**
 * =============================================================================
 * SEAT SCHEDULE SERVICE - Trip In, Seat Schedule Out
 * =============================================================================
 *
 * Single entry point for presentation layers:
 *   1. Validate trip parameters
 *   2. Geocode origin, then destination
 *   3. Fetch the driving route
 *   4. Build the schedule (pure, see schedule-builder.ts)
 *
 * Lookup collaborators are injected, so tests run against in-process stubs.
 * Known failures come back as values; anything else is rethrown.
 * =============================================================================
 */

import { SCHEDULE_CONFIG } from '../../core/constants';
import { InvalidInputError, RouteUnavailableError, isAppError } from '../../core/errors/AppError';
import { GeocodingProvider, RouteProvider } from '../../shared/types/lookup.types';
import { TimePoint } from '../../shared/utils/time.utils';
import { buildSeatSchedule } from './schedule-builder';
import { SeatSchedule, SeatScheduleOutcome } from './seat-schedule.schema';

export class SeatScheduleService {
  constructor(
    private readonly geocoder: GeocodingProvider,
    private readonly router: RouteProvider
  ) {}

  async suggestSeatSchedule(
    fromPlace: string,
    toPlace: string,
    startTime: TimePoint,
    durationMinutes: number
  ): Promise<SeatScheduleOutcome> {
    try {
      const data = await this.computeSchedule(fromPlace, toPlace, startTime, durationMinutes);
      return { success: true, data };
    } catch (error) {
      if (isAppError(error)) {
        return { success: false, error };
      }
      throw error;
    }
  }

  private async computeSchedule(
    fromPlace: string,
    toPlace: string,
    startTime: TimePoint,
    durationMinutes: number
  ): Promise<SeatSchedule> {
    validateTripInput(fromPlace, toPlace, startTime, durationMinutes);

    const origin = await this.geocoder.resolve(fromPlace);
    const destination = await this.geocoder.resolve(toPlace);
    const route = await this.router.route(origin, destination);
    if (route.length < 2) {
      throw new RouteUnavailableError('Route has fewer than 2 points', { points: route.length });
    }

    return buildSeatSchedule({ destination, route, start: startTime, durationMinutes });
  }
}

/**
 * Reject trips the schedule cannot meaningfully cover
 * @throws InvalidInputError
 */
export function validateTripInput(
  fromPlace: string,
  toPlace: string,
  startTime: TimePoint,
  durationMinutes: number
): void {
  const { MIN_DURATION_MINUTES, MAX_DURATION_MINUTES } = SCHEDULE_CONFIG;

  if (fromPlace.trim().length === 0) {
    throw new InvalidInputError('Origin place name must not be empty', { fromPlace });
  }
  if (toPlace.trim().length === 0) {
    throw new InvalidInputError('Destination place name must not be empty', { toPlace });
  }
  if (Number.isNaN(startTime.getTime())) {
    throw new InvalidInputError('Start time is not a valid date');
  }
  if (!Number.isInteger(durationMinutes)) {
    throw new InvalidInputError(`Duration must be a whole number of minutes: ${durationMinutes}`, { durationMinutes });
  }
  if (durationMinutes < MIN_DURATION_MINUTES || durationMinutes > MAX_DURATION_MINUTES) {
    throw new InvalidInputError(
      `Duration must be between ${MIN_DURATION_MINUTES} and ${MAX_DURATION_MINUTES} minutes: ${durationMinutes}`,
      { durationMinutes }
    );
  }
}
