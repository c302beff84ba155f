/**
 * =============================================================================
 * SCHEDULE BUILDER - Seat Side Over Time
 * =============================================================================
 *
 * Samples the trip every STEP_MINUTES (steps 0..totalSteps inclusive),
 * decides the sunny side at each sample and merges runs of equal decisions
 * into intervals. The final interval always ends at the true trip end,
 * which need not fall on a step boundary.
 *
 * Pure and synchronous: same input, same schedule.
 * =============================================================================
 */

import { SCHEDULE_CONFIG, SeatSide } from '../../core/constants';
import { Coordinate, RoutePolyline } from '../../shared/types/geo.types';
import { bearing } from '../../shared/utils/geospatial.utils';
import { TimePoint, addMinutes, formatClockTime, hourOfDay } from '../../shared/utils/time.utils';
import { interpolatedPosition } from './route-sampler';
import { ScheduleInterval, SeatSchedule } from './seat-schedule.schema';
import { decideSeat, sunAzimuth } from './sun-position';

export interface ScheduleInput {
  destination: Coordinate;
  route: RoutePolyline;
  start: TimePoint;
  durationMinutes: number;
}

function makeInterval(side: SeatSide, startsAt: TimePoint, endsAt: TimePoint): ScheduleInterval {
  return {
    side,
    startLabel: formatClockTime(startsAt),
    endLabel: formatClockTime(endsAt),
    // Own copies: adjacent intervals and the caller never share a Date
    startsAt: new Date(startsAt.getTime()),
    endsAt: new Date(endsAt.getTime()),
  };
}

export function buildSeatSchedule(input: ScheduleInput): SeatSchedule {
  const { destination, route, start, durationMinutes } = input;
  const step = SCHEDULE_CONFIG.STEP_MINUTES;
  const totalSteps = Math.floor(durationMinutes / step);

  const schedule: ScheduleInterval[] = [];
  let lastSeat: SeatSide | undefined;
  let intervalStart = start;

  for (let i = 0; i <= totalSteps; i++) {
    const currentTime = addMinutes(start, i * step);
    const azimuth = sunAzimuth(hourOfDay(currentTime));
    const position = interpolatedPosition(route, totalSteps, i);
    const seat = decideSeat(bearing(position, destination), azimuth);

    if (lastSeat === undefined) {
      lastSeat = seat;
    } else if (seat !== lastSeat) {
      schedule.push(makeInterval(lastSeat, intervalStart, currentTime));
      intervalStart = currentTime;
      lastSeat = seat;
    }
  }

  // Step 0 always runs, so lastSeat is set here
  if (lastSeat !== undefined) {
    schedule.push(makeInterval(lastSeat, intervalStart, addMinutes(start, durationMinutes)));
  }

  return schedule;
}
