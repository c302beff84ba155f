/**
 * Response shaping for seat schedules.
 */

import { SEAT_SIDE_DISPLAY_NAMES } from '../../core/constants';
import { TimePoint, addMinutes, formatClockTime } from '../../shared/utils/time.utils';
import { ScheduleInterval, ScheduleIntervalView, SeatSchedule, SeatScheduleView } from './seat-schedule.schema';

export function describeInterval(interval: ScheduleInterval): string {
  const side = SEAT_SIDE_DISPLAY_NAMES[interval.side];
  return `${interval.startLabel} → ${interval.endLabel}: Sun is on the ${side} side of the vehicle`;
}

export function toIntervalView(interval: ScheduleInterval): ScheduleIntervalView {
  return {
    side: interval.side,
    sideLabel: SEAT_SIDE_DISPLAY_NAMES[interval.side],
    start: interval.startLabel,
    end: interval.endLabel,
    summary: describeInterval(interval),
  };
}

export function buildScheduleView(
  trip: { from: string; to: string; start: TimePoint; durationMinutes: number },
  schedule: SeatSchedule
): SeatScheduleView {
  return {
    from: trip.from,
    to: trip.to,
    startTime: formatClockTime(trip.start),
    endTime: formatClockTime(addMinutes(trip.start, trip.durationMinutes)),
    durationMinutes: trip.durationMinutes,
    intervals: schedule.map(toIntervalView),
  };
}
