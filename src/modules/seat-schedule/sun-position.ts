/**
 * =============================================================================
 * SUN POSITION - Linear Daylight Model & Seat Decision
 * =============================================================================
 *
 * The sun is treated as rising at azimuth 0 at 06:00 and sweeping a 180°
 * arc at 15°/hour until it sets at 18:00. No declination or equation of
 * time correction is applied.
 * =============================================================================
 */

import { SCHEDULE_CONFIG, SeatSide } from '../../core/constants';

/**
 * Sun azimuth for a fractional hour of day
 *
 * @returns Degrees in [0, 180], or null while the sun is down
 */
export function sunAzimuth(hourOfDay: number): number | null {
  const { SUNRISE_HOUR, SUNSET_HOUR, AZIMUTH_DEGREES_PER_HOUR } = SCHEDULE_CONFIG;

  if (hourOfDay >= SUNRISE_HOUR && hourOfDay <= SUNSET_HOUR) {
    return (hourOfDay - SUNRISE_HOUR) * AZIMUTH_DEGREES_PER_HOUR;
  }
  return null;
}

/**
 * Side of the vehicle the sun shines on, given the heading and sun azimuth
 *
 * Both comparisons are strict: a relative angle of exactly 90° or 270°,
 * or a sun dead ahead/behind, counts as Right.
 */
export function decideSeat(bearing: number, azimuth: number | null): SeatSide {
  if (azimuth === null) {
    return SeatSide.NO_PREFERENCE;
  }

  const diff = (azimuth - bearing + 360) % 360;
  return diff > 90 && diff < 270 ? SeatSide.LEFT : SeatSide.RIGHT;
}
