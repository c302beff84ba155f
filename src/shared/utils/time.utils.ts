/**
 * =============================================================================
 * TIME UTILITIES - Naive Wall-Clock Time
 * =============================================================================
 *
 * Trip times are naive local wall-clock instants with no timezone.
 * A TimePoint is a Date whose UTC fields hold the wall-clock fields, so
 * arithmetic and formatting give the same result on any host timezone and
 * never shift across daylight-saving transitions.
 * =============================================================================
 */

/** Naive wall-clock instant; read it only through the helpers below */
export type TimePoint = Date;

const MS_PER_MINUTE = 60 * 1000;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Build a TimePoint from wall-clock fields (month is 1-based)
 */
export function createTimePoint(
  year: number,
  month: number,
  day: number,
  hour: number = 0,
  minute: number = 0
): TimePoint {
  return new Date(Date.UTC(year, month - 1, day, hour, minute));
}

/**
 * Parse "YYYY-MM-DD" and "HH:MM" into a TimePoint
 *
 * @returns null when either part is malformed or the date does not exist
 */
export function parseTimePoint(date: string, clock: string): TimePoint | null {
  const dateMatch = DATE_PATTERN.exec(date);
  const clockMatch = CLOCK_PATTERN.exec(clock);
  if (!dateMatch || !clockMatch) return null;

  const [year, month, day] = [Number(dateMatch[1]), Number(dateMatch[2]), Number(dateMatch[3])];
  const point = createTimePoint(year, month, day, Number(clockMatch[1]), Number(clockMatch[2]));

  // Reject rollovers such as 2024-02-30
  if (point.getUTCFullYear() !== year || point.getUTCMonth() !== month - 1 || point.getUTCDate() !== day) {
    return null;
  }

  return point;
}

/**
 * Wall-clock date of a real instant in the host's local timezone, as "YYYY-MM-DD"
 */
export function localDateString(instant: Date): string {
  const year = instant.getFullYear();
  const month = String(instant.getMonth() + 1).padStart(2, '0');
  const day = String(instant.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Wall-clock time of a real instant in the host's local timezone, as "HH:MM"
 */
export function localClockString(instant: Date): string {
  const hours = String(instant.getHours()).padStart(2, '0');
  const minutes = String(instant.getMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
}

export function addMinutes(time: TimePoint, minutes: number): TimePoint {
  return new Date(time.getTime() + minutes * MS_PER_MINUTE);
}

/**
 * Fractional hour of day in [0, 24), e.g. 08:30 -> 8.5
 */
export function hourOfDay(time: TimePoint): number {
  return time.getUTCHours() + time.getUTCMinutes() / 60;
}

/**
 * Zero-padded 24-hour "HH:MM"
 */
export function formatClockTime(time: TimePoint): string {
  const hours = String(time.getUTCHours()).padStart(2, '0');
  const minutes = String(time.getUTCMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
}
