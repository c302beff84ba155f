/**
 * =============================================================================
 * SEAT SCHEDULE MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * KEY CONCEPTS:
 * - ScheduleInterval: maximal time span with one recommended seat side
 * - SeatSchedule: ordered intervals tiling [start, start + duration]
 *
 * EXAMPLE:
 * East-bound trip, 08:00 for 40 minutes:
 *   [{ side: 'right', startLabel: '08:00', endLabel: '08:40' }]
 * =============================================================================
 */

import { z } from 'zod';
import { SCHEDULE_CONFIG, SeatSide } from '../../core/constants';
import { AppError } from '../../core/errors/AppError';
import { TimePoint } from '../../shared/utils/time.utils';

// =============================================================================
// CORE TYPES
// =============================================================================

export interface ScheduleInterval {
  readonly side: SeatSide;
  readonly startLabel: string;   // HH:MM
  readonly endLabel: string;     // HH:MM
  readonly startsAt: TimePoint;
  readonly endsAt: TimePoint;
}

export type SeatSchedule = readonly ScheduleInterval[];

/**
 * Outcome of a schedule request
 * Failures carry an AppError whose `code` names the failure kind
 */
export type SeatScheduleOutcome =
  | { success: true; data: SeatSchedule }
  | { success: false; error: AppError };

// =============================================================================
// REQUEST VALIDATION
// =============================================================================

export const seatScheduleRequestSchema = z.object({
  from: z.string().trim().min(1, 'Origin place is required').max(200),
  to: z.string().trim().min(1, 'Destination place is required').max(200),
  startTime: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'startTime must be HH:MM (24-hour)').optional(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD').optional(),
  durationMinutes: z.number()
    .int()
    .min(SCHEDULE_CONFIG.MIN_DURATION_MINUTES)
    .max(SCHEDULE_CONFIG.MAX_DURATION_MINUTES),
});

// =============================================================================
// RESPONSE TYPES
// =============================================================================

export interface ScheduleIntervalView {
  side: SeatSide;
  sideLabel: string;
  start: string;
  end: string;
  summary: string;
}

export interface SeatScheduleView {
  from: string;
  to: string;
  startTime: string;
  endTime: string;
  durationMinutes: number;
  intervals: ScheduleIntervalView[];
}
