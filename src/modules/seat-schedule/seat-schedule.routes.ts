/**
 * =============================================================================
 * SEAT SCHEDULE ROUTES
 * =============================================================================
 *
 * POST /api/v1/seat-schedule
 *
 * Request:
 * {
 *   "from": "Times Square, New York",
 *   "to": "Central Park, New York",
 *   "startTime": "08:00",        // optional: defaults to the server's current time
 *   "date": "2024-06-01",        // optional: defaults to today's server date
 *   "durationMinutes": 40
 * }
 *
 * Response:
 * {
 *   "success": true,
 *   "data": {
 *     "from": "Times Square, New York",
 *     "to": "Central Park, New York",
 *     "startTime": "08:00",
 *     "endTime": "08:40",
 *     "durationMinutes": 40,
 *     "intervals": [
 *       {
 *         "side": "right",
 *         "sideLabel": "Right",
 *         "start": "08:00",
 *         "end": "08:40",
 *         "summary": "08:00 → 08:40: Sun is on the Right side of the vehicle"
 *       }
 *     ]
 *   }
 * }
 * =============================================================================
 */

import { Request, Response, Router } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { InvalidInputError, ValidationError } from '../../core/errors/AppError';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { scheduleRateLimiter } from '../../shared/middleware/rate-limiter.middleware';
import { logger } from '../../shared/services/logger.service';
import { localClockString, localDateString, parseTimePoint } from '../../shared/utils/time.utils';
import { buildScheduleView } from './seat-schedule-view.helper';
import { seatScheduleRequestSchema } from './seat-schedule.schema';
import { SeatScheduleService } from './seat-schedule.service';

export function createSeatScheduleRouter(
  service: SeatScheduleService,
  now: () => Date = () => new Date()
): Router {
  const router = Router();

  router.post('/', scheduleRateLimiter, asyncHandler(async (req: Request, res: Response) => {
    const parsed = seatScheduleRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw ValidationError.fromZodError(parsed.error);
    }

    const { from, to, durationMinutes } = parsed.data;
    const requestedAt = now();
    const date = parsed.data.date ?? localDateString(requestedAt);
    const startTime = parsed.data.startTime ?? localClockString(requestedAt);

    const start = parseTimePoint(date, startTime);
    if (!start) {
      throw new InvalidInputError(`Not a valid calendar date: ${date}`, { date });
    }

    const outcome = await service.suggestSeatSchedule(from, to, start, durationMinutes);
    if (!outcome.success) {
      throw outcome.error;
    }

    logger.debug(`Seat schedule: "${from}" -> "${to}" produced ${outcome.data.length} interval(s)`);

    ApiResponse.success(res, buildScheduleView({ from, to, start, durationMinutes }, outcome.data));
  }));

  return router;
}
