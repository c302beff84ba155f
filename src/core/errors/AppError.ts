/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In a lookup adapter
 * throw new LocationNotFoundError('Atlantis');
 *
 * // In a caller
 * if (outcome.error.code === ErrorCode.ROUTE_UNAVAILABLE) { ... }
 * ```
 *
 * Every error carries a machine-readable code, so failure kinds can be
 * checked without matching on message text.
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * 400 Validation Error - Schema validation failed
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = []
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.VALIDATION_ERROR, true, { errors });
    this.errors = errors;
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError('Validation failed', errors);
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * 400 Invalid Input - Trip parameters the schedule cannot be built from
 */
export class InvalidInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.INVALID_INPUT, true, details);
  }
}

/**
 * 404 Location Not Found - Geocoder has no match for a place name
 */
export class LocationNotFoundError extends AppError {
  public readonly placeName: string;

  constructor(placeName: string) {
    super(
      `Could not find location: ${placeName}`,
      HTTP_STATUS.NOT_FOUND,
      ErrorCode.LOCATION_NOT_FOUND,
      true,
      { placeName }
    );
    this.placeName = placeName;
  }
}

/**
 * 422 Route Unavailable - No drivable path between the endpoints
 */
export class RouteUnavailableError extends AppError {
  constructor(message: string = 'No driving route between the given locations', details?: Record<string, unknown>) {
    super(message, HTTP_STATUS.UNPROCESSABLE, ErrorCode.ROUTE_UNAVAILABLE, true, details);
  }
}

/**
 * 503 Service Unavailable - Dependency down
 */
export class ServiceUnavailableError extends AppError {
  constructor(
    message: string = 'Service temporarily unavailable',
    code: ErrorCode = ErrorCode.SERVICE_UNAVAILABLE,
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.SERVICE_UNAVAILABLE, code, true, details);
  }
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
