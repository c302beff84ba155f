/**
 * =============================================================================
 * HTTP UTILITIES - Outbound JSON Requests
 * =============================================================================
 *
 * Thin wrapper over global fetch used by the lookup adapters.
 * Transport failures (DNS, refused connection, timeout, unreadable body)
 * become ServiceUnavailableError with the caller's error code; HTTP status
 * handling is left to the caller.
 * =============================================================================
 */

import { ErrorCode } from '../../core/constants';
import { ServiceUnavailableError } from '../../core/errors/AppError';
import { logger } from '../services/logger.service';

export interface JsonResponse {
  ok: boolean;
  status: number;
  body: unknown;
  durationMs: number;
}

export interface FetchJsonOptions {
  service: string;
  timeoutMs: number;
  failureCode: ErrorCode;
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

export async function fetchJson(
  url: string,
  init: RequestInit,
  options: FetchJsonOptions
): Promise<JsonResponse> {
  const startTime = Date.now();

  let response: Response;
  let text: string;
  try {
    response = await fetch(url, { ...init, signal: AbortSignal.timeout(options.timeoutMs) });
    text = await response.text();
  } catch (error) {
    logger.error(`${options.service} request failed`, { error: describeError(error) });
    throw new ServiceUnavailableError(`${options.service} is unreachable`, options.failureCode);
  }

  let body: unknown = null;
  if (text.length > 0) {
    try {
      body = JSON.parse(text);
    } catch (error) {
      logger.error(`${options.service} returned malformed JSON`, {
        status: response.status,
        error: describeError(error),
      });
      throw new ServiceUnavailableError(
        `${options.service} returned an unreadable response`,
        options.failureCode,
        { status: response.status }
      );
    }
  }

  return {
    ok: response.ok,
    status: response.status,
    body,
    durationMs: Date.now() - startTime,
  };
}
