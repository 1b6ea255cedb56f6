/**
 * Error mapping utilities for the renterd client
 * @module renterd-client/errors/mapping
 */

import { RenterdError } from './error.js';
import {
  AuthError,
  HttpResponseError,
  NotFoundError,
  RangeNotSatisfiableError,
  TransportError,
} from './categories.js';

/**
 * Maps an error status returned by the api to a RenterdError
 *
 * @param status - HTTP status code (>= 400)
 * @param text - Trimmed response body
 * @param path - Request path, used in not-found messages
 */
export function mapHttpStatusToError(status: number, text: string, path?: string): RenterdError {
  switch (status) {
    case 401:
      return AuthError.incorrectPassword();

    case 404:
      return NotFoundError.resource(path);

    case 416:
      return new RangeNotSatisfiableError({
        message: text || 'requested range not satisfiable',
        code: 'InvalidRange',
        status,
      });

    default:
      return HttpResponseError.fromResponse(status, text);
  }
}

/**
 * Type guard for RenterdError
 */
export function isRenterdError(error: unknown): error is RenterdError {
  return error instanceof RenterdError;
}

/**
 * Checks if an error can be retried by the caller
 */
export function isRetryableError(error: unknown): boolean {
  return isRenterdError(error) && error.isRetryable;
}

/**
 * Wraps an unknown thrown value into a RenterdError
 */
export function wrapError(error: unknown): RenterdError {
  if (isRenterdError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return TransportError.connectionFailed(error.message, error);
  }

  return TransportError.connectionFailed(String(error), error);
}
