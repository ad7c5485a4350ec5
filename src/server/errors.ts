/**
 * HTTP error mapping
 *
 * Every error response carries the same body:
 * `{ error, error_code, timestamp }` where `error_code` is the status as a string.
 */

import { ValidationError } from '../errors/index.js';
import { isCancellation } from '../providers/errors.js';

export interface ErrorBody {
  error: string;
  error_code: string;
  timestamp: string;
}

/**
 * An error with the status it should be answered with.
 */
export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
    Object.setPrototypeOf(this, HttpError.prototype);
  }
}

export function errorBody(statusCode: number, message: string): ErrorBody {
  return {
    error: message,
    error_code: String(statusCode),
    timestamp: new Date().toISOString(),
  };
}

/** Client closed the request before the answer was ready */
export const CLIENT_CLOSED_REQUEST = 499;

export interface MappedError {
  statusCode: number;
  message: string;
}

/**
 * Map any thrown value to a status and the message the client may see.
 * Server-side failures never leak their message.
 */
export function mapError(error: unknown): MappedError {
  if (error instanceof HttpError) {
    return { statusCode: error.statusCode, message: error.message };
  }
  if (error instanceof ValidationError) {
    return { statusCode: 422, message: error.message };
  }
  if (isCancellation(error)) {
    return { statusCode: CLIENT_CLOSED_REQUEST, message: 'Request cancelled' };
  }
  // Fastify's own errors (malformed JSON, body too large, bad content type)
  if (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return { statusCode: error.statusCode, message: error.message };
  }
  return { statusCode: 500, message: 'Internal Server Error' };
}
