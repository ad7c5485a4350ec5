/**
 * Maps SDK failures onto UpstreamServiceError kinds.
 *
 * The OpenAI and Anthropic SDKs share the same error hierarchy (generated
 * by the same tool) but export distinct classes, so each provider passes
 * its own set in.
 */

import { UpstreamServiceError, type UpstreamErrorKind } from '../errors/index.js';
import { TimeoutError } from '../utils/timeout.js';

type ErrorClass = abstract new (...args: never[]) => Error;

export interface SdkErrorClasses {
  APIUserAbortError: ErrorClass;
  APIConnectionTimeoutError: ErrorClass;
  APIConnectionError: ErrorClass;
  RateLimitError: ErrorClass;
  AuthenticationError: ErrorClass;
  PermissionDeniedError: ErrorClass;
  APIError: ErrorClass;
}

function classify(error: unknown, classes: SdkErrorClasses, signal?: AbortSignal): UpstreamErrorKind {
  if (signal?.aborted) return 'cancelled';
  if (error instanceof TimeoutError) return 'timeout';
  // Order matters: the specific classes all extend APIError
  if (error instanceof classes.APIUserAbortError) return 'cancelled';
  if (error instanceof classes.APIConnectionTimeoutError) return 'timeout';
  if (error instanceof classes.APIConnectionError) return 'network';
  if (error instanceof classes.RateLimitError) return 'quota';
  if (error instanceof classes.AuthenticationError) return 'auth';
  if (error instanceof classes.PermissionDeniedError) return 'auth';
  if (error instanceof classes.APIError) return 'api';
  if (error instanceof Error && error.name === 'AbortError') return 'cancelled';
  return 'network';
}

/**
 * Wrap any failure from an SDK call. UpstreamServiceErrors pass through.
 *
 * @param signal - the caller's signal; when it has fired, the failure is
 *   reported as `cancelled` whatever the SDK threw
 */
export function toUpstreamError(
  provider: string,
  error: unknown,
  classes: SdkErrorClasses,
  signal?: AbortSignal
): UpstreamServiceError {
  if (error instanceof UpstreamServiceError) {
    return error;
  }
  const kind = classify(error, classes, signal);
  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamServiceError(provider, kind, message, error);
}

/**
 * True when an error means the caller gave up, not that the upstream failed.
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof UpstreamServiceError) {
    return error.kind === 'cancelled';
  }
  return error instanceof Error && error.name === 'AbortError';
}
