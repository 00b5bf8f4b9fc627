import { AppError } from '../errors/AppError.js';
import { mapError } from '../errors/mapError.js';
import { TransportErrorCode } from '../transport/jsonRpc.js';

/**
 * Determines if an error is transient and a handler call may be retried.
 *
 * Retryable errors:
 * - UPSTREAM errors whose wire code is UpstreamUnavailable or Timeout
 *
 * Non-retryable errors:
 * - UPSTREAM errors with InvalidParams / NotFound (same call fails the same way)
 * - TIMEOUT errors: a handler past its deadline may still commit its work
 * - SESSION errors (precondition violations)
 * - VALIDATION, ROUTING, CANCELLED and INTERNAL errors
 */
export function isTransientError(error: unknown): boolean {
  const appError = error instanceof AppError ? error : mapError(error);

  if (appError.category === 'UPSTREAM') {
    const transportCode = appError.details?.transportCode;
    return (
      transportCode === TransportErrorCode.UpstreamUnavailable ||
      transportCode === TransportErrorCode.Timeout
    );
  }

  return false;
}
