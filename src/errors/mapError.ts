import { z } from 'zod';
import { AppError } from './AppError.js';
import { TransportErrorCode } from '../transport/jsonRpc.js';

/**
 * Check if an error is an abort error (from AbortController).
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined;
    return (
      error.name === 'AbortError' ||
      error.name === 'TimeoutError' ||
      code === 'ABORT_ERR' ||
      code === 'ERR_ABORTED'
    );
  }
  return false;
}

/**
 * Check if an error is a network/fetch error.
 */
function isNetworkError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    error.name === 'FetchError' ||
    message.includes('fetch failed') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('etimedout') ||
    message.includes('enotfound') ||
    message.includes('socket hang up')
  );
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Map an unknown error to an AppError.
 * This function handles errors from various sources:
 * - Zod validation errors
 * - Timeout/abort errors
 * - Network errors from remote tool endpoints
 * - Generic errors
 */
export function mapError(error: unknown): AppError {
  // Already an AppError - return as-is
  if (error instanceof AppError) {
    return error;
  }

  // Zod validation errors
  if (error instanceof z.ZodError) {
    const messages = error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    return AppError.validation(messages.join(', '), {
      issues: error.issues.map((issue) => ({
        path: issue.path,
        message: issue.message,
        code: issue.code,
      })),
    }, error);
  }

  // Handle non-Error objects
  if (!(error instanceof Error)) {
    const message = typeof error === 'string' ? error : 'Unknown error';
    return AppError.internal(message);
  }

  // Abort/timeout errors
  if (isAbortError(error)) {
    return AppError.timeout('request', 0, error);
  }

  if (isNetworkError(error)) {
    return AppError.upstreamInvocation(
      'unknown',
      'unknown',
      TransportErrorCode.UpstreamUnavailable,
      error.message,
      error
    );
  }

  // Generic error fallback
  return AppError.internal(error.message, error);
}

/**
 * Sanitize error details for logging.
 * Removes sensitive information like tokens and secrets.
 */
export function sanitizeForLogging(
  details: Record<string, unknown> | undefined
): Record<string, unknown> | undefined {
  if (!details) return undefined;

  const sanitized: Record<string, unknown> = {};
  const sensitiveKeys = [
    'token',
    'secret',
    'password',
    'apikey',
    'api_key',
    'authorization',
    'bearer',
    'credential',
    'card',
  ];

  for (const [key, value] of Object.entries(details)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = sensitiveKeys.some((sk) => lowerKey.includes(sk));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'string' && value.length > 500) {
      sanitized[key] = value.substring(0, 500) + '...[truncated]';
    } else if (isRecord(value)) {
      sanitized[key] = sanitizeForLogging(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}
