/**
 * Error envelope for frontend-safe, consistent error responses.
 * Clients can use error.category + retryable to decide "retry vs rephrase" deterministically.
 */

import { z } from 'zod';
import { AppError, ErrorCategory } from '../errors/AppError.js';
import { isTransientError } from './retryPolicy.js';

/**
 * Simplified error categories for client consumption.
 * Maps internal error categories to client-safe categories.
 */
export type ErrorEnvelopeCategory = 'validation' | 'session' | 'upstream' | 'routing' | 'internal';

/**
 * Zod schema for the error envelope.
 * This is the stable contract for error responses.
 */
export const errorEnvelopeSchema = z.object({
  category: z.enum(['validation', 'session', 'upstream', 'routing', 'internal']),
  code: z.string(),
  message: z.string(),
  retryable: z.boolean(),
  requestId: z.string().optional(),
  details: z.record(z.string(), z.unknown()).optional(),
});

export type ErrorEnvelope = z.infer<typeof errorEnvelopeSchema>;

/**
 * Maps internal ErrorCategory to client-safe ErrorEnvelopeCategory.
 *
 * Mapping:
 * - VALIDATION, CLASSIFICATION -> validation (rephrase)
 * - SESSION -> session (the cart is not in the right state)
 * - UPSTREAM, HANDLER, TIMEOUT, CANCELLED -> upstream
 * - ROUTING -> routing (no handler can serve the request)
 * - INTERNAL -> internal
 */
export function mapCategoryToEnvelope(category: ErrorCategory): ErrorEnvelopeCategory {
  switch (category) {
    case 'VALIDATION':
    case 'CLASSIFICATION':
      return 'validation';
    case 'SESSION':
      return 'session';
    case 'UPSTREAM':
    case 'HANDLER':
    case 'TIMEOUT':
    case 'CANCELLED':
      return 'upstream';
    case 'ROUTING':
      return 'routing';
    case 'INTERNAL':
    default:
      return 'internal';
  }
}

/**
 * An error is retryable for the client when it is transient, when it timed
 * out, when the router already gave up retrying it (RETRY_EXHAUSTED), or when
 * no handler was healthy.
 */
export function isRetryable(appError: AppError): boolean {
  return (
    isTransientError(appError) ||
    appError.category === 'TIMEOUT' ||
    appError.code === 'RETRY_EXHAUSTED' ||
    appError.code === 'NO_CAPABLE_HANDLER' ||
    appError.code === 'HANDLER_UNAVAILABLE'
  );
}

/**
 * List of sensitive field patterns to redact from error messages.
 */
const SENSITIVE_PATTERNS = [
  /token/i,
  /secret/i,
  /password/i,
  /apikey/i,
  /api_key/i,
  /authorization/i,
  /bearer/i,
  /credential/i,
];

/**
 * Ensures a message is safe for client consumption.
 */
export function ensureSafeMessage(message: string): string {
  for (const pattern of SENSITIVE_PATTERNS) {
    if (pattern.test(message)) {
      return 'An error occurred. Please try again.';
    }
  }

  if (message.length > 500) {
    return message.substring(0, 497) + '...';
  }

  return message;
}

/**
 * Sanitizes details object for client consumption.
 * Removes sensitive fields and truncates long values.
 */
export function sanitizeDetails(
  details: Record<string, unknown> | undefined,
  includeDetails: boolean
): Record<string, unknown> | undefined {
  if (!details || !includeDetails) {
    return undefined;
  }

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(details)) {
    const isSensitive = SENSITIVE_PATTERNS.some(pattern => pattern.test(key));
    if (isSensitive) {
      continue;
    }

    if (typeof value === 'string' && value.length > 200) {
      sanitized[key] = value.substring(0, 197) + '...';
    } else if (typeof value === 'object' && value !== null) {
      sanitized[key] = '[object]';
    } else {
      sanitized[key] = value;
    }
  }

  return Object.keys(sanitized).length > 0 ? sanitized : undefined;
}

/**
 * Converts an AppError to a client-safe ErrorEnvelope.
 *
 * @param includeDetails - Whether to include details (typically only in debug mode)
 */
export function appErrorToEnvelope(
  appError: AppError,
  requestId?: string,
  includeDetails = false
): ErrorEnvelope {
  const envelope: ErrorEnvelope = {
    category: mapCategoryToEnvelope(appError.category),
    code: appError.code,
    message: ensureSafeMessage(appError.safeMessage),
    retryable: isRetryable(appError),
  };

  if (requestId) {
    envelope.requestId = requestId;
  }

  const details = sanitizeDetails(appError.details, includeDetails);
  if (details) {
    envelope.details = details;
  }

  return envelope;
}
