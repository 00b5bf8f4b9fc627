/**
 * Error categories for the application.
 * These categories provide actionable classification of errors.
 */
export type ErrorCategory =
  | 'CLASSIFICATION'
  | 'HANDLER'
  | 'UPSTREAM'
  | 'SESSION'
  | 'ROUTING'
  | 'VALIDATION'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'INTERNAL';

/**
 * Error codes for more specific error identification.
 * Each code is one kind of the router's error taxonomy.
 */
export type ErrorCode =
  | 'CLASSIFICATION_AMBIGUOUS'
  | 'HANDLER_UNAVAILABLE'
  | 'HANDLER_TIMEOUT'
  | 'UPSTREAM_INVOCATION_ERROR'
  | 'INVALID_SESSION_STATE'
  | 'RETRY_EXHAUSTED'
  | 'NO_CAPABLE_HANDLER'
  | 'VALIDATION_REQUEST_INVALID'
  | 'TIMEOUT_REQUEST'
  | 'REQUEST_CANCELLED'
  | 'INTERNAL_ERROR';

/**
 * Options for creating an AppError.
 */
export interface AppErrorOptions {
  category: ErrorCategory;
  code: ErrorCode;
  httpStatus: number;
  safeMessage: string;
  details?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Structured error response payload for API responses.
 */
export interface ErrorPayload {
  error: {
    category: ErrorCategory;
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
  requestId?: string;
}

/**
 * AppError is the base error class for all application errors.
 * It provides structured error information with category, code, HTTP status,
 * and a safe message suitable for client responses.
 */
export class AppError extends Error {
  readonly category: ErrorCategory;
  readonly code: ErrorCode;
  readonly httpStatus: number;
  readonly safeMessage: string;
  readonly details?: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(options: AppErrorOptions) {
    super(options.safeMessage);
    this.name = 'AppError';
    this.category = options.category;
    this.code = options.code;
    this.httpStatus = options.httpStatus;
    this.safeMessage = options.safeMessage;
    this.details = options.details;
    this.cause = options.cause;

    Object.setPrototypeOf(this, AppError.prototype);
  }

  /**
   * Convert the error to a structured payload for API responses.
   */
  toPayload(requestId?: string): ErrorPayload {
    const payload: ErrorPayload = {
      error: {
        category: this.category,
        code: this.code,
        message: this.safeMessage,
      },
    };

    if (this.details && Object.keys(this.details).length > 0) {
      payload.error.details = this.details;
    }

    if (requestId) {
      payload.requestId = requestId;
    }

    return payload;
  }

  /**
   * A shopper message over one of the /chat size limits.
   */
  static messageTooLong(limit: 'characters' | 'tokens', max: number, actual: number): AppError {
    return new AppError({
      category: 'VALIDATION',
      code: 'VALIDATION_REQUEST_INVALID',
      httpStatus: 413,
      safeMessage:
        limit === 'characters'
          ? `Please keep your message under ${max} characters.`
          : 'Please split your message into shorter requests.',
      details: { limit, max, actual },
    });
  }

  /**
   * Create a validation error for invalid request data.
   */
  static validation(
    message: string,
    details?: Record<string, unknown>,
    cause?: Error
  ): AppError {
    return new AppError({
      category: 'VALIDATION',
      code: 'VALIDATION_REQUEST_INVALID',
      httpStatus: 400,
      safeMessage: message,
      details,
      cause,
    });
  }

  /**
   * Non-fatal: the classifier found no rule for the text and fell back to the
   * general handler. Attached to aggregates as a note, never thrown to callers.
   */
  static classificationAmbiguous(text: string): AppError {
    return new AppError({
      category: 'CLASSIFICATION',
      code: 'CLASSIFICATION_AMBIGUOUS',
      httpStatus: 200,
      safeMessage: 'The request did not match a specific task and was answered by the general assistant.',
      details: { textLength: text.length },
    });
  }

  static handlerUnavailable(handlerName: string, reason: string): AppError {
    return new AppError({
      category: 'HANDLER',
      code: 'HANDLER_UNAVAILABLE',
      httpStatus: 503,
      safeMessage: `The ${handlerName} handler is not available right now.`,
      details: { handlerName, reason },
    });
  }

  static handlerTimeout(handlerName: string, timeoutMs: number, cause?: Error): AppError {
    return new AppError({
      category: 'TIMEOUT',
      code: 'HANDLER_TIMEOUT',
      httpStatus: 504,
      safeMessage: `The ${handlerName} handler took too long to respond.`,
      details: { handlerName, timeoutMs },
      cause,
    });
  }

  /**
   * Create an upstream error for a failed tool invocation.
   * `transportCode` is the wire-level JSON-RPC error code.
   */
  static upstreamInvocation(
    endpointId: string,
    method: string,
    transportCode: number,
    message: string,
    cause?: Error
  ): AppError {
    return new AppError({
      category: 'UPSTREAM',
      code: 'UPSTREAM_INVOCATION_ERROR',
      httpStatus: 502,
      safeMessage: 'A shopping service returned an error. Please try again later.',
      details: { endpointId, method, transportCode, originalMessage: message },
      cause,
    });
  }

  static invalidSessionState(
    operation: string,
    reason: string,
    details?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: 'SESSION',
      code: 'INVALID_SESSION_STATE',
      httpStatus: 409,
      safeMessage: reason,
      details: { operation, ...details },
    });
  }

  static retryExhausted(label: string, attempts: number, cause?: Error): AppError {
    return new AppError({
      category: 'HANDLER',
      code: 'RETRY_EXHAUSTED',
      httpStatus: 503,
      safeMessage: 'The request kept failing after several attempts. Please try again later.',
      details: { label, attempts },
      cause,
    });
  }

  static noCapableHandler(intent: string, capability: string): AppError {
    return new AppError({
      category: 'ROUTING',
      code: 'NO_CAPABLE_HANDLER',
      httpStatus: 503,
      safeMessage: 'No assistant is currently able to handle this request.',
      details: { intent, capability },
    });
  }

  /**
   * Create a timeout error for request timeouts.
   */
  static timeout(operation: string, timeoutMs: number, cause?: Error): AppError {
    return new AppError({
      category: 'TIMEOUT',
      code: 'TIMEOUT_REQUEST',
      httpStatus: 504,
      safeMessage: 'The request took too long to complete. Please try again.',
      details: { operation, timeoutMs },
      cause,
    });
  }

  static cancelled(operation: string): AppError {
    return new AppError({
      category: 'CANCELLED',
      code: 'REQUEST_CANCELLED',
      httpStatus: 499,
      safeMessage: 'The request was cancelled.',
      details: { operation },
    });
  }

  /**
   * Create an internal error for unexpected failures.
   */
  static internal(message: string, cause?: Error): AppError {
    return new AppError({
      category: 'INTERNAL',
      code: 'INTERNAL_ERROR',
      httpStatus: 500,
      safeMessage: 'An unexpected error occurred. Please try again later.',
      details: { originalMessage: message },
      cause,
    });
  }

  /**
   * Create a not-found error for unknown handler or session names on the HTTP surface.
   */
  static notFound(resource: string, name: string): AppError {
    return new AppError({
      category: 'VALIDATION',
      code: 'VALIDATION_REQUEST_INVALID',
      httpStatus: 404,
      safeMessage: `${resource} '${name}' not found`,
      details: { resource, name },
    });
  }
}
