export { AppError, type ErrorCategory, type ErrorCode, type ErrorPayload, type AppErrorOptions } from './AppError.js';
export { mapError, sanitizeForLogging, isAbortError, isRecord } from './mapError.js';
