import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { AppError, mapError, sanitizeForLogging } from '../errors/index.js';
import { TransportErrorCode } from '../transport/jsonRpc.js';

describe('mapError', () => {
  describe('AppError passthrough', () => {
    it('should return AppError as-is', () => {
      const original = AppError.validation('test error');
      expect(mapError(original)).toBe(original);
    });
  });

  describe('Zod validation errors', () => {
    it('should map ZodError to VALIDATION category', () => {
      const schema = z.object({ name: z.string(), age: z.number() });
      const parsed = schema.safeParse({ name: 123, age: 'not a number' });
      expect(parsed.success).toBe(false);

      const result = mapError(parsed.error);
      expect(result.category).toBe('VALIDATION');
      expect(result.code).toBe('VALIDATION_REQUEST_INVALID');
      expect(result.httpStatus).toBe(400);
      expect(result.details?.issues).toHaveLength(2);
    });

    it('should include path information in validation error message', () => {
      const schema = z.object({ task: z.object({ session_id: z.string() }) });
      const parsed = schema.safeParse({ task: { session_id: 42 } });

      expect(mapError(parsed.error).safeMessage).toContain('task.session_id');
    });
  });

  describe('Abort/timeout errors', () => {
    it('should map AbortError to TIMEOUT', () => {
      const error = new Error('This operation was aborted');
      error.name = 'AbortError';

      const result = mapError(error);
      expect(result.category).toBe('TIMEOUT');
      expect(result.code).toBe('TIMEOUT_REQUEST');
      expect(result.cause).toBe(error);
    });

    it('should map TimeoutError to TIMEOUT', () => {
      const error = new Error('The operation timed out');
      error.name = 'TimeoutError';
      expect(mapError(error).category).toBe('TIMEOUT');
    });
  });

  describe('Network errors', () => {
    it.each(['fetch failed', 'connect ECONNREFUSED 127.0.0.1:9000', 'read ETIMEDOUT', 'socket hang up'])(
      'should map "%s" to an UpstreamUnavailable invocation error',
      (message) => {
        const result = mapError(new Error(message));
        expect(result.code).toBe('UPSTREAM_INVOCATION_ERROR');
        expect(result.details?.transportCode).toBe(TransportErrorCode.UpstreamUnavailable);
      }
    );
  });

  describe('Generic errors', () => {
    it('should map unknown Error to INTERNAL', () => {
      const result = mapError(new Error('Something went wrong'));
      expect(result.category).toBe('INTERNAL');
      expect(result.code).toBe('INTERNAL_ERROR');
      expect(result.details?.originalMessage).toBe('Something went wrong');
    });

    it('should map string to INTERNAL', () => {
      const result = mapError('string error');
      expect(result.category).toBe('INTERNAL');
      expect(result.details?.originalMessage).toBe('string error');
    });

    it('should map non-Error values to INTERNAL', () => {
      expect(mapError({ some: 'object' }).category).toBe('INTERNAL');
      expect(mapError(null).details?.originalMessage).toBe('Unknown error');
      expect(mapError(undefined).category).toBe('INTERNAL');
    });
  });
});

describe('sanitizeForLogging', () => {
  it('should return undefined for undefined input', () => {
    expect(sanitizeForLogging(undefined)).toBeUndefined();
  });

  it('should redact token, secret and password fields', () => {
    const result = sanitizeForLogging({
      accessToken: 'test-token',
      clientSecret: 'test-secret',
      password: 'test-password',
      data: 'safe-data',
    });

    expect(result).toEqual({
      accessToken: '[REDACTED]',
      clientSecret: '[REDACTED]',
      password: '[REDACTED]',
      data: 'safe-data',
    });
  });

  it('should redact card fields', () => {
    expect(sanitizeForLogging({ cardNumber: '0000' })).toEqual({ cardNumber: '[REDACTED]' });
  });

  it('should truncate long strings', () => {
    const result = sanitizeForLogging({ body: 'a'.repeat(600) });
    expect(result?.body).toBe('a'.repeat(500) + '...[truncated]');
  });

  it('should recursively sanitize nested objects', () => {
    const result = sanitizeForLogging({ outer: { inner: { apiKey: 'test-key', data: 'safe' } } });
    expect(result).toEqual({ outer: { inner: { apiKey: '[REDACTED]', data: 'safe' } } });
  });

  it('should preserve non-sensitive data', () => {
    const details = { handlerName: 'cart', transportCode: -32003, method: 'tools/call', attempts: 3 };
    expect(sanitizeForLogging(details)).toEqual(details);
  });
});

describe('AppError', () => {
  describe('toPayload', () => {
    it('should create error payload with category, code, and message', () => {
      const payload = AppError.validation('Invalid input').toPayload();

      expect(payload.error).toEqual({
        category: 'VALIDATION',
        code: 'VALIDATION_REQUEST_INVALID',
        message: 'Invalid input',
      });
    });

    it('should include requestId when provided', () => {
      expect(AppError.internal('Error').toPayload('req-123').requestId).toBe('req-123');
    });

    it('should not include details key when details object is empty', () => {
      const error = new AppError({
        category: 'INTERNAL',
        code: 'INTERNAL_ERROR',
        httpStatus: 500,
        safeMessage: 'Error',
        details: {},
      });
      expect(error.toPayload().error.details).toBeUndefined();
    });
  });

  describe('static helpers', () => {
    it('classificationAmbiguous is non-fatal', () => {
      const error = AppError.classificationAmbiguous('asdkjh');
      expect(error.code).toBe('CLASSIFICATION_AMBIGUOUS');
      expect(error.httpStatus).toBe(200);
      expect(error.details).toEqual({ textLength: 6 });
    });

    it('handlerUnavailable should create 503 error', () => {
      const error = AppError.handlerUnavailable('cart', 'status unreachable');
      expect(error.category).toBe('HANDLER');
      expect(error.httpStatus).toBe(503);
      expect(error.safeMessage).toBe('The cart handler is not available right now.');
    });

    it('handlerTimeout should create 504 TIMEOUT error', () => {
      const error = AppError.handlerTimeout('footprint', 8000);
      expect(error.category).toBe('TIMEOUT');
      expect(error.code).toBe('HANDLER_TIMEOUT');
      expect(error.details).toEqual({ handlerName: 'footprint', timeoutMs: 8000 });
    });

    it('upstreamInvocation should carry the transport code', () => {
      const error = AppError.upstreamInvocation('emissions', 'tools/call', TransportErrorCode.NotFound, 'Unknown tool');
      expect(error.httpStatus).toBe(502);
      expect(error.details).toEqual({
        endpointId: 'emissions',
        method: 'tools/call',
        transportCode: -32601,
        originalMessage: 'Unknown tool',
      });
    });

    it('invalidSessionState should create 409 SESSION error', () => {
      const error = AppError.invalidSessionState('selectShipping', 'Your cart is empty.', { lifecycle: 'active' });
      expect(error.category).toBe('SESSION');
      expect(error.httpStatus).toBe(409);
      expect(error.safeMessage).toBe('Your cart is empty.');
      expect(error.details).toEqual({ operation: 'selectShipping', lifecycle: 'active' });
    });

    it('retryExhausted should keep the last error as cause', () => {
      const last = AppError.handlerTimeout('cart', 100);
      const error = AppError.retryExhausted('handler cart', 3, last);
      expect(error.code).toBe('RETRY_EXHAUSTED');
      expect(error.cause).toBe(last);
      expect(error.details).toEqual({ label: 'handler cart', attempts: 3 });
    });

    it('noCapableHandler should create ROUTING error', () => {
      const error = AppError.noCapableHandler('checkout', 'checkout');
      expect(error.category).toBe('ROUTING');
      expect(error.httpStatus).toBe(503);
    });

    it('notFound should create 404 error', () => {
      const error = AppError.notFound('Handler', 'shipping');
      expect(error.httpStatus).toBe(404);
      expect(error.safeMessage).toBe("Handler 'shipping' not found");
    });
  });
});
