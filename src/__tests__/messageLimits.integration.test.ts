import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';

vi.mock('../config.js', async () => {
  const { testConfig } = await import('./testConfig.js');
  return {
    config: {
      ...testConfig,
      limits: {
        bodyLimitBytes: 300, // Small limit for testing
        maxMessageChars: 50,
        maxMessageTokensEst: 10, // one 41+ letter word costs more than 10 tokens
      },
    },
  };
});

import { AppError } from '../errors/index.js';
import { checkMessageSize, messageTokens } from '../routes/chat.js';
import { buildServer } from '../server.js';

describe('Message Limits Integration Tests', () => {
  let fastify: FastifyInstance;

  beforeEach(async () => {
    fastify = await buildServer({ startRegistry: false });
  });

  afterEach(async () => {
    await fastify.close();
  });

  async function metricsTotal(): Promise<number> {
    const response = await fastify.inject({ method: 'GET', url: '/metrics' });
    return response.json().totals.requestsProcessed;
  }

  it('rejects a message over the character limit with 413 before any handler runs', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/chat',
      payload: { message: 'a'.repeat(51), session_id: 'sess-limits' },
    });

    expect(response.statusCode).toBe(413);
    expect(response.json().error).toMatchObject({
      code: 'VALIDATION_REQUEST_INVALID',
      message: 'Please keep your message under 50 characters.',
    });
    expect(await metricsTotal()).toBe(0);
  });

  it('rejects a message over the token estimate with 413', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/chat',
      payload: { message: 'b'.repeat(45), session_id: 'sess-limits' },
    });

    expect(response.statusCode).toBe(413);
    expect(response.json().error.message).toBe('Please split your message into shorter requests.');
  });

  it('accepts a message within limits', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/chat',
      payload: { message: 'show my cart', session_id: 'sess-limits' },
    });

    expect(response.statusCode).toBe(200);
    expect(await metricsTotal()).toBe(1);
  });

  it('rejects a session id over 128 chars', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/chat',
      payload: { message: 'hi', session_id: 's'.repeat(129) },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.message).toContain('session_id');
  });

  it('rejects a body over the body limit with 413', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/chat',
      payload: { message: 'c'.repeat(400) },
    });

    expect(response.statusCode).toBe(413);
  });
});

describe('messageTokens', () => {
  it('counts nothing for an empty message', () => {
    expect(messageTokens('')).toBe(0);
  });

  it('charges short words once and long words per four letters', () => {
    expect(messageTokens('show my cart')).toBe(3);
    expect(messageTokens('recommend a toothbrush!')).toBe(8);
  });

  it('counts a symbol as one token', () => {
    expect(messageTokens('café ☕')).toBe(2);
  });
});

describe('checkMessageSize', () => {
  function captureError(fn: () => void): AppError {
    try {
      fn();
    } catch (error) {
      if (error instanceof AppError) {
        return error;
      }
      throw error;
    }
    throw new Error('expected an AppError');
  }

  it('accepts a message exactly at the character limit', () => {
    expect(() => checkMessageSize('x'.repeat(8), { maxChars: 8, maxTokensEst: 20 })).not.toThrow();
  });

  it('counts characters as code points', () => {
    expect(() => checkMessageSize('🌱'.repeat(30), { maxChars: 50, maxTokensEst: 40 })).not.toThrow();
  });

  it('reports which limit a message broke', () => {
    const chars = captureError(() => checkMessageSize('x'.repeat(51), { maxChars: 50, maxTokensEst: 100 }));
    const tokens = captureError(() => checkMessageSize('x'.repeat(45), { maxChars: 50, maxTokensEst: 10 }));

    expect(chars.httpStatus).toBe(413);
    expect(chars.details).toEqual({ limit: 'characters', max: 50, actual: 51 });
    expect(tokens.details).toEqual({ limit: 'tokens', max: 10, actual: 12 });
  });
});
