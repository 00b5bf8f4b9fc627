import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenvConfig();

/**
 * Schema for validating environment variables.
 * Every variable has a default so the service boots with no .env present.
 */
const configSchema = z.object({
  // Server
  PORT: z.string().default('8000'),

  // Session storage configuration
  SESSION_STORE: z.enum(['memory', 'redis']).default('memory'),
  SESSION_TTL_SECONDS: z.string().default('3600'),
  // Redis configuration (required when SESSION_STORE=redis)
  REDIS_URL: z.string().optional(),
  REDIS_PREFIX: z.string().default('shop:sess:'),

  // Router deadlines (in milliseconds)
  HANDLER_TIMEOUT_MS: z.string().default('8000'),
  REQUEST_DEADLINE_MS: z.string().default('20000'),
  TOOL_CALL_TIMEOUT_MS: z.string().default('5000'),
  MAX_WORKFLOW_DEPTH: z.string().default('3'),

  // Retry configuration
  RETRY_MAX_ATTEMPTS: z.string().default('2'),
  RETRY_BASE_DELAY_MS: z.string().default('200'),
  RETRY_JITTER_MS: z.string().default('100'),

  // Capability registry health
  HEARTBEAT_INTERVAL_MS: z.string().default('10000'),
  HEARTBEAT_STALENESS_MS: z.string().default('30000'),

  // Remote tool endpoints, "name=url" pairs separated by commas.
  // Endpoints not listed here are served in process.
  REMOTE_TOOL_ENDPOINTS: z.string().optional().default(''),

  DEBUG: z.string().default('0'),

  // CORS configuration
  CORS_ORIGINS: z.string().default('http://localhost:5173,http://127.0.0.1:5173'),

  // Request/body limits (abuse prevention)
  BODY_LIMIT_BYTES: z.string().default('131072'),
  MAX_MESSAGE_CHARS: z.string().default('4000'),
  MAX_MESSAGE_TOKENS_EST: z.string().default('1200'),
});

/**
 * Parse and validate environment variables.
 * Throws a descriptive error if validation fails.
 */
function parseConfig() {
  try {
    return configSchema.parse({
      PORT: process.env.PORT,
      SESSION_STORE: process.env.SESSION_STORE,
      SESSION_TTL_SECONDS: process.env.SESSION_TTL_SECONDS,
      REDIS_URL: process.env.REDIS_URL,
      REDIS_PREFIX: process.env.REDIS_PREFIX,
      HANDLER_TIMEOUT_MS: process.env.HANDLER_TIMEOUT_MS,
      REQUEST_DEADLINE_MS: process.env.REQUEST_DEADLINE_MS,
      TOOL_CALL_TIMEOUT_MS: process.env.TOOL_CALL_TIMEOUT_MS,
      MAX_WORKFLOW_DEPTH: process.env.MAX_WORKFLOW_DEPTH,
      RETRY_MAX_ATTEMPTS: process.env.RETRY_MAX_ATTEMPTS,
      RETRY_BASE_DELAY_MS: process.env.RETRY_BASE_DELAY_MS,
      RETRY_JITTER_MS: process.env.RETRY_JITTER_MS,
      HEARTBEAT_INTERVAL_MS: process.env.HEARTBEAT_INTERVAL_MS,
      HEARTBEAT_STALENESS_MS: process.env.HEARTBEAT_STALENESS_MS,
      REMOTE_TOOL_ENDPOINTS: process.env.REMOTE_TOOL_ENDPOINTS,
      DEBUG: process.env.DEBUG,
      CORS_ORIGINS: process.env.CORS_ORIGINS,
      BODY_LIMIT_BYTES: process.env.BODY_LIMIT_BYTES,
      MAX_MESSAGE_CHARS: process.env.MAX_MESSAGE_CHARS,
      MAX_MESSAGE_TOKENS_EST: process.env.MAX_MESSAGE_TOKENS_EST,
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      const messages = error.issues.map((err) => `  - ${err.path.join('.')}: ${err.message}`);
      throw new Error(`Configuration validation failed:\n${messages.join('\n')}`);
    }
    throw error;
  }
}

/**
 * Parse "name=url,name2=url2" into a map of remote tool endpoints.
 */
export function parseRemoteEndpoints(raw: string): Record<string, string> {
  const endpoints: Record<string, string> = {};
  for (const pair of raw.split(',')) {
    const trimmed = pair.trim();
    if (!trimmed) {
      continue;
    }
    const separator = trimmed.indexOf('=');
    if (separator <= 0) {
      throw new Error(`REMOTE_TOOL_ENDPOINTS entry '${trimmed}' must look like name=url`);
    }
    const name = trimmed.substring(0, separator).trim();
    const url = trimmed.substring(separator + 1).trim();
    endpoints[name] = z.string().url(`REMOTE_TOOL_ENDPOINTS url for '${name}' is invalid`).parse(url);
  }
  return endpoints;
}

const env = parseConfig();

/**
 * Typed configuration object exported for use throughout the application.
 */
export const config = {
  port: parseInt(env.PORT, 10),

  session: {
    store: env.SESSION_STORE,
    ttlSeconds: parseInt(env.SESSION_TTL_SECONDS, 10),
    redis: {
      url: env.REDIS_URL,
      prefix: env.REDIS_PREFIX,
    },
  },

  router: {
    handlerTimeoutMs: parseInt(env.HANDLER_TIMEOUT_MS, 10),
    requestDeadlineMs: parseInt(env.REQUEST_DEADLINE_MS, 10),
    maxWorkflowDepth: parseInt(env.MAX_WORKFLOW_DEPTH, 10),
  },

  timeouts: {
    toolCallMs: parseInt(env.TOOL_CALL_TIMEOUT_MS, 10),
  },

  retry: {
    maxAttempts: parseInt(env.RETRY_MAX_ATTEMPTS, 10),
    baseDelayMs: parseInt(env.RETRY_BASE_DELAY_MS, 10),
    jitterMs: parseInt(env.RETRY_JITTER_MS, 10),
  },

  registry: {
    heartbeatIntervalMs: parseInt(env.HEARTBEAT_INTERVAL_MS, 10),
    stalenessMs: parseInt(env.HEARTBEAT_STALENESS_MS, 10),
  },

  tools: {
    remoteEndpoints: parseRemoteEndpoints(env.REMOTE_TOOL_ENDPOINTS),
  },

  debug: env.DEBUG === '1' || env.DEBUG === 'true',

  cors: {
    origins: env.CORS_ORIGINS
      ? env.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)
      : ['http://localhost:5173', 'http://127.0.0.1:5173'],
  },

  limits: {
    bodyLimitBytes: parseInt(env.BODY_LIMIT_BYTES, 10),
    maxMessageChars: parseInt(env.MAX_MESSAGE_CHARS, 10),
    maxMessageTokensEst: parseInt(env.MAX_MESSAGE_TOKENS_EST, 10),
  },
} as const;

export type Config = typeof config;
