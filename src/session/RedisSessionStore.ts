import { Redis } from 'ioredis';
import pino from 'pino';
import { ISessionStore } from './ISessionStore.js';
import { SessionState, sessionStateSchema } from './sessionTypes.js';

const logger = pino({ name: 'RedisSessionStore' });

export interface RedisSessionStoreOptions {
  redisUrl: string;
  prefix?: string;
  ttlSeconds: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Redis-backed store. Sessions are JSON strings with a server-side TTL;
 * entries that fail the shape check are treated as poisoned and removed.
 */
export class RedisSessionStore implements ISessionStore {
  private readonly redis: Redis;
  private readonly prefix: string;
  private readonly ttlSeconds: number;

  constructor(options: RedisSessionStoreOptions) {
    this.redis = new Redis(options.redisUrl, {
      lazyConnect: false,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
    });
    this.prefix = options.prefix ?? 'shop:sess:';
    this.ttlSeconds = options.ttlSeconds;

    this.redis.on('error', (err: Error) => {
      logger.error({ error: err.message }, 'Redis connection error');
    });
  }

  private getFullKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  async get(key: string): Promise<SessionState | null> {
    const fullKey = this.getFullKey(key);
    try {
      const raw = await this.redis.get(fullKey);
      if (!raw) {
        return null;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (parseError) {
        logger.error({ key: fullKey, error: errorMessage(parseError) }, 'Failed to parse session, deleting poisoned entry');
        await this.redis.del(fullKey);
        return null;
      }

      const result = sessionStateSchema.safeParse(parsed);
      if (!result.success) {
        logger.error({ key: fullKey, issues: result.error.issues.length }, 'Stored session has an unexpected shape, deleting it');
        await this.redis.del(fullKey);
        return null;
      }

      const session: SessionState = result.data;
      if (Date.now() >= session.expiresAt) {
        await this.delete(key);
        return null;
      }
      return session;
    } catch (error) {
      logger.error({ key: fullKey, error: errorMessage(error) }, 'Failed to get session');
      throw error;
    }
  }

  async set(key: string, state: SessionState): Promise<void> {
    const fullKey = this.getFullKey(key);
    try {
      const serialized = JSON.stringify(state);
      await this.redis.set(fullKey, serialized, 'EX', this.ttlSeconds);
    } catch (error) {
      logger.error({ key: fullKey, error: errorMessage(error) }, 'Failed to set session');
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    const fullKey = this.getFullKey(key);
    try {
      await this.redis.del(fullKey);
    } catch (error) {
      logger.error({ key: fullKey, error: errorMessage(error) }, 'Failed to delete session');
      throw error;
    }
  }

  async exists(key: string): Promise<boolean> {
    const fullKey = this.getFullKey(key);
    try {
      const result = await this.redis.exists(fullKey);
      if (result === 0) {
        return false;
      }
      const session = await this.get(key);
      return session !== null;
    } catch (error) {
      logger.error({ key: fullKey, error: errorMessage(error) }, 'Failed to check session existence');
      throw error;
    }
  }

  async touch(key: string): Promise<boolean> {
    const fullKey = this.getFullKey(key);
    try {
      const session = await this.get(key);
      if (!session) {
        return false;
      }

      const now = Date.now();
      await this.set(key, { ...session, updatedAt: now, expiresAt: now + this.ttlSeconds * 1000 });
      return true;
    } catch (error) {
      logger.error({ key: fullKey, error: errorMessage(error) }, 'Failed to touch session');
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Failed to disconnect from Redis');
    }
  }

  async ping(): Promise<boolean> {
    try {
      const result = await this.redis.ping();
      return result === 'PONG';
    } catch {
      return false;
    }
  }
}
