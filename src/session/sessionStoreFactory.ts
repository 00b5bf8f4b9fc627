import pino from 'pino';
import type { Config } from '../config.js';
import { ISessionStore } from './ISessionStore.js';
import { InMemorySessionStore } from './InMemorySessionStore.js';
import { RedisSessionStore } from './RedisSessionStore.js';

const logger = pino({ name: 'SessionStore' });

export type SessionStoreSettings = Config['session'];

/**
 * An opened store plus the way to release it. The server owns the handle
 * and closes it on shutdown.
 */
export interface SessionStoreHandle {
  store: ISessionStore;
  kind: SessionStoreSettings['store'];
  close(): Promise<void>;
}

/**
 * Open the session store `settings` asks for. A Redis store must answer a
 * ping before it is handed out.
 */
export async function openSessionStore(settings: SessionStoreSettings): Promise<SessionStoreHandle> {
  if (settings.store === 'memory') {
    const store = new InMemorySessionStore({ ttlSeconds: settings.ttlSeconds });
    logger.info({ ttlSeconds: settings.ttlSeconds }, 'Sessions kept in memory');
    return {
      store,
      kind: 'memory',
      close: async () => store.destroy(),
    };
  }

  const { url, prefix } = settings.redis;
  if (!url) {
    throw new Error('SESSION_STORE=redis needs REDIS_URL, e.g. REDIS_URL=redis://localhost:6379');
  }

  const store = new RedisSessionStore({ redisUrl: url, prefix, ttlSeconds: settings.ttlSeconds });
  if (!(await store.ping())) {
    await store.disconnect();
    throw new Error(`Redis at ${url} did not answer PING; sessions cannot be stored`);
  }

  logger.info({ prefix, ttlSeconds: settings.ttlSeconds }, 'Sessions kept in Redis');
  return {
    store,
    kind: 'redis',
    close: () => store.disconnect(),
  };
}
