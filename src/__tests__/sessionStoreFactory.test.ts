import { describe, it, expect, vi } from 'vitest';
import RedisMock from 'ioredis-mock';

vi.mock('ioredis', () => ({
  Redis: RedisMock,
}));

import { InMemorySessionStore } from '../session/InMemorySessionStore.js';
import { RedisSessionStore } from '../session/RedisSessionStore.js';
import { openSessionStore, type SessionStoreSettings } from '../session/sessionStoreFactory.js';
import { createEmptySession } from '../session/sessionTypes.js';

function settings(store: 'memory' | 'redis', url?: string): SessionStoreSettings {
  return { store, ttlSeconds: 1800, redis: { url, prefix: 'test:sess:' } };
}

describe('openSessionStore', () => {
  it('opens a memory store', async () => {
    const handle = await openSessionStore(settings('memory'));

    expect(handle.kind).toBe('memory');
    expect(handle.store).toBeInstanceOf(InMemorySessionStore);
    await handle.close();
  });

  it('opens a redis store when REDIS_URL is set', async () => {
    const handle = await openSessionStore(settings('redis', 'redis://localhost:6379'));

    expect(handle.kind).toBe('redis');
    expect(handle.store).toBeInstanceOf(RedisSessionStore);
    await handle.close();
  });

  it('refuses a redis store without REDIS_URL', async () => {
    await expect(openSessionStore(settings('redis'))).rejects.toThrow(
      'SESSION_STORE=redis needs REDIS_URL, e.g. REDIS_URL=redis://localhost:6379'
    );
  });

  it('hands every caller its own store', async () => {
    const first = await openSessionStore(settings('memory'));
    const second = await openSessionStore(settings('memory'));

    await first.store.set('sess-a', createEmptySession('sess-a', Date.now(), 60_000));

    expect(second.store).not.toBe(first.store);
    expect(await second.store.exists('sess-a')).toBe(false);
    await first.close();
    await second.close();
  });

  it('drops memory sessions on close', async () => {
    const handle = await openSessionStore(settings('memory'));
    await handle.store.set('sess-b', createEmptySession('sess-b', Date.now(), 60_000));

    await handle.close();

    expect(await handle.store.exists('sess-b')).toBe(false);
  });
});
