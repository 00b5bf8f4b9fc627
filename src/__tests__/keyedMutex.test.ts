import { describe, it, expect } from 'vitest';
import { AppError } from '../errors/AppError.js';
import { KeyedMutex } from '../session/KeyedMutex.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('runs work for the same key one at a time, in arrival order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('sess-a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('sess-a', () => {
      order.push('second');
    });
    const third = mutex.runExclusive('sess-a', () => {
      order.push('third');
    });

    await Promise.resolve();
    expect(mutex.waitingCount('sess-a')).toBe(2);

    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual(['first:start', 'first:end', 'second', 'third']);
  });

  it('lets different keys proceed independently', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const blocked = mutex.runExclusive('sess-a', () => gate.promise);
    const other = await mutex.runExclusive('sess-b', () => 'done');

    expect(other).toBe('done');
    gate.resolve();
    await blocked;
  });

  it('frees the key when the holder throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('sess-a', () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(mutex.isLocked('sess-a')).toBe(false);
    await expect(mutex.runExclusive('sess-a', () => 42)).resolves.toBe(42);
  });

  it('forgets keys once nobody holds or waits for them', async () => {
    const mutex = new KeyedMutex();

    await mutex.runExclusive('sess-a', () => undefined);

    expect(mutex.isLocked('sess-a')).toBe(false);
  });

  it('rejects a pre-aborted acquire without queueing', async () => {
    const mutex = new KeyedMutex();
    const controller = new AbortController();
    controller.abort();

    await expect(mutex.acquire('sess-a', controller.signal)).rejects.toMatchObject({ code: 'REQUEST_CANCELLED' });
    expect(mutex.isLocked('sess-a')).toBe(false);
  });

  it('drops a waiter whose signal aborts and never runs its work', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const controller = new AbortController();
    let ran = false;

    const holder = mutex.runExclusive('sess-a', () => gate.promise);
    const waiter = mutex.runExclusive(
      'sess-a',
      () => {
        ran = true;
      },
      controller.signal
    );
    await Promise.resolve();

    controller.abort();
    await expect(waiter).rejects.toBeInstanceOf(AppError);
    expect(mutex.waitingCount('sess-a')).toBe(0);

    gate.resolve();
    await holder;
    expect(ran).toBe(false);
    expect(mutex.isLocked('sess-a')).toBe(false);
  });

  it('ignores a second release', async () => {
    const mutex = new KeyedMutex();
    const release = await mutex.acquire('sess-a');
    const next = mutex.acquire('sess-a');

    release();
    const releaseNext = await next;
    release();

    expect(mutex.isLocked('sess-a')).toBe(true);
    releaseNext();
    expect(mutex.isLocked('sess-a')).toBe(false);
  });
});
