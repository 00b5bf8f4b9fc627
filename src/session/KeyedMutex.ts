import { AppError } from '../errors/AppError.js';

interface Waiter {
  grant: () => void;
}

interface LockState {
  waiters: Waiter[];
}

/**
 * One FIFO mutex per key. Keys with no holder and no waiters take no memory.
 *
 * A waiter whose signal aborts leaves the queue and never runs.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, LockState>();

  async runExclusive<T>(key: string, operation: () => Promise<T> | T, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(key, signal);
    try {
      return await operation();
    } finally {
      release();
    }
  }

  /**
   * Resolve with a release function once `key` is free. The release function
   * is safe to call more than once.
   */
  acquire(key: string, signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(AppError.cancelled(`lock ${key}`));
    }

    const existing = this.locks.get(key);
    if (!existing) {
      this.locks.set(key, { waiters: [] });
      return Promise.resolve(this.releaser(key));
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        const index = existing.waiters.indexOf(waiter);
        if (index >= 0) {
          existing.waiters.splice(index, 1);
        }
        reject(AppError.cancelled(`lock ${key}`));
      };
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve(this.releaser(key));
        },
      };
      existing.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  waitingCount(key: string): number {
    return this.locks.get(key)?.waiters.length ?? 0;
  }

  private releaser(key: string): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const state = this.locks.get(key);
      if (!state) {
        return;
      }
      const next = state.waiters.shift();
      if (next) {
        next.grant();
      } else {
        this.locks.delete(key);
      }
    };
  }
}
