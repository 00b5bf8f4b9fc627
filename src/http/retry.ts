import pino from 'pino';
import { AppError } from '../errors/AppError.js';

const logger = pino({ name: 'retry' });

export interface RetryOptions {
  /** Number of retries after the first attempt. */
  retries?: number;
  baseDelayMs?: number;
  /** Upper bound of the random jitter added to each backoff delay. */
  jitter?: number;
  /** Decides whether the error of a given 0-based attempt is worth another try. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  label?: string;
  /** Once aborted, no further attempt starts and a pending backoff rejects. */
  signal?: AbortSignal;
}

/**
 * Resolve after `ms`, or reject with a cancellation error as soon as `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(AppError.cancelled('backoff'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(AppError.cancelled('backoff'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function backoffDelayMs(attempt: number, baseDelayMs: number, jitter: number): number {
  return baseDelayMs * 2 ** attempt + Math.floor(Math.random() * jitter);
}

/**
 * Run `fn` and retry it with exponential backoff while `shouldRetry` approves.
 * The last error is rethrown unchanged once retries run out.
 */
export async function retryAsync<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const retries = options.retries ?? 2;
  const baseDelayMs = options.baseDelayMs ?? 200;
  const jitter = options.jitter ?? 100;
  const shouldRetry = options.shouldRetry ?? (() => false);
  const label = options.label ?? 'operation';

  let attempt = 0;
  for (;;) {
    if (options.signal?.aborted) {
      throw AppError.cancelled(label);
    }
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= retries || !shouldRetry(error, attempt) || options.signal?.aborted) {
        throw error;
      }
      const waitMs = backoffDelayMs(attempt, baseDelayMs, jitter);
      logger.warn(
        { label, attempt: attempt + 1, retries, waitMs, error: error instanceof Error ? error.message : String(error) },
        'Retrying after transient failure'
      );
      await delay(waitMs, options.signal);
      attempt++;
    }
  }
}
