import { AppError } from '../errors/AppError.js';

/**
 * Wraps an async function with a timeout using AbortController.
 *
 * The function receives an AbortSignal that fires when either the timeout
 * elapses or the optional parent signal aborts, so fetch calls and nested
 * tool invocations stop together with the caller.
 *
 * @throws AppError TIMEOUT_REQUEST when the timeout fired, REQUEST_CANCELLED when the parent aborted
 *
 * @example
 * ```ts
 * const result = await withTimeout(
 *   (signal) => fetch(url, { signal }),
 *   5000,
 *   'tools/call catalog.search'
 * );
 * ```
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const { signal } = controller;
  let timedOut = false;

  if (parentSignal?.aborted) {
    throw AppError.cancelled(label);
  }

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, ms);
  const onParentAbort = () => controller.abort();
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    signal.addEventListener(
      'abort',
      () => reject(timedOut ? AppError.timeout(label, ms) : AppError.cancelled(label)),
      { once: true }
    );
  });
  // The race below only observes `aborted` while fn is pending.
  aborted.catch(() => undefined);

  try {
    return await Promise.race([fn(signal), aborted]);
  } catch (error) {
    // Check if this was an abort due to our timeout or the parent
    if (signal.aborted) {
      if (timedOut) {
        throw AppError.timeout(label, ms, error instanceof Error ? error : undefined);
      }
      throw AppError.cancelled(label);
    }
    // Re-throw other errors as-is
    throw error;
  } finally {
    clearTimeout(timeoutId);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Combine several signals into one that aborts when any of them does, with
 * that signal's reason. Returns a dispose function that detaches the listeners.
 */
export function linkSignals(...signals: Array<AbortSignal | undefined>): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const source of signals) {
    if (!source) {
      continue;
    }
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => controller.abort(source.reason);
    source.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => source.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => cleanups.forEach((cleanup) => cleanup()),
  };
}
