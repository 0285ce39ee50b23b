/**
 * Fan-out helpers: tagged results and request-scoped cancellation
 */

import { RequestTimeoutError } from './errors.js';

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Settle a task into its own result slot so failures never cross the join.
 */
export async function settle<T>(task: Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await task };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Reject with RequestTimeoutError as soon as `signal` aborts, abandoning `task`.
 */
export function abortable<T>(task: Promise<T>, signal: AbortSignal | undefined, operation: string): Promise<T> {
  if (!signal) return task;
  if (signal.aborted) {
    // The abandoned task may still settle later; keep its rejection handled
    task.catch(() => undefined);
    return Promise.reject(new RequestTimeoutError(operation, signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RequestTimeoutError(operation, signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });

    task.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new RequestTimeoutError(operation, signal.reason);
  }
}

/**
 * Combine a caller signal with a timeout into one request scope.
 */
export function requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
