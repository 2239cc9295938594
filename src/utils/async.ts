import { setTimeout as delay } from 'timers/promises';
import { Writable } from 'stream';

/** Sleeps for `ms`, rejecting with an AbortError as soon as `signal` fires. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal });
}

/** Checks by name: timers and streams may reject with an Error from another realm. */
export function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

export function abortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Waits for `promise` at most `timeoutMs`. Resolves `true` if it settled in time,
 * `false` otherwise; the promise itself keeps running either way.
 */
export async function waitWithTimeout(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timeoutHandle: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timeoutHandle = setTimeout(() => resolve(false), timeoutMs);
  });

  try {
    return await Promise.race([
      promise.then(
        () => true,
        () => true,
      ),
      timeout,
    ]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

/**
 * Writes `data` and resolves once it has been flushed to the underlying handle.
 * Rejects with an AbortError if `signal` fires first, leaving the write pending.
 */
export function writeAsync(stream: Writable, data: string | Buffer, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }

    const onAbort = (): void => reject(abortError());
    signal?.addEventListener('abort', onAbort, { once: true });

    stream.write(data, (err) => {
      signal?.removeEventListener('abort', onAbort);
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
