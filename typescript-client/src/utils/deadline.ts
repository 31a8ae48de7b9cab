// Deadline and cancellation wrapper for a single suspended step

import { ConnectionError, TimeoutError } from '../errors.js';
import { debugLog } from './debug.js';

export interface DeadlineOptions {
  readonly operation: string;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly endpoint?: string;
}

/**
 * Settle with promise, or reject with TimeoutError once timeoutMs elapses,
 * or with ConnectionError when signal aborts - whichever happens first.
 *
 * The caller owns cleanup of whatever the losing promise was waiting on.
 */
export function withDeadline<T>(promise: Promise<T>, options: DeadlineOptions): Promise<T> {
  const { operation, timeoutMs, signal, endpoint } = options;

  if (timeoutMs === undefined && signal === undefined) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | null = null;

    const finish = (): boolean => {
      if (settled) {
        return false;
      }
      settled = true;
      if (timer !== null) {
        clearTimeout(timer);
      }
      signal?.removeEventListener('abort', onAbort);
      return true;
    };

    const onAbort = (): void => {
      if (finish()) {
        const cause = signal?.reason instanceof Error ? signal.reason : undefined;
        reject(new ConnectionError(`${operation} was aborted`, endpoint, cause));
      }
    };

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    if (timeoutMs !== undefined && !settled) {
      timer = setTimeout(() => {
        if (finish()) {
          reject(new TimeoutError(operation, timeoutMs));
        }
      }, timeoutMs);
    }

    promise.then(
      (value) => {
        if (finish()) {
          resolve(value);
        }
      },
      (error: unknown) => {
        if (finish()) {
          reject(error);
        } else {
          debugLog(`${operation} failed after its deadline had already fired:`, error);
        }
      }
    );
  });
}
