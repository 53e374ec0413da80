/**
 * DEADLINE
 * ========
 *
 * Bound how long one caller waits on a (possibly shared) promise. Giving up
 * only detaches this caller; the underlying work keeps running.
 */

import { CancelledError, TimeoutError } from '../../../common/errors.js';

export interface WaitOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  label?: string;
}

export function waitWithDeadline<T>(work: Promise<T>, options: WaitOptions = {}): Promise<T> {
  const { timeoutMs, signal, label = 'request' } = options;

  if (signal?.aborted) {
    return Promise.reject(new CancelledError(`${label} cancelled by caller`));
  }
  if (timeoutMs === undefined && !signal) {
    return work;
  }

  return new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const cleanup = () => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    const onAbort = () => {
      cleanup();
      reject(new CancelledError(`${label} cancelled by caller`));
    };

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        cleanup();
        reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    work.then(
      value => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}
