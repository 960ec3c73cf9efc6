import type { Milliseconds } from '@models/utility.types';

export const wait = (waitingTime: Milliseconds) => new Promise<void>(resolve => setTimeout(resolve, waitingTime));

/**
 * Waits like {@link wait} but settles early when the signal aborts.
 * Resolves to `true` when the full delay elapsed and `false` when it was aborted.
 */
export const waitOrAbort = (waitingTime: Milliseconds, signal?: AbortSignal) =>
  new Promise<boolean>(resolve => {
    if (signal?.aborted) return resolve(false);

    const onAbort = () => {
      clearTimeout(timeout);
      resolve(false);
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, waitingTime);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
