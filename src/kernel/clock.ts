/**
 * Time source and cancellable sleep.
 *
 * Every long wait in the kernel goes through a Clock so that shutdown can
 * cut it short and tests can drive time by hand.
 */

export interface Clock {
  now(): Date;
  /**
   * Resolve after `ms` or as soon as `signal` aborts, whichever is first.
   * Never rejects.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

// setTimeout overflows above 2^31-1 ms (~24.8 days).
const MAX_TIMER_MS = 2_147_483_647;

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.min(Math.max(0, ms), MAX_TIMER_MS));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: abortableSleep,
};
