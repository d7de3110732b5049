/* src/installer/util/sleep.ts
 * Cancellable waits. The reconcile loop and the install procedure suspend only here.
 */
import { setTimeout as delay } from 'node:timers/promises';

/** Largest delay a Node timer honors; longer ones fire after 1ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

export class CancelledError extends Error {
  constructor(message = 'cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/** Throw CancelledError when the signal has fired. */
export const throwIfCancelled = (signal?: AbortSignal): void => {
  if (signal?.aborted) throw new CancelledError();
};

/**
 * Wait `ms` milliseconds; rejects with CancelledError when the signal fires first.
 * Waits beyond MAX_TIMER_MS are taken in chunks.
 */
export const sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  throwIfCancelled(signal);
  let remaining = ms;
  try {
    while (remaining > 0) {
      const step = Math.min(remaining, MAX_TIMER_MS);
      await delay(step, undefined, { signal });
      remaining -= step;
    }
  } catch (e) {
    if (signal?.aborted) throw new CancelledError();
    throw e;
  }
};
