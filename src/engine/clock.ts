export interface Clock {
  /** Current instant, epoch ms */
  now(): number;
  /** Resolves after `ms`; rejects with ObservationCancelledError when `signal` aborts */
  delay(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Raised when a pending delay is aborted. Not a failure. */
export class ObservationCancelledError extends Error {
  constructor(message = 'Observation cancelled') {
    super(message);
    this.name = 'ObservationCancelledError';
  }
}

export function isCancellation(err: unknown): err is ObservationCancelledError {
  return err instanceof ObservationCancelledError;
}

// setTimeout overflows past 2^31 - 1
const MAX_TIMER_MS = 2_147_483_647;

export function abortableDelay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ObservationCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ObservationCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.min(Math.max(0, ms), MAX_TIMER_MS));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  delay: abortableDelay,
};
