import { HOUR, MINUTE, SECOND } from '../config/waveTiming';

export interface IntervalInput {
  /** Event start minus now (ms); negative once started */
  timeBeforeEventStart: number;
  /** Predicted hit minus now (ms), null when unknown */
  timeBeforeHit: number | null;
  isRunning: boolean;
}

/**
 * Delay before the next observation tick. Coarse far from the event, tight
 * around the user's hit. Infinity once the hit is behind and the event has
 * stopped running; a running event keeps polling until it reports done.
 */
export function getObservationInterval({ timeBeforeEventStart, timeBeforeHit, isRunning }: IntervalInput): number {
  if (timeBeforeEventStart > HOUR + 5 * MINUTE) return HOUR;
  if (timeBeforeEventStart > 5 * MINUTE + 30 * SECOND) return 5 * MINUTE;
  if (timeBeforeEventStart > 35 * SECOND) return SECOND;
  if (timeBeforeHit !== null && timeBeforeHit >= 0) {
    if (timeBeforeHit < SECOND) return 50;
    if (timeBeforeHit < 5 * SECOND) return 200;
  }
  if (timeBeforeEventStart > 0 || isRunning) return 500;
  if (timeBeforeHit !== null && timeBeforeHit < 0) return Infinity;
  return 30 * SECOND;
}
