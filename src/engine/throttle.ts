import {
  CRITICAL_HIT_WINDOW_MS,
  CRITICAL_TIME_BEFORE_HIT_THRESHOLD_MS,
  POSITION_RATIO_THRESHOLD,
  PROGRESSION_THRESHOLD,
  TIME_BEFORE_HIT_THRESHOLD_MS,
} from '../config/waveTiming';

/**
 * Change gate: a value passes when it differs from the last passed value by
 * at least the threshold. The first value always passes.
 */
export class Throttle {
  private last: number | null = null;

  constructor(private readonly threshold: (value: number) => number) {}

  /** `force` lets any actual change through (terminal values) */
  accept(value: number, force = false): boolean {
    const last = this.last;
    const passes =
      last === null ||
      (force && value !== last) ||
      Math.abs(value - last) >= this.threshold(value);
    if (passes) this.last = value;
    return passes;
  }

  get lastAccepted(): number | null {
    return this.last;
  }

  reset() {
    this.last = null;
  }
}

/** 50 ms inside the last two seconds before a hit, 1 s otherwise */
export function timeBeforeHitThreshold(timeBeforeHit: number): number {
  return timeBeforeHit > 0 && timeBeforeHit <= CRITICAL_HIT_WINDOW_MS
    ? CRITICAL_TIME_BEFORE_HIT_THRESHOLD_MS
    : TIME_BEFORE_HIT_THRESHOLD_MS;
}

export function createProgressionThrottle(): Throttle {
  return new Throttle(() => PROGRESSION_THRESHOLD);
}

export function createRatioThrottle(): Throttle {
  return new Throttle(() => POSITION_RATIO_THRESHOLD);
}

export function createTimeBeforeHitThrottle(): Throttle {
  return new Throttle(timeBeforeHitThreshold);
}
