import { WARMING_DURATION_MS, WARN_BEFORE_HIT_MS } from '../config/waveTiming';
import type { Position } from '../types/geo';
import type { Clock } from './clock';
import type { WaveModel } from './linearWave';

export interface WarmingTiming {
  warmingMs: number;
  warnBeforeHitMs: number;
}

/** Lead-in window before the user's hit, derived from the wave's prediction */
export class WaveWarming {
  constructor(
    private readonly wave: WaveModel,
    private readonly clock: Clock,
    private readonly timing: WarmingTiming = { warmingMs: WARMING_DURATION_MS, warnBeforeHitMs: WARN_BEFORE_HIT_MS },
  ) {}

  getWarmingDuration(): number {
    return this.timing.warmingMs;
  }

  getWarnBeforeHitDuration(): number {
    return this.timing.warnBeforeHitMs;
  }

  async userWarmingStartDateTime(position?: Position | null): Promise<number | null> {
    const hit = await this.wave.userHitDateTime(position);
    if (hit === null) return null;
    return hit - this.timing.warmingMs - this.timing.warnBeforeHitMs;
  }

  async isUserWarmingStarted(position?: Position | null): Promise<boolean> {
    const start = await this.userWarmingStartDateTime(position);
    return start !== null && this.clock.now() >= start;
  }
}
