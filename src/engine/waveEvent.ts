import { OBSERVE_DELAY_MS, SOON_DELAY_MS } from '../config/waveTiming';
import type { EventStatus, WaveEventConfig } from '../types/wave';
import type { PositionStore } from '../store/positionStore';
import type { Clock } from './clock';
import { EventArea } from './eventArea';
import { LinearWave, type RelatedEvent, type WaveModel } from './linearWave';
import { logger, type ScopedLogger } from './logger';
import { WaveWarming } from './warming';

export interface WaveEventDependencies {
  clock: Clock;
  positions: PositionStore;
  area?: EventArea;
}

/**
 * One scheduled wave: the event timeline plus its area, wave and warming.
 * The event opens at `startDateTime`; the wave itself leaves the start edge
 * after the start-warming gap.
 */
export class WaveEvent implements RelatedEvent {
  readonly id: string;
  readonly timeZone: string;
  readonly startDateTime: number;
  readonly startWarmingMs: number;
  readonly approximateDurationMs: number;
  readonly area: EventArea;
  readonly wave: WaveModel;
  readonly warming: WaveWarming;
  private readonly clock: Clock;
  private readonly log: ScopedLogger;

  constructor(config: WaveEventConfig, deps: WaveEventDependencies) {
    this.id = config.id;
    this.log = logger.scoped('event', { eventId: config.id });
    this.timeZone = config.timeZone;
    this.startDateTime = Date.parse(config.startsAt);
    this.startWarmingMs = config.startWarmingMs ?? 0;
    this.approximateDurationMs = config.approximateDurationMs;
    this.clock = deps.clock;

    this.area = deps.area ?? new EventArea(config.id);
    this.wave = new LinearWave(config.wave, { clock: deps.clock, positions: deps.positions });
    this.wave.setRelatedEvent(this);
    this.warming = new WaveWarming(this.wave, deps.clock);

    // Geometry-derived values are stale once the area changes
    this.area.onReload(() => this.wave.clearDurationCache());
  }

  getStartDateTime(): number {
    return this.startDateTime;
  }

  getWaveStartDateTime(): number {
    return this.startDateTime + this.startWarmingMs;
  }

  getEndDateTime(): Promise<number> {
    return this.wave.getEndDateTime();
  }

  async getStatus(): Promise<EventStatus> {
    if (!Number.isFinite(this.startDateTime)) {
      this.log.warn('No valid start instant');
      return 'undefined';
    }
    const now = this.clock.now();
    if (now >= (await this.getEndDateTime())) return 'done';
    if (now >= this.startDateTime) return 'running';
    if (this.startDateTime - now <= SOON_DELAY_MS) return 'soon';
    return 'next';
  }

  async isRunning(): Promise<boolean> {
    return (await this.getStatus()) === 'running';
  }

  async isDone(): Promise<boolean> {
    return (await this.getStatus()) === 'done';
  }

  isSoon(): boolean {
    const until = this.startDateTime - this.clock.now();
    return until > 0 && until <= SOON_DELAY_MS;
  }

  /** Start is less than OBSERVE_DELAY away, or already passed */
  isNearTime(): boolean {
    return this.startDateTime - this.clock.now() <= OBSERVE_DELAY_MS;
  }

  /** Between event opening and the wave leaving its start edge */
  isStartWarmingInProgress(): boolean {
    const now = this.clock.now();
    return now >= this.startDateTime && now < this.getWaveStartDateTime();
  }
}

export function createWaveEvent(config: WaveEventConfig, deps: WaveEventDependencies): WaveEvent {
  return new WaveEvent(config, deps);
}
