import {
  HIT_CACHE_EPSILON_DEG,
  MAX_WAVE_BANDS,
  MAX_WAVE_SPEED,
  WAVE_BAND_HEIGHT_DEG,
} from '../config/waveTiming';
import type { AreaPolygonProvider } from '../types/collaborators';
import type { Area, BoundingBox, Position } from '../types/geo';
import type { Direction, EventStatus, WaveConfig, WaveKind, WavePolygons } from '../types/wave';
import { currentPosition, type PositionStore } from '../store/positionStore';
import type { Clock } from './clock';
import {
  bboxHeight,
  bboxWidth,
  calculateDistance,
  earthAdaptedLongitude,
  isNear,
  latitudeOfWidestPart,
  startEdgeLongitude,
} from './geo';
import { clipToLatitudeBand, splitPolygonByLongitude } from './polygon';

/** What a wave needs from the event it belongs to */
export interface RelatedEvent {
  readonly id: string;
  readonly area: AreaPolygonProvider;
  /** Used while the area is not loaded (ms) */
  readonly approximateDurationMs: number;
  getWaveStartDateTime(): number;
  getStatus(): Promise<EventStatus>;
}

export interface WaveDependencies {
  clock: Clock;
  positions: PositionStore;
}

/**
 * A wave sweeping an event area. `position` arguments default to the current
 * observer position; pass `null` for "unknown".
 */
export interface WaveModel {
  readonly kind: WaveKind;
  readonly speed: number;
  readonly direction: Direction;

  setRelatedEvent(event: RelatedEvent): void;
  getWaveDuration(): Promise<number>;
  getEndDateTime(): Promise<number>;
  getWavePolygons(): Promise<WavePolygons | null>;
  userHitDateTime(position?: Position | null): Promise<number | null>;
  timeBeforeUserHit(position?: Position | null): Promise<number | null>;
  hasUserBeenHitInCurrentPosition(): Promise<boolean>;
  userPositionToWaveRatio(position?: Position | null): Promise<number | null>;
  closestWaveLongitude(latitude: number): Promise<number>;
  getProgression(): Promise<number>;
  clearDurationCache(): void;
}

interface Cached<T> {
  epoch: number;
  value: T;
}

interface HitCacheEntry {
  epoch: number;
  position: Position;
  instant: number;
}

function farthestFromEquator(a: number, b: number): number {
  return Math.abs(a) >= Math.abs(b) ? a : b;
}

function isResolved(bbox: BoundingBox): boolean {
  return bboxWidth(bbox) !== 0 || bboxHeight(bbox) !== 0;
}

/** Straight meridian-aligned front moving east or west at constant speed */
export class LinearWave implements WaveModel {
  readonly kind = 'linear';
  readonly speed: number;
  readonly direction: Direction;

  private event: RelatedEvent | null = null;
  // Bumped by clearDurationCache; stale entries are ignored
  private epoch = 0;
  private duration: Cached<number> | null = null;
  private bbox: Cached<BoundingBox> | null = null;
  private hit: HitCacheEntry | null = null;

  constructor(config: WaveConfig, private readonly deps: WaveDependencies) {
    if (!(config.speed > 0 && config.speed < MAX_WAVE_SPEED)) {
      throw new Error(`Invalid wave speed: ${config.speed}. Must be > 0 and < ${MAX_WAVE_SPEED} m/s.`);
    }
    this.speed = config.speed;
    this.direction = config.direction;
  }

  setRelatedEvent(event: RelatedEvent) {
    this.event = event;
    this.clearDurationCache();
  }

  clearDurationCache() {
    this.epoch++;
    this.duration = null;
    this.bbox = null;
    this.hit = null;
  }

  async getWaveDuration(): Promise<number> {
    const event = this.requireEvent();
    if (this.duration && this.duration.epoch === this.epoch) return this.duration.value;

    const epoch = this.epoch;
    const bbox = await this.getBbox();
    if (!isResolved(bbox)) return event.approximateDurationMs;

    const latitude = latitudeOfWidestPart(bbox);
    const distance = calculateDistance(bbox.sw.lng, bbox.ne.lng, latitude);
    const value = (distance / this.speed) * 1000;
    if (epoch === this.epoch) this.duration = { epoch, value };
    return value;
  }

  async getEndDateTime(): Promise<number> {
    const event = this.requireEvent();
    return event.getWaveStartDateTime() + (await this.getWaveDuration());
  }

  async getWavePolygons(): Promise<WavePolygons | null> {
    const event = this.requireEvent();
    if ((await event.getStatus()) !== 'running') return null;

    const now = this.deps.clock.now();
    const elapsed = now - event.getWaveStartDateTime();
    if (elapsed <= 0) return null;

    const bbox = await this.getBbox();
    const polygons = await event.area.getPolygons();
    const distance = (this.speed * elapsed) / 1000;

    // The front bends with latitude: cut each band at its own longitude,
    // taken at the band edge farthest from the equator
    const height = bboxHeight(bbox);
    const bands = Math.min(MAX_WAVE_BANDS, Math.max(1, Math.ceil(height / WAVE_BAND_HEIGHT_DEG)));
    const step = height / bands;

    const left: Area = [];
    const right: Area = [];
    for (let b = 0; b < bands; b++) {
      const minLat = bbox.sw.lat + b * step;
      const maxLat = b === bands - 1 ? bbox.ne.lat : minLat + step;
      const cut = earthAdaptedLongitude(bbox, this.direction, distance, farthestFromEquator(minLat, maxLat));
      for (const polygon of polygons) {
        for (const piece of clipToLatitudeBand(polygon, minLat, maxLat)) {
          const split = splitPolygonByLongitude(piece, cut);
          left.push(...split.left);
          right.push(...split.right);
        }
      }
    }
    if (left.length === 0 && right.length === 0) return null;

    const [traversedArea, remainingArea] = this.direction === 'east' ? [left, right] : [right, left];
    return { timestamp: now, traversedArea, remainingArea };
  }

  async userHitDateTime(position?: Position | null): Promise<number | null> {
    const event = this.requireEvent();
    const pos = this.resolvePosition(position);
    if (!pos) return null;

    const epoch = this.epoch;
    if (!(await event.area.isPositionWithin(pos))) return null;

    const cached = this.hit;
    if (cached && cached.epoch === epoch && isNear(cached.position, pos, HIT_CACHE_EPSILON_DEG)) {
      return cached.instant;
    }

    const bbox = await this.getBbox();
    const distance = calculateDistance(startEdgeLongitude(bbox, this.direction), pos.lng, pos.lat);
    const instant = event.getWaveStartDateTime() + (distance / this.speed) * 1000;
    if (epoch === this.epoch) this.hit = { epoch, position: pos, instant };
    return instant;
  }

  async timeBeforeUserHit(position?: Position | null): Promise<number | null> {
    const hit = await this.userHitDateTime(position);
    return hit === null ? null : hit - this.deps.clock.now();
  }

  async hasUserBeenHitInCurrentPosition(): Promise<boolean> {
    const hit = await this.userHitDateTime();
    return hit !== null && hit <= this.deps.clock.now();
  }

  async userPositionToWaveRatio(position?: Position | null): Promise<number | null> {
    const event = this.requireEvent();
    const pos = this.resolvePosition(position);
    if (!pos || !(await event.area.isPositionWithin(pos))) return null;

    const bbox = await this.getBbox();
    const width = bboxWidth(bbox);
    if (width <= 0) return null;
    const offset = this.direction === 'east' ? pos.lng - bbox.sw.lng : bbox.ne.lng - pos.lng;
    return Math.min(1, Math.max(0, offset / width));
  }

  async closestWaveLongitude(latitude: number): Promise<number> {
    const event = this.requireEvent();
    const bbox = await this.getBbox();
    const elapsed = Math.max(0, this.deps.clock.now() - event.getWaveStartDateTime());
    return earthAdaptedLongitude(bbox, this.direction, (this.speed * elapsed) / 1000, latitude);
  }

  async getProgression(): Promise<number> {
    const event = this.requireEvent();
    const status = await event.getStatus();
    if (status === 'done') return 100;
    if (status !== 'running') return 0;

    const elapsed = this.deps.clock.now() - event.getWaveStartDateTime();
    const duration = await this.getWaveDuration();
    if (duration <= 0) return 100;
    return Math.min(100, Math.max(0, (elapsed / duration) * 100));
  }

  private async getBbox(): Promise<BoundingBox> {
    const event = this.requireEvent();
    if (this.bbox && this.bbox.epoch === this.epoch) return this.bbox.value;

    const epoch = this.epoch;
    const value = await event.area.getBoundingBox();
    // An unloaded area reports a zero box; do not pin it
    if (isResolved(value) && epoch === this.epoch) this.bbox = { epoch, value };
    return value;
  }

  private resolvePosition(position: Position | null | undefined): Position | null {
    return position === undefined ? currentPosition(this.deps.positions) : position;
  }

  private requireEvent(): RelatedEvent {
    if (!this.event) throw new Error('Event not set');
    return this.event;
  }
}
