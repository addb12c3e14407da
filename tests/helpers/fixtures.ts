import { abortableDelay } from '../../src/engine/clock';
import type { RelatedEvent } from '../../src/engine/linearWave';
import { areaBbox, isPointInArea } from '../../src/engine/polygon';
import type { AreaPolygonProvider } from '../../src/types/collaborators';
import type { Area, BoundingBox, Polygon, Position } from '../../src/types/geo';
import type { EventStatus, WaveEventConfig } from '../../src/types/wave';

export const START = Date.parse('2026-06-21T12:00:00Z');

/** Metres in one degree of longitude at the equator */
export const DEGREE_AT_EQUATOR = (6378137 * Math.PI) / 180;

export function rectangle(minLat: number, minLng: number, maxLat: number, maxLng: number): Polygon {
  return [
    { lat: minLat, lng: minLng },
    { lat: minLat, lng: maxLng },
    { lat: maxLat, lng: maxLng },
    { lat: maxLat, lng: minLng },
    { lat: minLat, lng: minLng },
  ];
}

/** 1° x 1° box centred on the equator, lng 0..1 */
export const EQUATOR_BOX: Polygon = rectangle(-0.5, 0, 0.5, 1);

export const EQUATOR_EVENT: WaveEventConfig = {
  id: 'equator_test',
  timeZone: 'UTC',
  startsAt: '2026-06-21T12:00:00Z',
  approximateDurationMs: 3_600_000,
  startWarmingMs: 0,
  wave: { speed: 10, direction: 'east' },
};

/** Hit instant for a position on the equator box, east wave at 10 m/s */
export function equatorHit(lng: number, lat = 0): number {
  return START + ((DEGREE_AT_EQUATOR * lng * Math.cos((lat * Math.PI) / 180)) / 10) * 1000;
}

export function createManualClock(start: number) {
  let current = start;
  return {
    now: () => current,
    delay: (_ms: number, signal?: AbortSignal) => abortableDelay(0, signal),
    set(instant: number) {
      current = instant;
    },
    advance(ms: number) {
      current += ms;
    },
  };
}

const ZERO_BOX: BoundingBox = { sw: { lat: 0, lng: 0 }, ne: { lat: 0, lng: 0 } };

/** In-memory area whose polygons can be swapped without notifying anyone */
export class FakeArea implements AreaPolygonProvider {
  bboxCalls = 0;

  constructor(public polygons: Area = []) {}

  async getPolygons(): Promise<Area> {
    return this.polygons;
  }

  async getBoundingBox(): Promise<BoundingBox> {
    this.bboxCalls++;
    return this.polygons.length > 0 ? areaBbox(this.polygons) : ZERO_BOX;
  }

  isLoaded(): boolean {
    return this.polygons.length > 0;
  }

  async isPositionWithin(position: Position): Promise<boolean> {
    return isPointInArea(position, this.polygons);
  }
}

export interface FakeEvent extends RelatedEvent {
  status: EventStatus;
}

export function fakeEvent(area: AreaPolygonProvider, status: EventStatus = 'running'): FakeEvent {
  return {
    id: 'fake',
    area,
    approximateDurationMs: 1_800_000,
    status,
    getWaveStartDateTime: () => START,
    async getStatus() {
      return this.status;
    },
  };
}

export function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve: () => resolve() };
}

/** Shoelace area in degree units */
export function ringArea(ring: Polygon): number {
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    sum += ring[i].lng * ring[i + 1].lat - ring[i + 1].lng * ring[i].lat;
  }
  return Math.abs(sum) / 2;
}
