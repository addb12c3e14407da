import type { Direction, WaveEventConfig } from '../types/wave';
import type { PositionStore } from '../store/positionStore';
import type { Clock } from '../engine/clock';
import { EventArea } from '../engine/eventArea';
import { createWaveEvent, type WaveEvent } from '../engine/waveEvent';
import { parseGeoJsonArea } from './geoJsonArea';
import eventsData from './events.json';

export interface EventDefinition extends WaveEventConfig {
  /** GeoJSON Polygon / MultiPolygon, bare or wrapped in features */
  area: unknown;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDirection(value: unknown): value is Direction {
  return value === 'east' || value === 'west';
}

function requireString(obj: JsonObject, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`Event definition: "${key}" must be a non-empty string`);
  }
  return value;
}

function requireNumber(obj: JsonObject, key: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Event definition: "${key}" must be a number`);
  }
  return value;
}

/** Validate one catalogue entry */
export function parseEventDefinition(value: unknown): EventDefinition {
  if (!isObject(value)) throw new Error('Event definition must be an object');
  const wave = value.wave;
  if (!isObject(wave)) throw new Error('Event definition: "wave" must be an object');
  const direction = wave.direction;
  if (!isDirection(direction)) {
    throw new Error(`Event definition: invalid wave direction ${String(direction)}`);
  }

  return {
    id: requireString(value, 'id'),
    timeZone: requireString(value, 'timeZone'),
    startsAt: requireString(value, 'startsAt'),
    approximateDurationMs: requireNumber(value, 'approximateDurationMs'),
    startWarmingMs: value.startWarmingMs === undefined ? 0 : requireNumber(value, 'startWarmingMs'),
    wave: { speed: requireNumber(wave, 'speed'), direction },
    area: value.area,
  };
}

export function getEventDefinitions(): EventDefinition[] {
  const list: unknown = eventsData;
  if (!Array.isArray(list)) throw new Error('Event catalogue must be an array');
  return list.map(parseEventDefinition);
}

export interface CatalogueDependencies {
  clock: Clock;
  positions: PositionStore;
}

/** Build every catalogue event, each area loading lazily from its GeoJSON */
export function createEventCatalogue(
  deps: CatalogueDependencies,
  definitions: EventDefinition[] = getEventDefinitions(),
): Map<string, WaveEvent> {
  const events = new Map<string, WaveEvent>();
  for (const def of definitions) {
    const area = new EventArea(def.id, async () => parseGeoJsonArea(def.area));
    events.set(def.id, createWaveEvent(def, { ...deps, area }));
  }
  return events;
}
