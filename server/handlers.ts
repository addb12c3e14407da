import { toFeatureCollection } from "../src/engine/geoJson";
import type { WaveEvent } from "../src/engine/waveEvent";
import { getAllNumbers } from "../src/engine/waveNumbers";
import type { Position } from "../src/types/geo";

export interface HandlerResult {
  status: number;
  body: unknown;
}

export type EventCatalogue = Map<string, WaveEvent>;

const notFound = (id: string): HandlerResult => ({
  status: 404,
  body: { error: `Unknown event: ${id}` },
});

function toIso(instant: number | null): string | null {
  return instant === null ? null : new Date(instant).toISOString();
}

export async function listEvents(events: EventCatalogue): Promise<HandlerResult> {
  const body = [];
  for (const event of events.values()) {
    body.push({
      id: event.id,
      timeZone: event.timeZone,
      startsAt: toIso(event.getStartDateTime()),
      status: await event.getStatus(),
      progression: await event.wave.getProgression(),
    });
  }
  return { status: 200, body };
}

export async function eventNumbers(events: EventCatalogue, id: string): Promise<HandlerResult> {
  const event = events.get(id);
  if (!event) return notFound(id);
  return { status: 200, body: await getAllNumbers(event) };
}

export async function waveGeoJson(events: EventCatalogue, id: string): Promise<HandlerResult> {
  const event = events.get(id);
  if (!event) return notFound(id);

  const polygons = await event.wave.getWavePolygons();
  if (!polygons) {
    return { status: 409, body: { error: "Wave is not in progress" } };
  }
  return {
    status: 200,
    body: {
      timestamp: toIso(polygons.timestamp),
      traversed: toFeatureCollection(polygons.traversedArea),
      remaining: toFeatureCollection(polygons.remainingArea),
    },
  };
}

function parseCoordinate(raw: unknown, min: number, max: number): number | null {
  if (typeof raw !== "string" || raw.trim() === "") return null;
  const value = Number(raw);
  return Number.isFinite(value) && value >= min && value <= max ? value : null;
}

export async function hitPrediction(
  events: EventCatalogue,
  id: string,
  query: { lat?: unknown; lng?: unknown },
): Promise<HandlerResult> {
  const event = events.get(id);
  if (!event) return notFound(id);

  const lat = parseCoordinate(query.lat, -90, 90);
  const lng = parseCoordinate(query.lng, -180, 180);
  if (lat === null || lng === null) {
    return { status: 400, body: { error: "lat and lng query parameters are required" } };
  }

  const position: Position = { lat, lng };
  const hit = await event.wave.userHitDateTime(position);
  return {
    status: 200,
    body: {
      inArea: await event.area.isPositionWithin(position),
      hitAt: toIso(hit),
      timeBeforeHitMs: await event.wave.timeBeforeUserHit(position),
      ratio: await event.wave.userPositionToWaveRatio(position),
      warmingStartsAt: toIso(await event.warming.userWarmingStartDateTime(position)),
    },
  };
}
