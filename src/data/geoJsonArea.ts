import type { Area, Polygon } from '../types/geo';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPosition(value: unknown): { lat: number; lng: number } {
  if (!Array.isArray(value) || value.length < 2) {
    throw new Error('Invalid GeoJSON position');
  }
  const [lng, lat] = value;
  if (typeof lng !== 'number' || typeof lat !== 'number' || !Number.isFinite(lng) || !Number.isFinite(lat)) {
    throw new Error('Invalid GeoJSON position');
  }
  return { lat, lng };
}

function toRing(value: unknown): Polygon {
  if (!Array.isArray(value)) throw new Error('Invalid GeoJSON ring');
  return value.map(toPosition);
}

/** Outer ring only; holes are not part of an event area */
function polygonOuterRing(coordinates: unknown): Polygon {
  if (!Array.isArray(coordinates) || coordinates.length === 0) {
    throw new Error('Invalid GeoJSON polygon');
  }
  return toRing(coordinates[0]);
}

function geometryToArea(geometry: JsonObject): Area {
  switch (geometry.type) {
    case 'Polygon':
      return [polygonOuterRing(geometry.coordinates)];
    case 'MultiPolygon':
      if (!Array.isArray(geometry.coordinates)) throw new Error('Invalid GeoJSON multipolygon');
      return geometry.coordinates.map(polygonOuterRing);
    default:
      throw new Error(`Unsupported GeoJSON geometry: ${String(geometry.type)}`);
  }
}

function objectToArea(value: unknown): Area {
  if (!isObject(value)) throw new Error('Invalid GeoJSON object');

  switch (value.type) {
    case 'FeatureCollection':
      if (!Array.isArray(value.features)) throw new Error('Invalid GeoJSON feature collection');
      return value.features.flatMap(objectToArea);
    case 'Feature':
      // Features without geometry contribute nothing
      if (value.geometry === null) return [];
      if (!isObject(value.geometry)) throw new Error('Invalid GeoJSON feature');
      return geometryToArea(value.geometry);
    default:
      return geometryToArea(value);
  }
}

/**
 * Parse Polygon / MultiPolygon geometry (bare, in a Feature or in a
 * FeatureCollection) into an area. Coordinates are [lng, lat].
 */
export function parseGeoJsonArea(input: unknown): Area {
  const value: unknown = typeof input === 'string' ? JSON.parse(input) : input;
  return objectToArea(value).filter((polygon) => polygon.length > 0);
}
