import type { BoundingBox, Position } from '../types/geo';
import type { Direction } from '../types/wave';

/** Equatorial radius in metres (WGS84) */
export const EARTH_RADIUS = 6378137;

export function toRad(deg: number): number {
  return deg * (Math.PI / 180);
}

export function toDeg(rad: number): number {
  return rad * (180 / Math.PI);
}

/**
 * Distance in metres between two longitudes, measured along the parallel at `lat`.
 */
export function calculateDistance(lon1: number, lon2: number, lat: number): number {
  return Math.abs(EARTH_RADIUS * toRad(lon2 - lon1) * Math.cos(toRad(lat)));
}

/** Latitude inside the box where a degree of longitude is widest */
export function latitudeOfWidestPart(bbox: BoundingBox): number {
  const { sw, ne } = bbox;
  if (sw.lat <= 0 && ne.lat >= 0) return 0;
  return Math.abs(sw.lat) < Math.abs(ne.lat) ? sw.lat : ne.lat;
}

export function bboxWidth(bbox: BoundingBox): number {
  return bbox.ne.lng - bbox.sw.lng;
}

export function bboxHeight(bbox: BoundingBox): number {
  return bbox.ne.lat - bbox.sw.lat;
}

/** Edge longitude the wave starts from */
export function startEdgeLongitude(bbox: BoundingBox, direction: Direction): number {
  return direction === 'east' ? bbox.sw.lng : bbox.ne.lng;
}

/**
 * Longitude reached after travelling `distance` metres from the start edge
 * along the parallel at `lat`, clamped to the box.
 */
export function earthAdaptedLongitude(
  bbox: BoundingBox,
  direction: Direction,
  distance: number,
  lat: number,
): number {
  const cosLat = Math.cos(toRad(lat));
  // Near the poles every distance covers the whole box
  const deltaLng = cosLat <= 1e-12 ? Infinity : toDeg(distance / (EARTH_RADIUS * cosLat));
  if (direction === 'east') {
    return Math.min(bbox.ne.lng, bbox.sw.lng + deltaLng);
  }
  return Math.max(bbox.sw.lng, bbox.ne.lng - deltaLng);
}

/** True when the two positions are within `epsilon` degrees on both axes */
export function isNear(a: Position, b: Position, epsilon: number): boolean {
  return Math.abs(a.lat - b.lat) < epsilon && Math.abs(a.lng - b.lng) < epsilon;
}
