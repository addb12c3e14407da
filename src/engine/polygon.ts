import type { Area, BoundingBox, Polygon, Position, Segment, SplitPolygonResult } from '../types/geo';

/** Cross-product tolerance for collinearity, in degree units */
const ON_SEGMENT_TOLERANCE = 1e-10;

function samePosition(a: Position, b: Position): boolean {
  return a.lat === b.lat && a.lng === b.lng;
}

/** Drop the closing duplicate, if any */
export function openRing(polygon: Polygon): Polygon {
  if (polygon.length > 1 && samePosition(polygon[0], polygon[polygon.length - 1])) {
    return polygon.slice(0, -1);
  }
  return [...polygon];
}

/** Append the first point unless the ring is already closed */
export function closeRing(polygon: Polygon): Polygon {
  if (polygon.length === 0) return [];
  if (samePosition(polygon[0], polygon[polygon.length - 1])) return [...polygon];
  return [...polygon, polygon[0]];
}

/**
 * Ray-casting crossing count. A point whose latitude row meets an edge exactly
 * at its own longitude is reported inside.
 */
export function isPointInPolygon(point: Position, polygon: Polygon): boolean {
  const n = polygon.length;
  if (n < 3) return false;

  let crossings = 0;
  for (let i = 0; i < n; i++) {
    const prev = polygon[(i - 1 + n) % n];
    const curr = polygon[i];
    if ((prev.lat > point.lat) === (curr.lat > point.lat)) continue;

    const lngAt = prev.lng + ((point.lat - prev.lat) * (curr.lng - prev.lng)) / (curr.lat - prev.lat);
    if (lngAt === point.lng) return true;
    if (lngAt > point.lng) crossings++;
  }
  return crossings % 2 === 1;
}

export function isPointInArea(point: Position, area: Area): boolean {
  return area.some((polygon) => isPointInPolygon(point, polygon));
}

export function polygonBbox(polygon: Polygon): BoundingBox {
  if (polygon.length === 0) {
    throw new Error('Cannot compute bounding box of an empty polygon');
  }
  let minLat = Infinity;
  let maxLat = -Infinity;
  let minLng = Infinity;
  let maxLng = -Infinity;
  for (const p of polygon) {
    minLat = Math.min(minLat, p.lat);
    maxLat = Math.max(maxLat, p.lat);
    minLng = Math.min(minLng, p.lng);
    maxLng = Math.max(maxLng, p.lng);
  }
  return { sw: { lat: minLat, lng: minLng }, ne: { lat: maxLat, lng: maxLng } };
}

/** Union of the boxes of every non-empty polygon */
export function areaBbox(area: Area): BoundingBox {
  const boxes = area.filter((p) => p.length > 0).map(polygonBbox);
  if (boxes.length === 0) {
    throw new Error('Cannot compute bounding box of an empty area');
  }
  return boxes.reduce((acc, box) => ({
    sw: { lat: Math.min(acc.sw.lat, box.sw.lat), lng: Math.min(acc.sw.lng, box.sw.lng) },
    ne: { lat: Math.max(acc.ne.lat, box.ne.lat), lng: Math.max(acc.ne.lng, box.ne.lng) },
  }));
}

export function isPointOnLineSegment(point: Position, segment: Segment): boolean {
  const { start, end } = segment;
  const cross =
    (end.lat - start.lat) * (point.lng - start.lng) -
    (end.lng - start.lng) * (point.lat - start.lat);
  if (Math.abs(cross) >= ON_SEGMENT_TOLERANCE) return false;

  return (
    point.lat >= Math.min(start.lat, end.lat) &&
    point.lat <= Math.max(start.lat, end.lat) &&
    point.lng >= Math.min(start.lng, end.lng) &&
    point.lng <= Math.max(start.lng, end.lng)
  );
}

/** On the segment but not one of its endpoints */
function isStrictlyInside(point: Position, start: Position, end: Position): boolean {
  if (samePosition(point, start) || samePosition(point, end)) return false;
  return isPointOnLineSegment(point, { start, end });
}

function squaredDistance(a: Position, b: Position): number {
  return (a.lat - b.lat) ** 2 + (a.lng - b.lng) ** 2;
}

function withoutConsecutiveDuplicates(ring: Polygon): Polygon {
  return ring.filter((p, i) => i === 0 || !samePosition(p, ring[i - 1]));
}

function isValidRing(ring: Polygon): boolean {
  const open = openRing(ring);
  const distinct = new Set(open.map((p) => `${p.lat},${p.lng}`));
  if (distinct.size < 3) return false;
  const allSameLat = open.every((p) => p.lat === open[0].lat);
  const allSameLng = open.every((p) => p.lng === open[0].lng);
  return !allSameLat && !allSameLng;
}

/**
 * Re-group a flat boundary walk into closed rings.
 *
 * Scans the points once, accumulating a candidate ring. A ring is pinched off
 * when an accumulated vertex lies inside the edge being added, when the new
 * point lies inside an accumulated edge, or when the new point repeats an
 * accumulated vertex. Rings with fewer than three distinct vertices, or lying
 * on one latitude or one longitude, are dropped.
 */
export function reconstructRings(points: Polygon): Polygon[] {
  const open = withoutConsecutiveDuplicates(openRing(points));
  if (open.length === 0) return [];

  const rings: Polygon[] = [];
  let acc: Position[] = [];

  for (const q of [...open, open[0]]) {
    if (acc.length === 0) {
      acc.push(q);
      continue;
    }

    // Visited vertices swallowed by the new edge, nearest first
    for (;;) {
      const last = acc[acc.length - 1];
      let idx = -1;
      for (let j = 0; j < acc.length - 1; j++) {
        if (!isStrictlyInside(acc[j], last, q)) continue;
        if (idx === -1 || squaredDistance(acc[j], last) < squaredDistance(acc[idx], last)) {
          idx = j;
        }
      }
      if (idx === -1) break;
      rings.push(closeRing(acc.slice(idx)));
      acc = acc.slice(0, idx + 1);
    }

    const edgeIdx = acc.findIndex((p, i) => i < acc.length - 1 && isStrictlyInside(q, p, acc[i + 1]));
    if (edgeIdx !== -1) {
      rings.push(closeRing([...acc.slice(edgeIdx + 1), q]));
      acc = [...acc.slice(0, edgeIdx + 1), q];
      continue;
    }

    const repeatIdx = acc.findIndex((p) => samePosition(p, q));
    if (repeatIdx !== -1) {
      rings.push([...acc.slice(repeatIdx), q]);
      acc = acc.slice(0, repeatIdx + 1);
      continue;
    }

    acc.push(q);
  }

  if (acc.length > 1) rings.push(closeRing(acc));

  return rings.map(withoutConsecutiveDuplicates).filter(isValidRing);
}

/**
 * Split a polygon along a meridian. Vertices on the cut belong to both sides;
 * edges straddling it contribute their crossing point to both.
 */
export function splitPolygonByLongitude(polygon: Polygon, cutLongitude: number): SplitPolygonResult {
  const pts = openRing(polygon);
  if (pts.length === 0) return { left: [], right: [] };

  const { sw, ne } = polygonBbox(pts);
  if (cutLongitude > ne.lng) return { left: [closeRing(pts)], right: [] };
  if (cutLongitude < sw.lng) return { left: [], right: [closeRing(pts)] };

  const left: Position[] = [];
  const right: Position[] = [];
  for (let i = 0; i < pts.length; i++) {
    const curr = pts[i];
    const next = pts[(i + 1) % pts.length];
    if (curr.lng <= cutLongitude) left.push(curr);
    if (curr.lng >= cutLongitude) right.push(curr);

    const straddles =
      (curr.lng < cutLongitude && next.lng > cutLongitude) ||
      (curr.lng > cutLongitude && next.lng < cutLongitude);
    if (straddles) {
      const t = (cutLongitude - curr.lng) / (next.lng - curr.lng);
      const crossing = { lat: curr.lat + t * (next.lat - curr.lat), lng: cutLongitude };
      left.push(crossing);
      right.push(crossing);
    }
  }

  return {
    left: reconstructRings(closeRing(left)),
    right: reconstructRings(closeRing(right)),
  };
}

function clipAtLatitude(points: Position[], bound: number, keepAbove: boolean): Position[] {
  const inside = (p: Position) => (keepAbove ? p.lat >= bound : p.lat <= bound);
  const out: Position[] = [];
  for (let i = 0; i < points.length; i++) {
    const curr = points[i];
    const next = points[(i + 1) % points.length];
    if (inside(curr)) out.push(curr);
    if (inside(curr) !== inside(next)) {
      const t = (bound - curr.lat) / (next.lat - curr.lat);
      out.push({ lat: bound, lng: curr.lng + t * (next.lng - curr.lng) });
    }
  }
  return out;
}

/**
 * Part of a polygon between two parallels. A concave polygon may come back as
 * several rings.
 */
export function clipToLatitudeBand(polygon: Polygon, minLat: number, maxLat: number): Polygon[] {
  const pts = openRing(polygon);
  if (pts.length === 0) return [];

  const { sw, ne } = polygonBbox(pts);
  if (sw.lat >= minLat && ne.lat <= maxLat) return [closeRing(pts)];
  if (ne.lat < minLat || sw.lat > maxLat) return [];

  const clipped = clipAtLatitude(clipAtLatitude(pts, minLat, true), maxLat, false);
  if (clipped.length === 0) return [];
  return reconstructRings(closeRing(clipped));
}
