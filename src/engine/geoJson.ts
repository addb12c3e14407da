import type { Polygon } from '../types/geo';

export interface GeoJsonPolygonFeature {
  type: 'Feature';
  geometry: {
    type: 'Polygon';
    coordinates: number[][][];
  };
  properties: Record<string, never>;
}

export interface GeoJsonFeatureCollection {
  type: 'FeatureCollection';
  features: GeoJsonPolygonFeature[];
}

/** One Polygon feature per ring, coordinates in [lng, lat] order */
export function toFeatureCollection(polygons: Polygon[]): GeoJsonFeatureCollection {
  return {
    type: 'FeatureCollection',
    features: polygons.map((polygon) => ({
      type: 'Feature',
      geometry: {
        type: 'Polygon',
        coordinates: [polygon.map((p) => [p.lng, p.lat])],
      },
      properties: {},
    })),
  };
}

export function convertPolygonsToGeoJson(polygons: Polygon[]): string {
  return JSON.stringify(toFeatureCollection(polygons));
}
