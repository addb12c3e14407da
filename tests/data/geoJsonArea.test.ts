import { describe, it, expect } from 'vitest';
import { parseGeoJsonArea } from '../../src/data/geoJsonArea';

const RING = [[0, 10], [1, 10], [1, 11], [0, 11], [0, 10]];
const AREA = [
  [
    { lat: 10, lng: 0 },
    { lat: 10, lng: 1 },
    { lat: 11, lng: 1 },
    { lat: 11, lng: 0 },
    { lat: 10, lng: 0 },
  ],
];

describe('parseGeoJsonArea', () => {
  it('reads a bare polygon in lng/lat order', () => {
    expect(parseGeoJsonArea({ type: 'Polygon', coordinates: [RING] })).toEqual(AREA);
  });

  it('reads features and feature collections', () => {
    const feature = { type: 'Feature', properties: {}, geometry: { type: 'Polygon', coordinates: [RING] } };
    expect(parseGeoJsonArea(feature)).toEqual(AREA);
    expect(parseGeoJsonArea({ type: 'FeatureCollection', features: [feature, feature] })).toHaveLength(2);
  });

  it('reads every polygon of a multipolygon', () => {
    const area = parseGeoJsonArea({ type: 'MultiPolygon', coordinates: [[RING], [RING]] });
    expect(area).toEqual([...AREA, ...AREA]);
  });

  it('accepts a JSON string', () => {
    expect(parseGeoJsonArea(JSON.stringify({ type: 'Polygon', coordinates: [RING] }))).toEqual(AREA);
  });

  it('keeps the outer ring and drops holes', () => {
    const hole = [[0.2, 10.2], [0.4, 10.2], [0.4, 10.4], [0.2, 10.2]];
    expect(parseGeoJsonArea({ type: 'Polygon', coordinates: [RING, hole] })).toEqual(AREA);
  });

  it('skips features without geometry and empty rings', () => {
    expect(parseGeoJsonArea({ type: 'Feature', properties: {}, geometry: null })).toEqual([]);
    expect(parseGeoJsonArea({ type: 'Polygon', coordinates: [[]] })).toEqual([]);
  });

  it('rejects unsupported or malformed input', () => {
    expect(() => parseGeoJsonArea({ type: 'LineString', coordinates: RING })).toThrow('Unsupported GeoJSON geometry: LineString');
    expect(() => parseGeoJsonArea({ type: 'Polygon', coordinates: [[[0, 'x']]] })).toThrow('Invalid GeoJSON position');
    expect(() => parseGeoJsonArea(42)).toThrow('Invalid GeoJSON object');
    expect(() => parseGeoJsonArea('{not json')).toThrow();
  });
});
