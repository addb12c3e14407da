import { describe, it, expect } from 'vitest';
import { convertPolygonsToGeoJson, toFeatureCollection } from '../../src/engine/geoJson';
import { rectangle } from '../helpers/fixtures';

describe('convertPolygonsToGeoJson', () => {
  it('writes one Polygon feature per ring in lng/lat order', () => {
    const json = JSON.parse(convertPolygonsToGeoJson([rectangle(10, 20, 11, 21)]));
    expect(json).toEqual({
      type: 'FeatureCollection',
      features: [
        {
          type: 'Feature',
          geometry: {
            type: 'Polygon',
            coordinates: [[[20, 10], [21, 10], [21, 11], [20, 11], [20, 10]]],
          },
          properties: {},
        },
      ],
    });
  });

  it('produces an empty collection for no polygons', () => {
    expect(convertPolygonsToGeoJson([])).toBe('{"type":"FeatureCollection","features":[]}');
  });

  it('does not touch its input', () => {
    const polygon = rectangle(0, 0, 1, 1);
    const before = JSON.stringify(polygon);
    toFeatureCollection([polygon, polygon]);
    expect(JSON.stringify(polygon)).toBe(before);
  });
});
