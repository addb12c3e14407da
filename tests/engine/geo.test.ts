import { describe, it, expect } from 'vitest';
import {
  EARTH_RADIUS,
  calculateDistance,
  earthAdaptedLongitude,
  isNear,
  latitudeOfWidestPart,
  startEdgeLongitude,
} from '../../src/engine/geo';
import { DEGREE_AT_EQUATOR } from '../helpers/fixtures';

const box = (minLat: number, minLng: number, maxLat: number, maxLng: number) => ({
  sw: { lat: minLat, lng: minLng },
  ne: { lat: maxLat, lng: maxLng },
});

describe('geo', () => {
  it('measures one degree of longitude at the equator', () => {
    expect(calculateDistance(0, 1, 0)).toBeCloseTo(111319.49, 2);
    expect(calculateDistance(1, 0, 0)).toBeCloseTo(111319.49, 2);
  });

  it('shrinks with latitude', () => {
    expect(calculateDistance(0, 1, 60)).toBeCloseTo(DEGREE_AT_EQUATOR / 2, 6);
  });

  it('uses the equator when the box spans it', () => {
    expect(latitudeOfWidestPart(box(-10, 0, 5, 1))).toBe(0);
  });

  it('uses the edge closest to the equator otherwise', () => {
    expect(latitudeOfWidestPart(box(40, 0, 50, 1))).toBe(40);
    expect(latitudeOfWidestPart(box(-50, 0, -40, 1))).toBe(-40);
  });

  it('picks the start edge by direction', () => {
    expect(startEdgeLongitude(box(0, 2, 1, 3), 'east')).toBe(2);
    expect(startEdgeLongitude(box(0, 2, 1, 3), 'west')).toBe(3);
  });

  describe('earthAdaptedLongitude', () => {
    const bbox = box(-0.5, 0, 0.5, 1);

    it('moves east from the west edge', () => {
      expect(earthAdaptedLongitude(bbox, 'east', DEGREE_AT_EQUATOR / 4, 0)).toBeCloseTo(0.25, 9);
    });

    it('moves west from the east edge', () => {
      expect(earthAdaptedLongitude(bbox, 'west', DEGREE_AT_EQUATOR / 4, 0)).toBeCloseTo(0.75, 9);
    });

    it('covers more degrees at higher latitude', () => {
      expect(earthAdaptedLongitude(bbox, 'east', DEGREE_AT_EQUATOR / 4, 60)).toBeCloseTo(0.5, 9);
    });

    it('clamps to the box', () => {
      expect(earthAdaptedLongitude(bbox, 'east', 10 * EARTH_RADIUS, 0)).toBe(1);
      expect(earthAdaptedLongitude(bbox, 'west', 10 * EARTH_RADIUS, 0)).toBe(0);
      expect(earthAdaptedLongitude(bbox, 'east', 1, 90)).toBe(1);
    });
  });

  it('compares positions within an epsilon', () => {
    expect(isNear({ lat: 1, lng: 1 }, { lat: 1.000001, lng: 0.999999 }, 1e-5)).toBe(true);
    expect(isNear({ lat: 1, lng: 1 }, { lat: 1.0001, lng: 1 }, 1e-5)).toBe(false);
  });
});
