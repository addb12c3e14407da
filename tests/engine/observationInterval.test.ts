import { describe, it, expect } from 'vitest';
import { getObservationInterval } from '../../src/engine/observationInterval';

const MIN = 60_000;

const interval = (timeBeforeEventStart: number, timeBeforeHit: number | null = null, isRunning = false) =>
  getObservationInterval({ timeBeforeEventStart, timeBeforeHit, isRunning });

describe('getObservationInterval', () => {
  it('polls hourly more than 65 minutes out', () => {
    expect(interval(120 * MIN)).toBe(60 * MIN);
    expect(interval(65 * MIN + 1)).toBe(60 * MIN);
  });

  it('polls every 5 minutes up to 5m30s before the start', () => {
    expect(interval(65 * MIN)).toBe(5 * MIN);
    expect(interval(5.5 * MIN + 1)).toBe(5 * MIN);
  });

  it('polls every second in the last minutes before the start', () => {
    expect(interval(4 * MIN)).toBe(1000);
    expect(interval(36_000)).toBe(1000);
  });

  it('polls every 500 ms just before the start and while running', () => {
    expect(interval(35_000)).toBe(500);
    expect(interval(1)).toBe(500);
    expect(interval(-MIN, 60_000, true)).toBe(500);
  });

  it('tightens near the hit', () => {
    expect(interval(-MIN, 4_000, true)).toBe(200);
    expect(interval(-MIN, 500, true)).toBe(50);
    expect(interval(-MIN, 0, true)).toBe(50);
  });

  it('keeps polling a running event after the hit', () => {
    expect(interval(-MIN, -1, true)).toBe(500);
    expect(interval(-MIN, -10 * MIN, true)).toBe(500);
  });

  it('stops once the hit is behind and the event is no longer running', () => {
    expect(interval(-MIN, -1, false)).toBe(Infinity);
  });

  it('falls back to 30 s otherwise', () => {
    expect(interval(-MIN, null, false)).toBe(30_000);
  });
});
