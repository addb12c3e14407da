import { describe, it, expect } from 'vitest';
import {
  createProgressionThrottle,
  createRatioThrottle,
  createTimeBeforeHitThrottle,
  timeBeforeHitThreshold,
} from '../../src/engine/throttle';

describe('Throttle', () => {
  it('suppresses progression changes below 0.1 points', () => {
    const gate = createProgressionThrottle();
    const emitted = [10.0, 10.05, 10.09, 10.2].filter((v) => gate.accept(v));
    expect(emitted).toEqual([10.0, 10.2]);
  });

  it('always lets the first value through', () => {
    const gate = createRatioThrottle();
    expect(gate.lastAccepted).toBeNull();
    expect(gate.accept(0.42)).toBe(true);
    expect(gate.lastAccepted).toBe(0.42);
  });

  it('gates the position ratio at 1%', () => {
    const gate = createRatioThrottle();
    gate.accept(0.5);
    expect(gate.accept(0.505)).toBe(false);
    expect(gate.accept(0.52)).toBe(true);
  });

  it('lets forced changes through regardless of size', () => {
    const gate = createProgressionThrottle();
    gate.accept(99.95);
    expect(gate.accept(100)).toBe(false);
    expect(gate.accept(100, true)).toBe(true);
    expect(gate.accept(100, true)).toBe(false);
  });

  it('starts over after reset', () => {
    const gate = createProgressionThrottle();
    gate.accept(10);
    gate.reset();
    expect(gate.accept(10.01)).toBe(true);
  });

  describe('time before hit', () => {
    it('tightens to 50 ms inside the last two seconds', () => {
      expect(timeBeforeHitThreshold(10_000)).toBe(1000);
      expect(timeBeforeHitThreshold(2_000)).toBe(50);
      expect(timeBeforeHitThreshold(1)).toBe(50);
      expect(timeBeforeHitThreshold(0)).toBe(1000);
      expect(timeBeforeHitThreshold(-500)).toBe(1000);
    });

    it('emits every second far from the hit and every 50 ms near it', () => {
      const gate = createTimeBeforeHitThrottle();
      const far = [10_000, 9_500, 9_000, 8_500, 8_000].filter((v) => gate.accept(v));
      expect(far).toEqual([10_000, 9_000, 8_000]);

      const near = [1_900, 1_880, 1_850, 1_800].filter((v) => gate.accept(v));
      expect(near).toEqual([1_900, 1_850, 1_800]);
    });
  });
});
