import { describe, it, expect, beforeEach } from 'vitest';
import { LinearWave } from '../../src/engine/linearWave';
import { WaveWarming } from '../../src/engine/warming';
import { createPositionStore } from '../../src/store/positionStore';
import { EQUATOR_BOX, FakeArea, START, createManualClock, equatorHit, fakeEvent } from '../helpers/fixtures';

describe('WaveWarming', () => {
  const position = { lat: 0, lng: 0.5 };
  let clock: ReturnType<typeof createManualClock>;
  let warming: WaveWarming;

  beforeEach(() => {
    clock = createManualClock(START);
    const wave = new LinearWave({ speed: 10, direction: 'east' }, { clock, positions: createPositionStore() });
    wave.setRelatedEvent(fakeEvent(new FakeArea([EQUATOR_BOX])));
    warming = new WaveWarming(wave, clock);
  });

  it('has fixed lead times', () => {
    expect(warming.getWarmingDuration()).toBe(150_000);
    expect(warming.getWarnBeforeHitDuration()).toBe(30_000);
  });

  it('starts warming before the hit by both lead times', async () => {
    expect(await warming.userWarmingStartDateTime(position)).toBeCloseTo(equatorHit(0.5) - 180_000, 3);
  });

  it('reports whether warming has started', async () => {
    const start = await warming.userWarmingStartDateTime(position);
    expect(start).not.toBeNull();

    clock.set((start ?? 0) - 1);
    expect(await warming.isUserWarmingStarted(position)).toBe(false);
    clock.set(start ?? 0);
    expect(await warming.isUserWarmingStarted(position)).toBe(true);
  });

  it('has no warming without a hit', async () => {
    expect(await warming.userWarmingStartDateTime({ lat: 5, lng: 5 })).toBeNull();
    expect(await warming.isUserWarmingStarted({ lat: 5, lng: 5 })).toBe(false);
    expect(await warming.isUserWarmingStarted(null)).toBe(false);
  });

  it('accepts custom lead times', async () => {
    const wave = new LinearWave({ speed: 10, direction: 'east' }, { clock, positions: createPositionStore() });
    wave.setRelatedEvent(fakeEvent(new FakeArea([EQUATOR_BOX])));
    const quick = new WaveWarming(wave, clock, { warmingMs: 10_000, warnBeforeHitMs: 5_000 });
    expect(await quick.userWarmingStartDateTime(position)).toBeCloseTo(equatorHit(0.5) - 15_000, 3);
  });
});
