/** Uniform float in [0, 1) */
export type RandomSource = () => number;

/**
 * Seeded pseudo-random number generator (mulberry32).
 * Same seed, same sequence: used for reproducible simulation positions.
 */
export function createSeededRandom(seed: number) {
  let state = seed | 0;

  function next(): number {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  return {
    random: next,

    /** Float in [min, max) */
    between(min: number, max: number): number {
      return min + next() * (max - min);
    },
  };
}
