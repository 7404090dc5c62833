/**
 * Seeded random number generator returning floats in [0, 1)
 */
export type RNG = () => number;

/**
 * mulberry32: small, fast and fully determined by its 32-bit seed
 */
export function createRNG(seed: number): RNG {
  let state = seed >>> 0;

  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Integer in [min, max] inclusive
 */
export function randomInt(rng: RNG, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}
