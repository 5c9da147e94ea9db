export type RandomSource = () => number;

// mulberry32: small, fast and good enough for chart noise
export function mulberry32(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandom(seed?: number): RandomSource {
  if (seed === undefined) return Math.random;
  return mulberry32(seed);
}

/** Draws a value in [min, max]. */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}
