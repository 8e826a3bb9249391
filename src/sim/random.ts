import type { RandomSource } from "./types";

export const defaultRandom: RandomSource = () => Math.random();

/**
 * Small seeded PRNG (mulberry32). Same seed, same stream, which is all a
 * reproducible shift needs.
 */
export function mulberry32(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Inclusive integer draw in [min, max]. */
export function randInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

export type WeightTable<T> = ReadonlyArray<readonly [value: T, weight: number]>;

/**
 * Build a discrete weighted sampler. Weights need not sum to 100; each draw
 * consumes exactly one value from the random source.
 */
export function createWeightedSampler<T>(table: WeightTable<T>): (rng: RandomSource) => T {
  if (table.length === 0) {
    throw new Error("Weighted sampler needs at least one entry");
  }
  const total = table.reduce((sum, [, weight]) => sum + weight, 0);
  if (!(total > 0)) {
    throw new Error("Weighted sampler needs a positive total weight");
  }
  const last = table[table.length - 1][0];

  return (rng) => {
    let remaining = rng() * total;
    for (const [value, weight] of table) {
      if (remaining < weight) return value;
      remaining -= weight;
    }
    // float drift at the top edge
    return last;
  };
}
