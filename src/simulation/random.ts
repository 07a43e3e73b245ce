import seedrandom from "seedrandom";

/** Uniform source of values in [0, 1). */
export type RandomSource = () => number;

/**
 * Creates an engine-owned generator. With a seed the sequence is reproducible;
 * without one it is seeded from local entropy.
 */
export function createRandomSource(seed?: string): RandomSource {
  const prng = seed === undefined ? seedrandom() : seedrandom(seed);
  return () => prng();
}

/** Uniform integer in [lo, hi). */
export function randomInt(random: RandomSource, lo: number, hi: number): number {
  return lo + Math.floor(random() * (hi - lo));
}

/** Uniform choice from a non-empty list. */
export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new Error("pickOne: no items to choose from");
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}
