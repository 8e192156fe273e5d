/**
 * Deterministic inputs for heap tests.
 *
 * Uses a seeded PRNG (mulberry32) so randomized workloads are reproducible.
 */

/**
 * Mulberry32 seeded PRNG. Returns values in [0, 1).
 */
export function mulberry32(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Default seed for reproducible test fixtures. */
export const DEFAULT_SEED = 42;

/**
 * Integer keys in [0, range), duplicates likely when range < count.
 */
export function randomIntKeys(count: number, range: number, seed = DEFAULT_SEED): number[] {
  const rng = mulberry32(seed);
  return Array.from({ length: count }, () => Math.floor(rng() * range));
}

/**
 * Ascending copy of a key list.
 */
export function sortedCopy(keys: readonly number[]): number[] {
  return [...keys].sort((a, b) => a - b);
}
