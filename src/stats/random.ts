/**
 * Uniform random sources for resampling
 */

import seedrandom from 'seedrandom'

/**
 * Uniform double in [0, 1)
 */
export type Random = () => number

/**
 * Seeded random number generator for reproducible draws.
 * Without a seed, falls back to Math.random.
 */
export function createRandom(seed?: number): Random {
  if (seed === undefined) return Math.random
  const prng = seedrandom(String(seed))
  return () => prng()
}

/**
 * Uniform integer in [0, n)
 */
export function randomIndex(random: Random, n: number): number {
  // Guards against a source that returns exactly 1
  return Math.min(Math.floor(random() * n), n - 1)
}
