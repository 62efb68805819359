/**
 * Percentile Calculations
 * Linear interpolation between closest ranks (the "inclusive" / R-7 rule)
 */

import { sortedCopy } from './aggregate.ts'
import { OutOfRangeError } from './errors.ts'

function checkRank(p: number): void {
  // Written so that NaN fails too
  if (!(p >= 0 && p <= 100)) {
    throw new OutOfRangeError('percentile', p, 0, 100)
  }
}

/**
 * Interpolate percentile p (0-100) of a pre-sorted array.
 * The rank is not validated here.
 */
export function percentileSorted(sorted: ArrayLike<number>, p: number): number {
  const n = sorted.length
  if (n === 0) return 0

  const rank = (p / 100) * (n - 1)
  const lower = Math.floor(rank)
  const upper = Math.ceil(rank)
  const lo = sorted[lower]!
  if (lower === upper) return lo

  const hi = sorted[upper]
  if (hi === undefined) return lo
  return lo + (rank - lower) * (hi - lo)
}

/**
 * Percentile (0-100 scale) of an unsorted sample
 * @param sample - Sample, not modified
 * @param p - Percentile rank in [0, 100]
 * @throws OutOfRangeError when p is outside [0, 100] and the sample is not empty
 */
export function percentile(sample: ArrayLike<number>, p: number): number {
  if (sample.length === 0) return 0
  checkRank(p)
  return percentileSorted(sortedCopy(sample), p)
}

/**
 * Several percentiles over a single sort
 */
export function percentiles(sample: ArrayLike<number>, ps: readonly number[]): number[] {
  if (sample.length === 0) return ps.map(() => 0)
  ps.forEach(checkRank)
  const sorted = sortedCopy(sample)
  return ps.map((p) => percentileSorted(sorted, p))
}
