/**
 * Aggregate Statistics
 * Central tendency and dispersion over a whole sample
 *
 * Every function returns 0 for an empty sample rather than throwing;
 * callers that need to tell "no data" from a real zero check the length first.
 */

/**
 * Sorted copy of a sample, ascending. The input is never touched.
 */
export function sortedCopy(sample: ArrayLike<number>): number[] {
  return Array.from(sample).sort((a, b) => a - b)
}

/**
 * Median of an already sorted slice [start, end)
 */
function sortedMedian(sorted: number[], start: number, end: number): number {
  const n = end - start
  if (n <= 0) return 0
  const mid = start + Math.floor(n / 2)
  if (n % 2 === 0) {
    return (sorted[mid - 1]! + sorted[mid]!) / 2
  }
  return sorted[mid]!
}

/**
 * Arithmetic sum
 */
export function sum(sample: ArrayLike<number>): number {
  let total = 0
  for (let i = 0; i < sample.length; i++) {
    total += sample[i]!
  }
  return total
}

/**
 * Arithmetic mean
 */
export function mean(sample: ArrayLike<number>): number {
  if (sample.length === 0) return 0
  return sum(sample) / sample.length
}

/**
 * Geometric mean: (x1 * x2 * ... * xn)^(1/n)
 * Positive samples are averaged in log space so long samples neither
 * overflow nor underflow. Non-positive values are not rejected; they take
 * the direct product and the result may be NaN, 0 or Infinity.
 */
export function geoMean(sample: ArrayLike<number>): number {
  const n = sample.length
  if (n === 0) return 0

  let logSum = 0
  let product = 1
  let positive = true
  for (let i = 0; i < n; i++) {
    const x = sample[i]!
    if (!(x > 0)) positive = false
    if (positive) logSum += Math.log(x)
    product *= x
  }
  return positive ? Math.exp(logSum / n) : Math.pow(product, 1 / n)
}

/**
 * Median (average of the two middle values for an even count)
 */
export function median(sample: ArrayLike<number>): number {
  const sorted = sortedCopy(sample)
  return sortedMedian(sorted, 0, sorted.length)
}

/**
 * First quartile: median of the lower half.
 * For an odd count the lower half includes the middle element.
 */
export function firstQuartile(sample: ArrayLike<number>): number {
  const sorted = sortedCopy(sample)
  return sortedMedian(sorted, 0, Math.ceil(sorted.length / 2))
}

/**
 * Third quartile: median of the upper half.
 * For an odd count the upper half excludes the middle element.
 */
export function thirdQuartile(sample: ArrayLike<number>): number {
  const sorted = sortedCopy(sample)
  const n = sorted.length
  return sortedMedian(sorted, n - Math.floor(n / 2), n)
}

/**
 * Population variance (divides by n)
 */
export function variance(sample: ArrayLike<number>): number {
  const n = sample.length
  if (n === 0) return 0

  const m = mean(sample)
  let squared = 0
  for (let i = 0; i < n; i++) {
    const d = sample[i]! - m
    squared += d * d
  }
  return squared / n
}

/**
 * Population standard deviation
 */
export function stdev(sample: ArrayLike<number>): number {
  return Math.sqrt(variance(sample))
}

/**
 * Coefficient of variation (stdev / mean)
 * A zero mean on a non-empty sample yields NaN or Infinity.
 */
export function coeffOfVariation(sample: ArrayLike<number>): number {
  if (sample.length === 0) return 0
  return stdev(sample) / mean(sample)
}

/**
 * Smallest and largest value, both 0 for an empty sample
 */
export function minmax(sample: ArrayLike<number>): { min: number; max: number } {
  const n = sample.length
  if (n === 0) return { min: 0, max: 0 }

  let min = sample[0]!
  let max = sample[0]!
  for (let i = 1; i < n; i++) {
    const v = sample[i]!
    if (v < min) min = v
    if (v > max) max = v
  }
  return { min, max }
}

/**
 * Range (max - min)
 */
export function range(sample: ArrayLike<number>): number {
  const { min, max } = minmax(sample)
  return max - min
}

/**
 * Interquartile range (Q3 - Q1)
 */
export function iqr(sample: ArrayLike<number>): number {
  if (sample.length === 0) return 0
  return thirdQuartile(sample) - firstQuartile(sample)
}
