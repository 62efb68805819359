/**
 * Bootstrap Resampling
 * Confidence intervals for an arbitrary statistic by resampling with replacement
 */

import { OutOfRangeError } from './errors.ts'
import { percentileSorted } from './quantile.ts'
import { createRandom, randomIndex, type Random } from './random.ts'

export const DEFAULT_ITERATIONS = 1024

/**
 * Statistic evaluated on each resample
 */
export type Statistic = (sample: ArrayLike<number>) => number

export interface ConfidenceInterval {
  low: number
  high: number
}

export interface BootstrapOptions {
  iterations?: number // Resamples drawn (default 1024)
  seed?: number // Reproducible draws
  random?: Random // Explicit source, takes precedence over seed
}

/**
 * Draw a same-length resample using the given source
 */
export function resampleWith(sample: ArrayLike<number>, random: Random): number[] {
  const n = sample.length
  const out = new Array<number>(n)
  for (let i = 0; i < n; i++) {
    out[i] = sample[randomIndex(random, n)]!
  }
  return out
}

/**
 * Resample with replacement
 * @param seed - Makes the draw reproducible; omitted means non-deterministic
 */
export function resample(sample: ArrayLike<number>, seed?: number): number[] {
  if (sample.length === 0) return []
  return resampleWith(sample, createRandom(seed))
}

function checkConfidence(confidenceLevel: number): void {
  if (!(confidenceLevel > 0 && confidenceLevel < 100)) {
    throw new OutOfRangeError('confidence level', confidenceLevel, 0, 100, true)
  }
}

function resolveIterations(options: BootstrapOptions): number {
  const iterations = options.iterations ?? DEFAULT_ITERATIONS
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new OutOfRangeError(
      'iterations',
      iterations,
      1,
      Infinity,
      false,
      `iterations must be a positive integer, got ${iterations}`
    )
  }
  return iterations
}

/**
 * Symmetric two-tailed interval over a bootstrap distribution
 */
function intervalOf(results: number[], confidenceLevel: number): ConfidenceInterval {
  results.sort((a, b) => a - b)
  const tail = (100 - confidenceLevel) / 2
  return {
    low: percentileSorted(results, tail),
    high: percentileSorted(results, 100 - tail),
  }
}

/**
 * Bootstrap confidence interval of `statistic` over one sample
 * @param confidenceLevel - Percentage in (0, 100), e.g. 95
 */
export function confidenceInterval(
  sample: ArrayLike<number>,
  statistic: Statistic,
  confidenceLevel: number,
  options?: BootstrapOptions
): ConfidenceInterval

/**
 * Bootstrap confidence interval of statistic(sample1) - statistic(sample2).
 * Both samples are resampled independently on every iteration.
 */
export function confidenceInterval(
  sample1: ArrayLike<number>,
  sample2: ArrayLike<number>,
  statistic: Statistic,
  confidenceLevel: number,
  options?: BootstrapOptions
): ConfidenceInterval

export function confidenceInterval(
  sample1: ArrayLike<number>,
  second: ArrayLike<number> | Statistic,
  third: Statistic | number,
  fourth?: number | BootstrapOptions,
  fifth?: BootstrapOptions
): ConfidenceInterval {
  if (typeof second === 'function') {
    if (typeof third !== 'number' || typeof fourth === 'number') {
      throw new TypeError('confidenceInterval(sample, statistic, confidenceLevel, options?)')
    }
    return oneSample(sample1, second, third, fourth ?? {})
  }

  if (typeof third !== 'function' || typeof fourth !== 'number') {
    throw new TypeError(
      'confidenceInterval(sample1, sample2, statistic, confidenceLevel, options?)'
    )
  }
  return twoSample(sample1, second, third, fourth, fifth ?? {})
}

function oneSample(
  sample: ArrayLike<number>,
  statistic: Statistic,
  confidenceLevel: number,
  options: BootstrapOptions
): ConfidenceInterval {
  checkConfidence(confidenceLevel)
  const iterations = resolveIterations(options)
  if (sample.length === 0) return { low: 0, high: 0 }

  const random = options.random ?? createRandom(options.seed)
  const results = new Array<number>(iterations)
  for (let i = 0; i < iterations; i++) {
    results[i] = statistic(resampleWith(sample, random))
  }

  return intervalOf(results, confidenceLevel)
}

function twoSample(
  sample1: ArrayLike<number>,
  sample2: ArrayLike<number>,
  statistic: Statistic,
  confidenceLevel: number,
  options: BootstrapOptions
): ConfidenceInterval {
  checkConfidence(confidenceLevel)
  const iterations = resolveIterations(options)
  if (sample1.length === 0 || sample2.length === 0) return { low: 0, high: 0 }

  const random = options.random ?? createRandom(options.seed)
  const differences = new Array<number>(iterations)
  for (let i = 0; i < iterations; i++) {
    const a = statistic(resampleWith(sample1, random))
    const b = statistic(resampleWith(sample2, random))
    differences[i] = a - b
  }

  return intervalOf(differences, confidenceLevel)
}
