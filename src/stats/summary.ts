/**
 * Descriptive Summary
 * Every aggregate statistic of a sample in one record
 */

import {
  coeffOfVariation,
  firstQuartile,
  geoMean,
  mean,
  median,
  minmax,
  stdev,
  sum,
  thirdQuartile,
  variance,
} from './aggregate.ts'

export interface Summary {
  n: number

  // Central tendency
  sum: number
  mean: number
  geoMean: number
  median: number

  // Quartiles
  q1: number
  q3: number
  iqr: number

  // Spread
  variance: number
  stdev: number
  coefficientOfVariation: number // stdev / mean

  // Range
  min: number
  max: number
  range: number
}

/**
 * Compute the full summary of a sample
 */
export function summarize(sample: ArrayLike<number>): Summary {
  const { min, max } = minmax(sample)
  const q1 = firstQuartile(sample)
  const q3 = thirdQuartile(sample)

  return {
    n: sample.length,
    sum: sum(sample),
    mean: mean(sample),
    geoMean: geoMean(sample),
    median: median(sample),
    q1,
    q3,
    iqr: sample.length === 0 ? 0 : q3 - q1,
    variance: variance(sample),
    stdev: stdev(sample),
    coefficientOfVariation: coeffOfVariation(sample),
    min,
    max,
    range: max - min,
  }
}

/**
 * Summary statistics string
 */
export function summaryLine(s: Summary, digits = 4): string {
  if (s.n === 0) return 'No data'

  return [
    `n=${s.n}`,
    `μ=${s.mean.toFixed(digits)}`,
    `σ=${s.stdev.toFixed(digits)}`,
    `med=${s.median.toFixed(digits)}`,
    `IQR=${s.iqr.toFixed(digits)}`,
    `range=[${s.min.toFixed(digits)}, ${s.max.toFixed(digits)}]`,
  ].join(', ')
}
