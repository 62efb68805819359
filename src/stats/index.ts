/**
 * Statistics module exports
 */

export {
  sum,
  mean,
  geoMean,
  median,
  firstQuartile,
  thirdQuartile,
  variance,
  stdev,
  coeffOfVariation,
  minmax,
  range,
  iqr,
  sortedCopy,
} from './aggregate.ts'

export { percentile, percentiles, percentileSorted } from './quantile.ts'

export { filter } from './filter.ts'

export {
  resample,
  resampleWith,
  confidenceInterval,
  DEFAULT_ITERATIONS,
} from './bootstrap.ts'
export type { Statistic, ConfidenceInterval, BootstrapOptions } from './bootstrap.ts'

export { createRandom, randomIndex } from './random.ts'
export type { Random } from './random.ts'

export { summarize, summaryLine } from './summary.ts'
export type { Summary } from './summary.ts'

export { STATISTICS, STATISTIC_NAMES, isStatisticName, getStatistic } from './registry.ts'
export type { StatisticName } from './registry.ts'

export { OutOfRangeError, InvalidArgumentError } from './errors.ts'
