/**
 * Statistic registry
 * Names accepted by the CLI and report configs for bootstrapping
 */

import {
  coeffOfVariation,
  firstQuartile,
  geoMean,
  iqr,
  mean,
  median,
  range,
  stdev,
  sum,
  thirdQuartile,
  variance,
} from './aggregate.ts'
import type { Statistic } from './bootstrap.ts'
import { InvalidArgumentError } from './errors.ts'

export const STATISTICS = {
  sum,
  mean,
  'geo-mean': geoMean,
  median,
  q1: firstQuartile,
  q3: thirdQuartile,
  variance,
  stdev,
  cv: coeffOfVariation,
  range,
  iqr,
} as const satisfies Record<string, Statistic>

export type StatisticName = keyof typeof STATISTICS

export const STATISTIC_NAMES: readonly string[] = Object.keys(STATISTICS)

export function isStatisticName(name: string): name is StatisticName {
  return Object.hasOwn(STATISTICS, name)
}

/**
 * Look up a statistic by name
 * @throws InvalidArgumentError for unknown names
 */
export function getStatistic(name: string): Statistic {
  if (!isStatisticName(name)) {
    throw new InvalidArgumentError(
      `Unknown statistic: ${name} (expected one of ${STATISTIC_NAMES.join(', ')})`
    )
  }
  return STATISTICS[name]
}
