/**
 * Report assembly and formatting
 */

import {
  confidenceInterval,
  getStatistic,
  percentiles,
  summarize,
  summaryLine,
  InvalidArgumentError,
  type ConfidenceInterval,
  type Summary,
} from '../stats/index.ts'
import type { OutputFormat, ReportConfig } from '../config/types.ts'
import { log, type Logger } from '../log.ts'

export interface LabelledSample {
  label: string
  values: number[]
}

export interface SampleReport {
  label: string
  summary: Summary
  percentiles: { p: number; value: number }[]
}

export interface IntervalReport extends ConfidenceInterval {
  kind: 'single' | 'difference'
  statistic: string
  estimate: number // Statistic of the original sample(s)
  confidence: number
  iterations: number
  seed?: number
}

export interface Report {
  name: string
  samples: SampleReport[]
  interval: IntervalReport
}

function describeSample(sample: LabelledSample, ps: readonly number[]): SampleReport {
  const values = percentiles(sample.values, ps)
  return {
    label: sample.label,
    summary: summarize(sample.values),
    percentiles: ps.map((p, i) => ({ p, value: values[i]! })),
  }
}

/**
 * Describe one sample, or compare two.
 * With two samples the interval is for statistic(first) - statistic(second).
 */
export function buildReport(
  samples: readonly LabelledSample[],
  config: ReportConfig,
  logger: Logger = log
): Report {
  const [first, second] = samples
  if (!first || samples.length > 2) {
    throw new InvalidArgumentError(`Expected one or two samples, got ${samples.length}`)
  }

  const statistic = getStatistic(config.statistic)
  const options = { iterations: config.iterations, seed: config.seed }

  logger.debug(
    `bootstrapping ${config.statistic} over ${config.iterations} resamples` +
      (config.seed === undefined ? '' : ` (seed ${config.seed})`)
  )

  const common = {
    statistic: config.statistic,
    confidence: config.confidence,
    iterations: config.iterations,
    seed: config.seed,
  }

  let interval: IntervalReport
  if (second) {
    const ci = confidenceInterval(first.values, second.values, statistic, config.confidence, options)
    interval = {
      ...common,
      ...ci,
      kind: 'difference',
      estimate: statistic(first.values) - statistic(second.values),
    }
  } else {
    const ci = confidenceInterval(first.values, statistic, config.confidence, options)
    interval = {
      ...common,
      ...ci,
      kind: 'single',
      estimate: statistic(first.values),
    }
  }

  return {
    name: config.name,
    samples: samples.map((s) => describeSample(s, config.percentiles)),
    interval,
  }
}

function formatInterval(report: Report, digits: number): string {
  const i = report.interval
  const subject =
    i.kind === 'difference'
      ? report.samples.map((s) => `${i.statistic}(${s.label})`).join(' - ')
      : i.statistic
  const details = [`${i.iterations} resamples`]
  if (i.seed !== undefined) details.push(`seed ${i.seed}`)

  return (
    `${subject}: ${i.estimate.toFixed(digits)} ` +
    `(${i.confidence}% CI ${i.low.toFixed(digits)} to ${i.high.toFixed(digits)}, ${details.join(', ')})`
  )
}

/**
 * Render a report as plain text or JSON
 */
export function formatReport(report: Report, format: OutputFormat, digits = 4): string {
  if (format === 'json') {
    return JSON.stringify(report, null, 2)
  }

  const lines = [`# ${report.name}`]
  for (const s of report.samples) {
    lines.push(`${s.label}: ${summaryLine(s.summary, digits)}`)
    if (s.percentiles.length > 0) {
      const ps = s.percentiles.map(({ p, value }) => `p${p}=${value.toFixed(digits)}`)
      lines.push(`  percentiles: ${ps.join(', ')}`)
    }
  }
  lines.push(formatInterval(report, digits))

  return lines.join('\n')
}
