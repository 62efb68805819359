/**
 * Configuration Types
 * Report definitions for bootstat runs
 */

import type { SampleFormat } from '../data/sample.ts'
import { STATISTIC_NAMES } from '../stats/registry.ts'

export type OutputFormat = 'text' | 'json'

export const SAMPLE_FORMATS: readonly SampleFormat[] = ['auto', 'json', 'csv', 'lines']
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json']

/**
 * Full report configuration
 */
export interface ReportConfig {
  name: string
  description?: string

  // Bootstrap
  statistic: string // Registry name, e.g. 'mean', 'median', 'iqr'
  confidence: number // Percentage in (0, 100)
  iterations: number
  seed?: number

  // Descriptive output
  percentiles: number[] // Ranks in [0, 100]

  // Input
  column?: string // CSV column / JSON key
  sampleFormat: SampleFormat

  // Output
  format: OutputFormat
  digits: number // Decimal places in text output
}

/**
 * Validate report configuration
 * @param statistics - Names accepted for `statistic`
 */
export function validateConfig(
  config: unknown,
  statistics: readonly string[] = STATISTIC_NAMES
): {
  valid: boolean
  errors: string[]
} {
  const errors: string[] = []

  if (!config || typeof config !== 'object' || Array.isArray(config)) {
    return { valid: false, errors: ['Config must be an object'] }
  }

  const c = config as Record<string, unknown>

  if (c.name !== undefined && typeof c.name !== 'string') {
    errors.push('name must be a string')
  }

  if (c.statistic !== undefined) {
    if (typeof c.statistic !== 'string') {
      errors.push('statistic must be a string')
    } else if (!statistics.includes(c.statistic)) {
      errors.push(`Unknown statistic: ${c.statistic} (expected one of ${statistics.join(', ')})`)
    }
  }

  if (c.confidence !== undefined) {
    if (typeof c.confidence !== 'number' || !(c.confidence > 0 && c.confidence < 100)) {
      errors.push('confidence must be a number in (0, 100)')
    }
  }

  if (c.iterations !== undefined) {
    if (typeof c.iterations !== 'number' || !Number.isInteger(c.iterations) || c.iterations < 1) {
      errors.push('iterations must be a positive integer')
    }
  }

  if (c.seed !== undefined && (typeof c.seed !== 'number' || !Number.isFinite(c.seed))) {
    errors.push('seed must be a number')
  }

  if (c.percentiles !== undefined) {
    if (!Array.isArray(c.percentiles)) {
      errors.push('percentiles must be an array')
    } else {
      c.percentiles.forEach((p: unknown, i) => {
        if (typeof p !== 'number' || !(p >= 0 && p <= 100)) {
          errors.push(`percentiles[${i}] must be a number in [0, 100]`)
        }
      })
    }
  }

  if (c.column !== undefined && typeof c.column !== 'string' && typeof c.column !== 'number') {
    errors.push('column must be a string or an index')
  }

  if (c.sampleFormat !== undefined) {
    if (typeof c.sampleFormat !== 'string' || !SAMPLE_FORMATS.some((f) => f === c.sampleFormat)) {
      errors.push(`sampleFormat must be one of ${SAMPLE_FORMATS.join(', ')}`)
    }
  }

  if (c.format !== undefined) {
    if (typeof c.format !== 'string' || !OUTPUT_FORMATS.some((f) => f === c.format)) {
      errors.push(`format must be one of ${OUTPUT_FORMATS.join(', ')}`)
    }
  }

  if (c.digits !== undefined) {
    if (typeof c.digits !== 'number' || !Number.isInteger(c.digits) || c.digits < 0 || c.digits > 20) {
      errors.push('digits must be an integer in [0, 20]')
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  }
}

/**
 * Default report configuration
 */
export const DEFAULT_CONFIG: ReportConfig = {
  name: 'report',
  statistic: 'mean',
  confidence: 95,
  iterations: 1024,
  percentiles: [5, 25, 50, 75, 95],
  sampleFormat: 'auto',
  format: 'text',
  digits: 4,
}
