/**
 * Configuration Loader
 * Loads and validates YAML/JSON report configs
 */

import { readFileSync, existsSync } from 'node:fs'
import { parse as parseYaml } from 'yaml'
import {
  validateConfig,
  DEFAULT_CONFIG,
  SAMPLE_FORMATS,
  OUTPUT_FORMATS,
  type ReportConfig,
} from './types.ts'

function parseContent(content: string, format: 'json' | 'yaml' | 'auto'): unknown {
  if (format === 'json') {
    try {
      return JSON.parse(content)
    } catch (e) {
      throw new Error(`Failed to parse JSON: ${(e as Error).message}`)
    }
  }

  if (format === 'yaml') {
    try {
      return parseYaml(content)
    } catch (e) {
      throw new Error(`Failed to parse YAML: ${(e as Error).message}`)
    }
  }

  // Try JSON first, then YAML
  try {
    return JSON.parse(content)
  } catch {
    try {
      return parseYaml(content)
    } catch (e) {
      throw new Error(`Failed to parse config: ${(e as Error).message}`)
    }
  }
}

/**
 * Pick the recognised fields of a validated config object
 */
function toPartial(c: Record<string, unknown>): Partial<ReportConfig> {
  const out: Partial<ReportConfig> = {}

  if (typeof c.name === 'string') out.name = c.name
  if (typeof c.description === 'string') out.description = c.description
  if (typeof c.statistic === 'string') out.statistic = c.statistic
  if (typeof c.confidence === 'number') out.confidence = c.confidence
  if (typeof c.iterations === 'number') out.iterations = c.iterations
  if (typeof c.seed === 'number') out.seed = c.seed
  if (Array.isArray(c.percentiles)) {
    out.percentiles = c.percentiles.filter((p): p is number => typeof p === 'number')
  }
  if (typeof c.column === 'string' || typeof c.column === 'number') {
    out.column = String(c.column)
  }
  const sampleFormat = SAMPLE_FORMATS.find((f) => f === c.sampleFormat)
  if (sampleFormat) out.sampleFormat = sampleFormat
  const format = OUTPUT_FORMATS.find((f) => f === c.format)
  if (format) out.format = format
  if (typeof c.digits === 'number') out.digits = c.digits

  return out
}

/**
 * Load config from string
 */
export function loadConfigFromString(
  content: string,
  format: 'json' | 'yaml' | 'auto' = 'yaml'
): ReportConfig {
  // An empty YAML document parses to null
  const parsed = parseContent(content, format) ?? {}

  const validation = validateConfig(parsed)
  if (!validation.valid) {
    throw new Error(`Invalid config:\n${validation.errors.join('\n')}`)
  }

  return mergeWithDefaults(toPartial(parsed as Record<string, unknown>))
}

/**
 * Load config from file
 * Supports .yaml, .yml, and .json extensions
 */
export function loadConfig(path: string): ReportConfig {
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`)
  }

  const content = readFileSync(path, 'utf-8')
  const ext = path.toLowerCase().split('.').pop()

  if (ext === 'json') return loadConfigFromString(content, 'json')
  if (ext === 'yaml' || ext === 'yml') return loadConfigFromString(content, 'yaml')
  return loadConfigFromString(content, 'auto')
}

/**
 * Merge config with defaults
 */
export function mergeWithDefaults(config: Partial<ReportConfig>): ReportConfig {
  return {
    name: config.name ?? DEFAULT_CONFIG.name,
    description: config.description ?? DEFAULT_CONFIG.description,
    statistic: config.statistic ?? DEFAULT_CONFIG.statistic,
    confidence: config.confidence ?? DEFAULT_CONFIG.confidence,
    iterations: config.iterations ?? DEFAULT_CONFIG.iterations,
    seed: config.seed ?? DEFAULT_CONFIG.seed,
    percentiles: config.percentiles ?? [...DEFAULT_CONFIG.percentiles],
    column: config.column ?? DEFAULT_CONFIG.column,
    sampleFormat: config.sampleFormat ?? DEFAULT_CONFIG.sampleFormat,
    format: config.format ?? DEFAULT_CONFIG.format,
    digits: config.digits ?? DEFAULT_CONFIG.digits,
  }
}

/**
 * Generate example config YAML
 */
export function generateExampleConfig(): string {
  return `# bootstat report config
name: latency
description: Response time before and after a change

# Statistic to bootstrap: sum, mean, geo-mean, median, q1, q3,
# variance, stdev, cv, range, iqr
statistic: median
confidence: 95
iterations: 2000
seed: 42

percentiles: [5, 25, 50, 75, 95, 99]

# Input: auto | json | csv | lines
sampleFormat: csv
column: latency_ms

# Output: text | json
format: text
digits: 3
`
}
