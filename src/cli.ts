#!/usr/bin/env tsx
/**
 * bootstat CLI
 * Descriptive statistics and bootstrap confidence intervals for sample files
 */

import { realpathSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { parseArgs } from 'node:util'
import {
  loadConfig,
  mergeWithDefaults,
  validateConfig,
  generateExampleConfig,
  OUTPUT_FORMATS,
  SAMPLE_FORMATS,
  type OutputFormat,
  type ReportConfig,
} from './config/index.ts'
import { loadSample, type SampleFormat } from './data/sample.ts'
import { buildReport, formatReport } from './report/index.ts'
import { log, type Logger } from './log.ts'

const VERSION = '0.1.0'

const HELP = `
bootstat - Descriptive statistics and bootstrap confidence intervals

Usage:
  bootstat [options] <sample>              Describe one sample
  bootstat [options] <sample> <baseline>   Compare two samples

Options:
  -c, --config <file>       Load report config from YAML/JSON file
  -s, --statistic <name>    Statistic to bootstrap (default: mean)
                            sum, mean, geo-mean, median, q1, q3,
                            variance, stdev, cv, range, iqr
  -l, --confidence <pct>    Confidence level in (0, 100) (default: 95)
  -i, --iterations <n>      Bootstrap resamples (default: 1024)
      --seed <n>            Seed for reproducible resampling
  -p, --percentile <p>      Percentile to report, repeatable
      --column <name>       CSV column / JSON key holding the values
      --input <format>      auto | json | csv | lines (default: auto)
  -f, --format <format>     text | json (default: text)
  -d, --digits <n>          Decimal places in text output (default: 4)
  -g, --generate            Print an example config to stdout
  -v, --version             Show version
  -h, --help                Show this help

Examples:
  bootstat latency.csv --column latency_ms
  bootstat after.txt before.txt -s median --seed 42
  bootstat -g > report.yaml

Environment:
  BOOTSTAT_DEBUG=1     Enable debug logging
`

export interface CLIOptions {
  files: string[]
  config?: string
  overrides: Partial<ReportConfig>
  generate: boolean
  version: boolean
  help: boolean
}

function toNumber(flag: string, raw: string): number {
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new Error(`--${flag} expects a number, got ${raw}`)
  }
  return value
}

function parseNumber(flag: string, raw: string | undefined): number | undefined {
  return raw === undefined ? undefined : toNumber(flag, raw)
}

function parseChoice<T extends string>(
  flag: string,
  raw: string | undefined,
  choices: readonly T[]
): T | undefined {
  if (raw === undefined) return undefined
  const choice = choices.find((c) => c === raw)
  if (!choice) {
    throw new Error(`--${flag} must be one of ${choices.join(', ')}, got ${raw}`)
  }
  return choice
}

function parseCliArgs(argv: string[] = process.argv.slice(2)): CLIOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      statistic: { type: 'string', short: 's' },
      confidence: { type: 'string', short: 'l' },
      iterations: { type: 'string', short: 'i' },
      seed: { type: 'string' },
      percentile: { type: 'string', short: 'p', multiple: true },
      column: { type: 'string' },
      input: { type: 'string' },
      format: { type: 'string', short: 'f' },
      digits: { type: 'string', short: 'd' },
      generate: { type: 'boolean', short: 'g', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  })

  const overrides: Partial<ReportConfig> = {}
  const confidence = parseNumber('confidence', values.confidence)
  const iterations = parseNumber('iterations', values.iterations)
  const seed = parseNumber('seed', values.seed)
  const digits = parseNumber('digits', values.digits)
  const sampleFormat = parseChoice<SampleFormat>('input', values.input, SAMPLE_FORMATS)
  const format = parseChoice<OutputFormat>('format', values.format, OUTPUT_FORMATS)

  if (values.statistic !== undefined) overrides.statistic = values.statistic
  if (confidence !== undefined) overrides.confidence = confidence
  if (iterations !== undefined) overrides.iterations = iterations
  if (seed !== undefined) overrides.seed = seed
  if (digits !== undefined) overrides.digits = digits
  if (values.percentile !== undefined) {
    overrides.percentiles = values.percentile.map((p) => toNumber('percentile', p))
  }
  if (values.column !== undefined) overrides.column = values.column
  if (sampleFormat !== undefined) overrides.sampleFormat = sampleFormat
  if (format !== undefined) overrides.format = format

  return {
    files: positionals,
    config: values.config,
    overrides,
    generate: values.generate ?? false,
    version: values.version ?? false,
    help: values.help ?? false,
  }
}

/**
 * Config file (if any), then flags on top, then validation
 */
function resolveConfig(options: CLIOptions): ReportConfig {
  const base = options.config ? loadConfig(options.config) : mergeWithDefaults({})
  const config: ReportConfig = { ...base, ...options.overrides }

  const validation = validateConfig(config)
  if (!validation.valid) {
    throw new Error(`Invalid options:\n${validation.errors.join('\n')}`)
  }
  return config
}

export interface CLIOutput {
  stdout: (text: string) => void
  logger: Logger
}

/**
 * Run the CLI and return the process exit code
 */
function main(
  argv: string[] = process.argv.slice(2),
  output: CLIOutput = { stdout: (text) => console.log(text), logger: log }
): number {
  const { stdout, logger } = output

  try {
    const options = parseCliArgs(argv)

    // Handle simple flags first
    if (options.help) {
      stdout(HELP)
      return 0
    }

    if (options.version) {
      stdout(`bootstat v${VERSION}`)
      return 0
    }

    if (options.generate) {
      stdout(generateExampleConfig())
      return 0
    }

    if (options.files.length < 1 || options.files.length > 2) {
      throw new Error(`Expected one or two sample files, got ${options.files.length}`)
    }

    const config = resolveConfig(options)
    if (options.config) logger.debug(`loaded config: ${config.name}`)

    const samples = options.files.map((file) => {
      const values = loadSample(file, { format: config.sampleFormat, column: config.column })
      logger.debug(`read ${values.length} values from ${file}`)
      return { label: file, values }
    })

    const report = buildReport(samples, config, logger)
    stdout(formatReport(report, config.format, config.digits))
    return 0
  } catch (e) {
    logger.error((e as Error).message)
    return 1
  }
}

// Export for testing
export { parseCliArgs, resolveConfig, main }

function invokedDirectly(): boolean {
  const entry = process.argv[1]
  if (!entry) return false
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url)
  } catch {
    return false
  }
}

// Run if called directly
if (invokedDirectly()) {
  process.exitCode = main()
}
