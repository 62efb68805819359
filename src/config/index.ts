/**
 * Configuration module exports
 */

export {
  validateConfig,
  DEFAULT_CONFIG,
  SAMPLE_FORMATS,
  OUTPUT_FORMATS,
} from './types.ts'
export type { ReportConfig, OutputFormat } from './types.ts'

export {
  loadConfig,
  loadConfigFromString,
  mergeWithDefaults,
  generateExampleConfig,
} from './loader.ts'
