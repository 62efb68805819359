/**
 * bootstat library entry
 */

export * from './stats/index.ts'

export { parseSample, loadSample, SampleParseError } from './data/sample.ts'
export type { SampleFormat, SampleOptions } from './data/sample.ts'

export * from './config/index.ts'
export * from './report/index.ts'

export { createLogger } from './log.ts'
export type { Logger, LoggerOptions } from './log.ts'
