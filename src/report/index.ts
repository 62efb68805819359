/**
 * Report module exports
 */

export { buildReport, formatReport } from './report.ts'
export type { LabelledSample, SampleReport, IntervalReport, Report } from './report.ts'
