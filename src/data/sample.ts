/**
 * Sample Loading
 * Reads numeric samples from JSON, CSV or line-oriented text
 */

import { readFileSync, existsSync } from 'node:fs'
import { extname } from 'node:path'

export type SampleFormat = 'json' | 'csv' | 'lines' | 'auto'

export interface SampleOptions {
  format?: SampleFormat
  column?: string // CSV header name / JSON object key, or a zero-based index
  path?: string // Used by 'auto' to pick a format from the extension
}

/**
 * Malformed sample content
 */
export class SampleParseError extends Error {
  override readonly name = 'SampleParseError'

  constructor(
    message: string,
    readonly line?: number
  ) {
    super(line === undefined ? message : `line ${line}: ${message}`)
  }
}

function toNumber(raw: unknown, line?: number): number {
  if (typeof raw === 'number' && Number.isFinite(raw)) return raw
  if (typeof raw === 'string') {
    const trimmed = raw.trim()
    const value = Number(trimmed)
    if (trimmed !== '' && Number.isFinite(value)) return value
  }
  throw new SampleParseError(`not a number: ${JSON.stringify(raw)}`, line)
}

/**
 * One number per line; blank lines and # comments are skipped
 */
function parseLines(text: string): number[] {
  const values: number[] = []
  const lines = text.split(/\r?\n/)

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!.trim()
    if (line === '' || line.startsWith('#')) continue
    values.push(toNumber(line, i + 1))
  }

  return values
}

interface CsvRecord {
  cells: string[]
  line: number // Line the record starts on
  blank: boolean
}

/**
 * Split CSV text into records. Handles double-quoted fields with "" escapes;
 * a quoted field may span line breaks.
 */
function readCsvRecords(text: string): CsvRecord[] {
  const records: CsvRecord[] = []
  let cells: string[] = []
  let cell = ''
  let raw = ''
  let quoted = false
  let line = 1
  let start = 1

  const endRecord = () => {
    cells.push(cell)
    records.push({ cells, line: start, blank: raw.trim() === '' })
    cells = []
    cell = ''
    raw = ''
  }

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i)

    if (quoted) {
      raw += ch
      if (ch === '"' && text.charAt(i + 1) === '"') {
        cell += '"'
        raw += '"'
        i++
      } else if (ch === '"') {
        quoted = false
      } else {
        if (ch === '\n') line++
        cell += ch
      }
      continue
    }

    if (ch === '\r' && text.charAt(i + 1) === '\n') continue
    if (ch === '\n') {
      endRecord()
      line++
      start = line
      continue
    }

    raw += ch
    if (ch === '"') {
      quoted = true
    } else if (ch === ',') {
      cells.push(cell)
      cell = ''
    } else {
      cell += ch
    }
  }

  if (quoted) {
    throw new SampleParseError('unterminated quoted field', start)
  }
  endRecord()
  return records
}

function resolveColumn(header: string[], column: string | undefined): number {
  if (column === undefined) return 0

  const byName = header.findIndex((h) => h.trim() === column)
  if (byName >= 0) return byName

  const index = Number(column)
  if (Number.isInteger(index) && index >= 0 && index < header.length) return index

  throw new SampleParseError(`unknown column: ${column}`, 1)
}

/**
 * CSV with a header row; one column is extracted
 */
function parseCsv(text: string, column?: string): number[] {
  const records = readCsvRecords(text)
  const header = records[0]
  if (header === undefined || header.blank) return []

  const col = resolveColumn(header.cells, column)
  const values: number[] = []

  for (const record of records.slice(1)) {
    if (record.blank) continue
    const cell = record.cells[col]
    if (cell === undefined) {
      throw new SampleParseError(`missing column ${col}`, record.line)
    }
    values.push(toNumber(cell, record.line))
  }

  return values
}

/**
 * JSON array of numbers, or of objects holding `column`
 */
function parseJson(text: string, column?: string): number[] {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (e) {
    throw new SampleParseError(`Failed to parse JSON: ${(e as Error).message}`)
  }

  if (!Array.isArray(parsed)) {
    throw new SampleParseError('JSON sample must be an array')
  }

  return parsed.map((item: unknown, i) => {
    if (item !== null && typeof item === 'object') {
      if (column === undefined) {
        throw new SampleParseError(`element ${i} is an object; a column is required`)
      }
      return toNumber((item as Record<string, unknown>)[column])
    }
    return toNumber(item)
  })
}

function detectFormat(text: string, path?: string): Exclude<SampleFormat, 'auto'> {
  const ext = path ? extname(path).toLowerCase() : ''
  if (ext === '.json') return 'json'
  if (ext === '.csv') return 'csv'
  if (ext === '.txt') return 'lines'
  return text.trimStart().startsWith('[') ? 'json' : 'lines'
}

/**
 * Parse a sample from text
 */
export function parseSample(text: string, options: SampleOptions = {}): number[] {
  const format =
    !options.format || options.format === 'auto'
      ? detectFormat(text, options.path)
      : options.format

  switch (format) {
    case 'json':
      return parseJson(text, options.column)
    case 'csv':
      return parseCsv(text, options.column)
    case 'lines':
    default:
      return parseLines(text)
  }
}

/**
 * Load a sample from file
 */
export function loadSample(path: string, options: SampleOptions = {}): number[] {
  if (!existsSync(path)) {
    throw new Error(`Sample file not found: ${path}`)
  }

  const content = readFileSync(path, 'utf-8')
  return parseSample(content, { ...options, path })
}
