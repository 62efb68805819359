/**
 * Diagnostics on stderr, so stdout stays clean for reports.
 * Debug lines only appear with BOOTSTAT_DEBUG=1.
 */

export interface Logger {
  info(message: string): void
  error(message: string): void
  debug(message: string): void
}

export interface LoggerOptions {
  debug?: boolean
  write?: (line: string) => void
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line))
  const debug = options.debug ?? process.env.BOOTSTAT_DEBUG === '1'

  return {
    info: (message) => write(message),
    error: (message) => write(`Error: ${message}`),
    debug: (message) => {
      if (debug) write(`[debug] ${message}`)
    },
  }
}

export const log = createLogger()
