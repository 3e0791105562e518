/**
 * Logger contract
 *
 * Library code takes a Logger by injection and never writes to the console
 * itself. Only the CLI decides where log lines go and how they look.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** Structured fields attached to one log line */
export type LogFields = Record<string, string | number | boolean>

export interface Logger {
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
}

/** Log levels from most to least verbose */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/** Logger that drops everything */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
