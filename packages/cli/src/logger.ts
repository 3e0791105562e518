/**
 * CLI logger
 *
 * WHY: Library packages only log through the core Logger contract. The CLI
 * is the one place that decides level, format and destination (stderr, so
 * stdout stays clean for --json output).
 */

import type { LogFields, Logger, LogLevel } from '@projectkit/core'
import { isLogLevel, LOG_LEVELS, ProjectKitError } from '@projectkit/core'
import type { ChalkInstance } from 'chalk'
import { Chalk } from 'chalk'
import figures from 'figures'
import { createLogger as createWinstonLogger, format, transports } from 'winston'

export type LogFormat = 'text-color' | 'text-no-color' | 'json'

export const LOG_FORMATS: readonly LogFormat[] = ['text-color', 'text-no-color', 'json']

export const DEFAULT_LOG_LEVEL: LogLevel = 'info'
export const DEFAULT_LOG_FORMAT: LogFormat = 'text-color'

export interface LoggerConfig {
  level: LogLevel
  format: LogFormat
  /** Drop every log line */
  quiet: boolean
}

/**
 * Error thrown for an unusable log level or format.
 */
export class LogConfigError extends ProjectKitError {
  constructor(message: string) {
    super(message, 'LOG_CONFIG_ERROR')
    this.name = 'LogConfigError'
  }
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value)
}

/**
 * @throws LogConfigError for an empty or unknown level
 */
export function parseLogLevel(value: string): LogLevel {
  if (value === '') {
    throw new LogConfigError('log level must not be empty')
  }
  if (!isLogLevel(value)) {
    throw new LogConfigError(
      `unknown log level "${value}" (expected one of: ${LOG_LEVELS.join(', ')})`
    )
  }
  return value
}

/**
 * @throws LogConfigError for an empty or unknown format
 */
export function parseLogFormat(value: string): LogFormat {
  if (value === '') {
    throw new LogConfigError('log format must not be empty')
  }
  if (!isLogFormat(value)) {
    throw new LogConfigError(
      `unknown log format "${value}" (expected one of: ${LOG_FORMATS.join(', ')})`
    )
  }
  return value
}

// ============================================================================
// Line formats
// ============================================================================

// winston's own order, most severe first
const WINSTON_LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 }

function formatFieldValue(value: string | number | boolean): string {
  if (typeof value !== 'string') return String(value)
  return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value)
}

function levelSymbol(level: LogLevel, c: ChalkInstance): string {
  switch (level) {
    case 'debug':
      return c.gray(figures.bullet)
    case 'info':
      return c.blue(figures.info)
    case 'warn':
      return c.yellow(figures.warning)
    case 'error':
      return c.red(figures.cross)
  }
}

/** Keep the scalar fields winston collected under `metadata` */
function toLogFields(metadata: unknown): LogFields {
  const fields: LogFields = {}
  if (typeof metadata !== 'object' || metadata === null) return fields
  for (const [key, value] of Object.entries(metadata)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      fields[key] = value
    }
  }
  return fields
}

function toLogLevel(level: string): LogLevel {
  return isLogLevel(level) ? level : 'info'
}

/**
 * Format one line of text output: symbol, message, then `key=value` fields.
 */
export function formatTextLine(
  level: LogLevel,
  message: string,
  fields: LogFields,
  c: ChalkInstance
): string {
  const parts = [levelSymbol(level, c), level === 'error' ? c.red(message) : message]
  for (const [key, value] of Object.entries(fields)) {
    parts.push(c.gray(`${key}=${formatFieldValue(value)}`))
  }
  return parts.join(' ')
}

function lineFormat(logFormat: LogFormat, now: () => Date) {
  if (logFormat === 'json') {
    return format.combine(
      format.timestamp({ format: () => now().toISOString() }),
      format.metadata({ fillExcept: ['level', 'message', 'timestamp'] }),
      format.printf((info) =>
        JSON.stringify({
          time: info['timestamp'],
          level: info.level,
          msg: String(info.message),
          ...toLogFields(info['metadata']),
        })
      )
    )
  }

  // Level 0 disables colors whatever the terminal supports
  const c = logFormat === 'text-color' ? new Chalk() : new Chalk({ level: 0 })
  return format.combine(
    format.metadata({ fillExcept: ['level', 'message'] }),
    format.printf((info) =>
      formatTextLine(toLogLevel(info.level), String(info.message), toLogFields(info['metadata']), c)
    )
  )
}

// ============================================================================
// Logger
// ============================================================================

export interface CreateLoggerOptions {
  /** Write lines here instead of stderr */
  stream?: NodeJS.WritableStream
  /** Clock for JSON timestamps */
  now?: () => Date
}

/**
 * Create a winston-backed logger behind the core Logger contract.
 */
export function createLogger(config: LoggerConfig, options: CreateLoggerOptions = {}): Logger {
  const transport =
    options.stream !== undefined
      ? new transports.Stream({ stream: options.stream, eol: '\n' })
      : new transports.Console({ stderrLevels: [...LOG_LEVELS] })

  const winston = createWinstonLogger({
    levels: WINSTON_LEVELS,
    level: config.level,
    silent: config.quiet,
    format: lineFormat(config.format, options.now ?? (() => new Date())),
    transports: [transport],
  })

  const log = (level: LogLevel, message: string, fields: LogFields = {}): void => {
    winston.log(level, message, { ...fields })
  }

  return {
    debug: (message, fields) => log('debug', message, fields),
    info: (message, fields) => log('info', message, fields),
    warn: (message, fields) => log('warn', message, fields),
    error: (message, fields) => log('error', message, fields),
  }
}
