import { Writable } from 'node:stream'
import figures from 'figures'
import { describe, expect, test } from 'vitest'

import { createLogger, LogConfigError, parseLogFormat, parseLogLevel } from './logger.js'

function collect(): { lines: string[]; stream: Writable } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(...chunk.toString('utf-8').split('\n').filter((line) => line !== ''))
      callback()
    },
  })
  return { lines, stream }
}

// winston hands lines to its transports asynchronously
function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

describe('parseLogLevel', () => {
  test('accepts known levels', () => {
    expect(parseLogLevel('debug')).toBe('debug')
    expect(parseLogLevel('error')).toBe('error')
  })

  test('rejects an empty level', () => {
    expect(() => parseLogLevel('')).toThrow(new LogConfigError('log level must not be empty'))
  })

  test('rejects an unknown level', () => {
    expect(() => parseLogLevel('verbose')).toThrow(
      'unknown log level "verbose" (expected one of: debug, info, warn, error)'
    )
  })
})

describe('parseLogFormat', () => {
  test('accepts known formats', () => {
    expect(parseLogFormat('json')).toBe('json')
    expect(parseLogFormat('text-no-color')).toBe('text-no-color')
  })

  test('rejects empty and unknown formats', () => {
    expect(() => parseLogFormat('')).toThrow(LogConfigError)
    expect(() => parseLogFormat('xml')).toThrow(
      'unknown log format "xml" (expected one of: text-color, text-no-color, json)'
    )
  })
})

describe('createLogger', () => {
  test('writes text lines with fields', async () => {
    const { lines, stream } = collect()
    const logger = createLogger(
      { level: 'info', format: 'text-no-color', quiet: false },
      { stream }
    )

    logger.info('Skills added to repository.', { count: 2 })
    logger.warn('Slow source.', { uri: 'local://a b', cached: false })
    await flush()

    expect(lines).toEqual([
      `${figures.info} Skills added to repository. count=2`,
      `${figures.warning} Slow source. uri="local://a b" cached=false`,
    ])
  })

  test('drops lines below the configured level', async () => {
    const { lines, stream } = collect()
    const logger = createLogger(
      { level: 'warn', format: 'text-no-color', quiet: false },
      { stream }
    )

    logger.debug('a')
    logger.info('b')
    logger.error('c')
    await flush()

    expect(lines).toEqual([`${figures.cross} c`])
  })

  test('writes JSON lines', async () => {
    const { lines, stream } = collect()
    const logger = createLogger(
      { level: 'debug', format: 'json', quiet: false },
      { stream, now: () => new Date('2026-01-02T03:04:05.000Z') }
    )

    logger.debug('Source loaded.', { uri: 'local://rules', count: 3 })
    await flush()

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      {
        time: '2026-01-02T03:04:05.000Z',
        level: 'debug',
        msg: 'Source loaded.',
        uri: 'local://rules',
        count: 3,
      },
    ])
  })

  test('quiet drops everything', async () => {
    const { lines, stream } = collect()
    const logger = createLogger({ level: 'debug', format: 'json', quiet: true }, { stream })

    logger.error('boom')
    await flush()

    expect(lines).toEqual([])
  })

  test('writes lines without fields', async () => {
    const { lines, stream } = collect()
    const logger = createLogger(
      { level: 'debug', format: 'text-no-color', quiet: false },
      { stream }
    )

    logger.debug('Project root resolved.')
    await flush()

    expect(lines).toEqual([`${figures.bullet} Project root resolved.`])
  })
})
