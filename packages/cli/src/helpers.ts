/**
 * Shared CLI helper utilities.
 *
 * WHY: Every command reads the same global options and reports failures the
 * same way, so both live here rather than in each command.
 */

import type { Command, OptionValues } from 'commander'

/**
 * Global options, accepted before any command.
 */
export interface GlobalOptions {
  project?: string | undefined
  logLevel?: string | undefined
  logFormat?: string | undefined
  quiet?: boolean | undefined
}

function stringOption(values: OptionValues, key: string): string | undefined {
  const value: unknown = values[key]
  return typeof value === 'string' ? value : undefined
}

/**
 * Read the global options as seen from any command.
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  const values = command.optsWithGlobals()
  const quiet: unknown = values['quiet']
  return {
    project: stringOption(values, 'project'),
    logLevel: stringOption(values, 'logLevel'),
    logFormat: stringOption(values, 'logFormat'),
    quiet: quiet === true,
  }
}

/**
 * Format an error for display: its message, then each cause that adds
 * something its wrapper's message does not already say.
 */
export function formatError(error: unknown): string[] {
  if (!(error instanceof Error)) {
    return [`Error: ${String(error)}`]
  }

  const lines = [`Error: ${error.message}`]
  let shown = error.message
  let cause: unknown = error.cause
  const seen = new Set<unknown>([error])
  while (cause !== undefined && !seen.has(cause)) {
    seen.add(cause)
    const message = cause instanceof Error ? cause.message : String(cause)
    if (!shown.includes(message)) {
      lines.push(`  Cause: ${message}`)
      shown = message
    }
    cause = cause instanceof Error ? cause.cause : undefined
  }
  return lines
}
