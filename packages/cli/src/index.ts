/**
 * @projectkit/cli - Command line interface for projectkit.
 *
 * WHY: Provides a thin argument parsing layer that delegates
 * all core logic to the engine package. This keeps the CLI
 * focused on user interaction while engine handles orchestration.
 */

import chalk from 'chalk'
import { Command, CommanderError } from 'commander'

import { registerDocCommands } from './commands/doc.js'
import { registerMcpCommands } from './commands/mcp.js'
import { registerSkillCommands } from './commands/skill.js'
import { registerUpdateCommand } from './commands/update.js'
import type { CliEnvironment } from './context.js'
import { ENV_LOG_FORMAT, ENV_LOG_LEVEL, processEnvironment } from './context.js'
import { formatError } from './helpers.js'
import { LOG_FORMATS } from './logger.js'

export const VERSION = '0.1.0'

/**
 * Create the CLI program.
 */
export function createProgram(environment: CliEnvironment = processEnvironment()): Command {
  const program = new Command()
    .name('projectkit')
    .description('Collect agent instructions, skills, workflows and MCP servers into the project')
    .version(VERSION)
    // Subcommands inherit this, so it must come before they are registered
    .exitOverride()
    .option(
      '--project <dir>',
      'Project root (default: nearest directory with .git or .projectkit.yaml)'
    )
    .option('--log-level <level>', `Log level: debug, info, warn, error (env: ${ENV_LOG_LEVEL})`)
    .option(
      '--log-format <format>',
      `Log format: ${LOG_FORMATS.join(', ')} (env: ${ENV_LOG_FORMAT})`
    )
    .option('-q, --quiet', 'Suppress log output')

  registerUpdateCommand(program, environment)
  registerSkillCommands(program, environment)
  registerMcpCommands(program, environment)
  registerDocCommands(program, environment)

  return program
}

/**
 * Run the CLI and return its exit code.
 */
export async function main(
  argv: string[] = process.argv,
  environment: CliEnvironment = processEnvironment()
): Promise<number> {
  const program = createProgram(environment)

  try {
    await program.parseAsync(argv)
    return 0
  } catch (error) {
    // Commander has already printed its own usage errors and help
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    for (const line of formatError(error)) {
      console.error(chalk.red(line))
    }
    return 1
  }
}
