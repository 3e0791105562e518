/**
 * MCP commands - Inspect the MCP servers stored in the project repository.
 */

import type { Command } from 'commander'

import type { McpServer } from '@projectkit/core'

import type { CliEnvironment } from '../context.js'
import { createCommandContext, openRepositories } from '../context.js'
import { getGlobalOptions } from '../helpers.js'
import { colors, emptyRepository, listEntry } from '../ui.js'

/** Command line a server is launched with, for display */
export function formatLaunchCommand(server: McpServer): string {
  return [server.stdio.executablePath, ...(server.stdio.arguments ?? [])].join(' ')
}

/**
 * Register the mcp command group.
 */
export function registerMcpCommands(program: Command, environment: CliEnvironment): void {
  const mcp = program.command('mcp').description('Inspect stored MCP servers')

  mcp
    .command('list')
    .description('List stored MCP servers')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      const context = await createCommandContext(getGlobalOptions(command), environment)
      const servers = await (await openRepositories(context)).mcpServers.getAll()

      if (options.json) {
        console.log(JSON.stringify(servers, null, 2))
        return
      }

      if (servers.length === 0) {
        emptyRepository('MCP servers')
        return
      }
      for (const server of servers) {
        listEntry(server.name, colors.code(formatLaunchCommand(server)))
        const env = Object.keys(server.stdio.environmentVariables ?? {}).sort()
        if (env.length > 0) {
          console.log(`  ${colors.muted(`env: ${env.join(', ')}`)}`)
        }
      }
    })
}
