/**
 * Update command - Rebuild the project repositories from configured sources.
 *
 * WHY: Holds the project lock for the whole run so two updates of the same
 * project never interleave their remove-all and add phases.
 */

import type { Command } from 'commander'

import { withProjectLock } from '@projectkit/core'
import { runUpdate } from '@projectkit/engine'
import { RepositoryPaths } from '@projectkit/store'

import type { CliEnvironment } from '../context.js'
import {
  createCommandContext,
  createSourceResolver,
  loadConfig,
  openRepositories,
} from '../context.js'
import { getGlobalOptions } from '../helpers.js'
import { displayPath, done, plural, table } from '../ui.js'

/**
 * Register the update command.
 */
export function registerUpdateCommand(program: Command, environment: CliEnvironment): void {
  program
    .command('update')
    .description('Load every configured source and rewrite the project repositories')
    .action(async (_options: unknown, command: Command) => {
      const context = await createCommandContext(getGlobalOptions(command), environment)

      const result = await withProjectLock(context.projectRoot, async () => {
        const config = await loadConfig(context)
        context.logger.debug('Config loaded.', { files: config.paths.join(',') })
        return runUpdate({
          config,
          resolver: createSourceResolver(context),
          repositories: await openRepositories(context),
          logger: context.logger,
        })
      })

      done('Repositories updated')
      table([
        ['Standards', plural(result.standards, 'standard')],
        ['Instructions', plural(result.instructions, 'instruction set')],
        ['Skills', plural(result.skills, 'skill')],
        ['Workflows', plural(result.workflows, 'workflow')],
        ['MCP servers', plural(result.mcpServers, 'server')],
        [
          'Repository',
          displayPath(new RepositoryPaths(context.projectRoot).root, environment.homeDir),
        ],
      ])
    })
}
