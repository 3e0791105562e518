/**
 * Doc commands - Work with documentation standard files.
 */

import * as path from 'node:path'
import type { Command } from 'commander'

import { NodeFileSystem } from '@projectkit/core'
import { validateStandardFile } from '@projectkit/engine'

import type { CliEnvironment } from '../context.js'
import { colors, done } from '../ui.js'

/**
 * Register the doc command group.
 */
export function registerDocCommands(program: Command, environment: CliEnvironment): void {
  const doc = program.command('doc').description('Work with documentation standards')
  const standard = doc.command('standard').description('Documentation standard files')

  standard
    .command('validate')
    .description('Check that a standard YAML file parses and matches the schema')
    .argument('<path>', 'Path to the standard YAML file')
    .action(async (file: string) => {
      const hostPath = path.resolve(environment.cwd, file)
      const result = await validateStandardFile({
        fs: new NodeFileSystem(path.dirname(hostPath)),
        path: path.basename(hostPath),
      })
      const { id, version } = result.metadata
      done(`${colors.code(file)} is a valid standard (${id} ${version})`)
    })
}
