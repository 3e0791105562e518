/**
 * Project root discovery
 */

import type { Stats } from 'node:fs'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import { ProjectRootNotFoundError, hasErrorCode } from '../errors.js'
import { PROJECT_CONFIG_FILENAME } from './project-config.js'

async function statOrUndefined(p: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(p)
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT') || hasErrorCode(err, 'ENOTDIR')) {
      return undefined
    }
    throw err
  }
}

/**
 * Find the nearest directory at or above `startDir` that holds a `.git`
 * directory or a .projectkit.yaml.
 *
 * The walk stops at `homeDir` (which is never a project root) and at the
 * filesystem root.
 *
 * @throws ProjectRootNotFoundError if no such directory exists
 */
export async function findProjectRoot(startDir: string, homeDir: string): Promise<string> {
  const home = path.resolve(homeDir)
  let current = path.resolve(startDir)

  for (;;) {
    if (current === home) {
      throw new ProjectRootNotFoundError(startDir)
    }

    const gitDir = await statOrUndefined(path.join(current, '.git'))
    if (gitDir?.isDirectory()) {
      return current
    }

    if (await statOrUndefined(path.join(current, PROJECT_CONFIG_FILENAME))) {
      return current
    }

    const parent = path.dirname(current)
    if (parent === current) {
      throw new ProjectRootNotFoundError(startDir)
    }
    current = parent
  }
}
