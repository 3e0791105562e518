/**
 * Repository locations.
 *
 * WHY: Every repository lives under the project's own .projectkit directory,
 * next to the update lock. Paths here are relative to the project root.
 *
 * <project-root>/.projectkit/
 * ├── update.lock
 * └── repository/
 *     ├── ai/
 *     │   ├── instruction/   # one JSON file per category
 *     │   ├── mcp/           # one JSON file per MCP server
 *     │   ├── skill/         # one JSON file per skill, scripts base64-encoded
 *     │   └── workflow/      # <id>.json
 *     └── doc/
 *         └── standard/      # one JSON file per standard
 */

import * as path from 'node:path'
import type { StoredResourceKind } from '@projectkit/core'
import { PROJECTKIT_DIR } from '@projectkit/core'

export const REPOSITORY_DIR = 'repository'

/** Repository directory of each stored kind, relative to the repository root */
export const REPOSITORY_KIND_DIRS: Readonly<Record<StoredResourceKind, string>> = {
  instruction: 'ai/instruction',
  skill: 'ai/skill',
  'mcp-server': 'ai/mcp',
  workflow: 'ai/workflow',
  standard: 'doc/standard',
}

/**
 * Repository root relative to the project root.
 */
export function getRepositoryRoot(): string {
  return path.posix.join(PROJECTKIT_DIR, REPOSITORY_DIR)
}

/**
 * Repository directory of one kind, relative to the project root.
 */
export function getRepositoryPath(kind: StoredResourceKind): string {
  return path.posix.join(getRepositoryRoot(), REPOSITORY_KIND_DIRS[kind])
}

/**
 * Absolute repository locations for one project.
 */
export class RepositoryPaths {
  readonly projectRoot: string

  constructor(projectRoot: string) {
    this.projectRoot = projectRoot
  }

  get root(): string {
    return path.join(this.projectRoot, getRepositoryRoot())
  }

  kind(kind: StoredResourceKind): string {
    return path.join(this.projectRoot, getRepositoryPath(kind))
  }
}
