/**
 * Rulebook types.
 *
 * A rulebook is a directory with a rulebook.yaml that points, through
 * `rulebook://` URIs, at sub-directories holding resources of each kind.
 */

import type { Instructions } from './instruction.js'
import type { McpServer } from './mcp.js'
import type { SourceConfig } from './resource.js'
import type { Skill } from './skill.js'
import type { Standard } from './standard.js'
import type { Workflow } from './workflow.js'

/** Sources per AI resource kind */
export interface AiSourcesConfig {
  instruction?: SourceConfig
  skill?: SourceConfig
  workflow?: SourceConfig
  mcp?: SourceConfig
}

/** Sources per documentation resource kind */
export interface DocSourcesConfig {
  standard?: SourceConfig
}

/** Parsed rulebook.yaml */
export interface RulebookMetadata {
  ai?: AiSourcesConfig
  doc?: DocSourcesConfig
}

export interface Rulebook {
  ai: {
    instructions: Instructions[]
    skills: Skill[]
    workflows: Workflow[]
    mcpServers: McpServer[]
  }
  doc: {
    standards: Standard[]
  }
}
