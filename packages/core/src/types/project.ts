/**
 * Project configuration (.projectkit.yaml) types.
 */

import type { SourceConfig } from './resource.js'
import type { AiSourcesConfig, DocSourcesConfig } from './rulebook.js'

/** Agent entry; parsed and validated, rendering is left to agent integrations */
export interface AgentConfig {
  kind: string
  options?: unknown
}

/** One .projectkit.yaml document */
export interface ProjectConfig {
  agents?: AgentConfig[]
  rulebook?: SourceConfig
  ai?: AiSourcesConfig
  doc?: DocSourcesConfig
}

/** Result of merging every discovered config file */
export interface ResolvedProjectConfig {
  /** Files that were merged, in discovery order */
  paths: string[]
  agents: AgentConfig[]
  rulebook: SourceConfig
  ai: Required<AiSourcesConfig>
  doc: Required<DocSourcesConfig>
}
