/**
 * Resource kinds handled by projectkit.
 */

export type ResourceKind = 'instruction' | 'skill' | 'mcp-server' | 'workflow' | 'standard' | 'rulebook'

/** Kinds that are loaded from sources and stored in repositories */
export type StoredResourceKind = Exclude<ResourceKind, 'rulebook'>

/** Reference to one configured source */
export interface SourceRef {
  /** Source URI, `scheme://opaque-part` */
  uri: string
}

/** Ordered list of sources for one resource kind */
export interface SourceConfig {
  sources: SourceRef[]
}
