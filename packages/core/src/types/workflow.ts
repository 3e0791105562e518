/**
 * Workflow types.
 */

export interface WorkflowMetadata {
  /** Alphanumeric with dashes; used as the stored file name */
  id: string
  name: string
  description: string
  /** Semantic version */
  version: string
}

export interface WorkflowStep {
  id: string
  name: string
  description: string
  instructions: string[]
}

export interface Workflow {
  metadata: WorkflowMetadata
  /** State variables, each described by a JSON schema object */
  state?: Record<string, Record<string, unknown>>
  steps: WorkflowStep[]
}
