/**
 * Resource and configuration types
 */

export type { ResourceKind, SourceConfig, SourceRef, StoredResourceKind } from './resource.js'

export type { Instructions } from './instruction.js'

export type {
  SerializedSkill,
  SerializedSkillScript,
  Skill,
  SkillMetadata,
  SkillScript,
} from './skill.js'

export type { McpServer, McpServerStdio } from './mcp.js'

export type { Workflow, WorkflowMetadata, WorkflowStep } from './workflow.js'

export type {
  FieldDefinition,
  GoldenPath,
  GoldenPathExample,
  GoldenPathExampleFile,
  RequirementException,
  RequirementLevel,
  RequirementRule,
  RequirementVerificationMethod,
  Standard,
  StandardDefinitions,
  StandardExample,
  StandardExamples,
  StandardMetadata,
  StandardReference,
  StandardRelations,
  StandardRequirements,
  StandardScope,
  StandardSpecification,
  TermDefinition,
} from './standard.js'

export type {
  AiSourcesConfig,
  DocSourcesConfig,
  Rulebook,
  RulebookMetadata,
} from './rulebook.js'

export type { AgentConfig, ProjectConfig, ResolvedProjectConfig } from './project.js'
