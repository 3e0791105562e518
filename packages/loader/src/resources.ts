/**
 * Resource definitions and loaders for every stored kind
 */

import type { Instructions, McpServer, Skill, Standard, Workflow } from '@projectkit/core'
import {
  NoInstructionsFoundError,
  NoMcpServersFoundError,
  NoStandardsFoundError,
  NoWorkflowsFoundError,
  validateInstructions,
  validateMcpServer,
  validateStandard,
  validateWorkflow,
} from '@projectkit/core'

import { FlatFileResourceLoader } from './flat-file.js'
import type { ResourceDefinition, ResourceLoader } from './resource-loader.js'
import { SkillLoader } from './skills.js'

export const instructionsDefinition: ResourceDefinition<Instructions> = {
  kind: 'instruction',
  validate: validateInstructions,
  noneFound: () => new NoInstructionsFoundError(),
}

export const mcpServerDefinition: ResourceDefinition<McpServer> = {
  kind: 'mcp-server',
  validate: validateMcpServer,
  noneFound: () => new NoMcpServersFoundError(),
}

export const workflowDefinition: ResourceDefinition<Workflow> = {
  kind: 'workflow',
  validate: validateWorkflow,
  noneFound: () => new NoWorkflowsFoundError(),
}

export const standardDefinition: ResourceDefinition<Standard> = {
  kind: 'standard',
  validate: validateStandard,
  noneFound: () => new NoStandardsFoundError(),
}

/** One loader per stored kind */
export interface ResourceLoaders {
  instructions: ResourceLoader<Instructions>
  skills: ResourceLoader<Skill>
  mcpServers: ResourceLoader<McpServer>
  workflows: ResourceLoader<Workflow>
  standards: ResourceLoader<Standard>
}

export function createResourceLoaders(): ResourceLoaders {
  return {
    instructions: new FlatFileResourceLoader(instructionsDefinition),
    skills: new SkillLoader(),
    mcpServers: new FlatFileResourceLoader(mcpServerDefinition),
    workflows: new FlatFileResourceLoader(workflowDefinition),
    standards: new FlatFileResourceLoader(standardDefinition),
  }
}
