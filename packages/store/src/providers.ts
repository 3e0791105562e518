/**
 * Repository providers
 *
 * Each provider creates its repository directory under the project root on
 * first use and hands back a repository scoped to it.
 */

import type { FileSystem, StoredResourceKind } from '@projectkit/core'

import { InstructionRepository } from './instruction-repository.js'
import { McpServerRepository } from './mcp-repository.js'
import { getRepositoryPath } from './paths.js'
import { SkillRepository } from './skill-repository.js'
import { StandardRepository } from './standard-repository.js'
import { WorkflowRepository } from './workflow-repository.js'

async function repositoryFs(projectFs: FileSystem, kind: StoredResourceKind): Promise<FileSystem> {
  const dir = getRepositoryPath(kind)
  await projectFs.mkdir(dir)
  return projectFs.scope(dir)
}

export async function provideSkillRepository(projectFs: FileSystem): Promise<SkillRepository> {
  return new SkillRepository(await repositoryFs(projectFs, 'skill'))
}

export async function provideMcpServerRepository(
  projectFs: FileSystem
): Promise<McpServerRepository> {
  return new McpServerRepository(await repositoryFs(projectFs, 'mcp-server'))
}

export async function provideInstructionRepository(
  projectFs: FileSystem
): Promise<InstructionRepository> {
  return new InstructionRepository(await repositoryFs(projectFs, 'instruction'))
}

export async function provideWorkflowRepository(
  projectFs: FileSystem
): Promise<WorkflowRepository> {
  return new WorkflowRepository(await repositoryFs(projectFs, 'workflow'))
}

export async function provideStandardRepository(
  projectFs: FileSystem
): Promise<StandardRepository> {
  return new StandardRepository(await repositoryFs(projectFs, 'standard'))
}

/** Every repository of one project */
export interface Repositories {
  standards: StandardRepository
  instructions: InstructionRepository
  skills: SkillRepository
  workflows: WorkflowRepository
  mcpServers: McpServerRepository
}

export async function provideRepositories(projectFs: FileSystem): Promise<Repositories> {
  return {
    standards: await provideStandardRepository(projectFs),
    instructions: await provideInstructionRepository(projectFs),
    skills: await provideSkillRepository(projectFs),
    workflows: await provideWorkflowRepository(projectFs),
    mcpServers: await provideMcpServerRepository(projectFs),
  }
}
