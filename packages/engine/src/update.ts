/**
 * Update action (update command).
 *
 * WHY: The repositories mirror the project's configured sources. An update
 * loads everything first, then replaces each repository's contents:
 * - Aggregate every kind from its configured sources
 * - Load each configured rulebook and append its contents per kind
 * - Remove all, then add, for each repository in a fixed order
 *
 * Loading fails before any repository is touched. A failure while storing
 * leaves the repositories stored so far already rewritten.
 */

import type {
  Instructions,
  Logger,
  McpServer,
  ResolvedProjectConfig,
  Skill,
  Standard,
  Workflow,
} from '@projectkit/core'
import { noopLogger } from '@projectkit/core'
import type { ResourceLoaders } from '@projectkit/loader'
import { createResourceLoaders, loadFromSources, RulebookLoader } from '@projectkit/loader'
import type { SourceResolver } from '@projectkit/source'
import type { Repositories } from '@projectkit/store'

/**
 * Options for update operation.
 */
export interface UpdateOptions {
  config: ResolvedProjectConfig
  /** Resolves the configured source URIs */
  resolver: SourceResolver
  repositories: Repositories
  logger?: Logger | undefined
  /** Loaders per kind (default: the built-in loaders) */
  loaders?: ResourceLoaders | undefined
}

/** Everything one update loaded, per kind */
export interface LoadedResources {
  standards: Standard[]
  instructions: Instructions[]
  skills: Skill[]
  workflows: Workflow[]
  mcpServers: McpServer[]
}

/**
 * Result of update operation: how many resources each repository now holds
 * from this run.
 */
export type UpdateResult = { [K in keyof LoadedResources]: number }

/**
 * Load every configured kind, then every configured rulebook.
 *
 * @throws SourceLoadError for the first source that fails
 */
export async function loadResources(
  config: ResolvedProjectConfig,
  resolver: SourceResolver,
  options: { logger?: Logger | undefined; loaders?: ResourceLoaders | undefined } = {}
): Promise<LoadedResources> {
  const logger = options.logger ?? noopLogger
  const loaders = options.loaders ?? createResourceLoaders()
  const aggregateOptions = { logger }

  const resources: LoadedResources = {
    standards: await loadFromSources(
      config.doc.standard.sources,
      resolver,
      loaders.standards,
      aggregateOptions
    ),
    instructions: await loadFromSources(
      config.ai.instruction.sources,
      resolver,
      loaders.instructions,
      aggregateOptions
    ),
    skills: await loadFromSources(
      config.ai.skill.sources,
      resolver,
      loaders.skills,
      aggregateOptions
    ),
    workflows: await loadFromSources(
      config.ai.workflow.sources,
      resolver,
      loaders.workflows,
      aggregateOptions
    ),
    mcpServers: await loadFromSources(
      config.ai.mcp.sources,
      resolver,
      loaders.mcpServers,
      aggregateOptions
    ),
  }

  const rulebooks = await loadFromSources(
    config.rulebook.sources,
    resolver,
    new RulebookLoader({ loaders, logger }),
    aggregateOptions
  )
  for (const rulebook of rulebooks) {
    resources.standards.push(...rulebook.doc.standards)
    resources.instructions.push(...rulebook.ai.instructions)
    resources.skills.push(...rulebook.ai.skills)
    resources.workflows.push(...rulebook.ai.workflows)
    resources.mcpServers.push(...rulebook.ai.mcpServers)
  }

  return resources
}

/**
 * Replace each repository's contents with the loaded resources, in the order
 * standards, instructions, skills, workflows, MCP servers.
 */
export async function storeResources(
  repositories: Repositories,
  resources: LoadedResources,
  logger: Logger = noopLogger
): Promise<UpdateResult> {
  await repositories.standards.removeAll()
  for (const standard of resources.standards) {
    await repositories.standards.addStandard(standard)
  }
  logger.info('Standards added to repository.', { count: resources.standards.length })

  await repositories.instructions.removeAll()
  for (const instructions of resources.instructions) {
    await repositories.instructions.addInstructions(instructions)
  }
  logger.info('Instructions added to repository.', { count: resources.instructions.length })

  await repositories.skills.removeAll()
  for (const skill of resources.skills) {
    await repositories.skills.addSkill(skill)
  }
  logger.info('Skills added to repository.', { count: resources.skills.length })

  await repositories.workflows.removeAll()
  for (const workflow of resources.workflows) {
    await repositories.workflows.addWorkflow(workflow)
  }
  logger.info('Workflows added to repository.', { count: resources.workflows.length })

  await repositories.mcpServers.removeAll()
  for (const server of resources.mcpServers) {
    await repositories.mcpServers.addMcpServer(server)
  }
  logger.info('MCP servers added to repository.', { count: resources.mcpServers.length })

  return {
    standards: resources.standards.length,
    instructions: resources.instructions.length,
    skills: resources.skills.length,
    workflows: resources.workflows.length,
    mcpServers: resources.mcpServers.length,
  }
}

/**
 * Run a full update. Any failure aborts the action.
 */
export async function runUpdate(options: UpdateOptions): Promise<UpdateResult> {
  const logger = options.logger ?? noopLogger

  logger.debug('Loading resources.', { configFiles: options.config.paths.length })
  const resources = await loadResources(options.config, options.resolver, {
    logger,
    loaders: options.loaders,
  })

  return storeResources(options.repositories, resources, logger)
}
