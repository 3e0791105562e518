/**
 * Project configuration (.projectkit.yaml) parser and loader
 *
 * Configuration is read from the user's home directory and from the project
 * root, in that order. Every file found is validated on its own and the
 * results are merged by concatenation, so a home config can contribute
 * sources to every project.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { parse as parseYaml } from 'yaml'

import {
  ConfigNotFoundError,
  ConfigParseError,
  ConfigValidationError,
  hasErrorCode,
} from '../errors.js'
import { validateProjectConfig } from '../schemas/index.js'
import type { ProjectConfig, ResolvedProjectConfig } from '../types/project.js'

/** Default filename for project configuration */
export const PROJECT_CONFIG_FILENAME = '.projectkit.yaml'

/**
 * Parse .projectkit.yaml content into a validated ProjectConfig
 *
 * An empty document is an empty configuration.
 *
 * @throws ConfigParseError if YAML parsing fails
 * @throws ConfigValidationError if schema validation fails
 */
export function parseProjectConfig(content: string, filePath?: string): ProjectConfig {
  const source = filePath ?? PROJECT_CONFIG_FILENAME

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to parse YAML: ${message}`, source, { cause: err })
  }

  const result = validateProjectConfig(parsed ?? {})
  if (!result.valid) {
    throw new ConfigValidationError(`Invalid ${PROJECT_CONFIG_FILENAME}`, source, result.errors)
  }

  return result.data
}

/**
 * Read and parse a .projectkit.yaml file from disk
 */
export async function readProjectConfig(filePath: string): Promise<ProjectConfig> {
  let content: string
  try {
    content = await fs.readFile(filePath, 'utf8')
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      throw new ConfigParseError('File not found', filePath, { cause: err })
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to read file: ${message}`, filePath, { cause: err })
  }
  return parseProjectConfig(content, filePath)
}

/** An empty merged configuration */
export function emptyProjectConfig(): ResolvedProjectConfig {
  return {
    paths: [],
    agents: [],
    rulebook: { sources: [] },
    ai: {
      instruction: { sources: [] },
      skill: { sources: [] },
      workflow: { sources: [] },
      mcp: { sources: [] },
    },
    doc: {
      standard: { sources: [] },
    },
  }
}

/**
 * Merge configs in order: agents and every kind's sources are concatenated.
 */
export function mergeProjectConfigs(
  configs: Array<{ path: string; config: ProjectConfig }>
): ResolvedProjectConfig {
  const result = emptyProjectConfig()

  for (const { path: configPath, config } of configs) {
    result.paths.push(configPath)
    result.agents.push(...(config.agents ?? []))
    result.rulebook.sources.push(...(config.rulebook?.sources ?? []))
    result.ai.instruction.sources.push(...(config.ai?.instruction?.sources ?? []))
    result.ai.skill.sources.push(...(config.ai?.skill?.sources ?? []))
    result.ai.workflow.sources.push(...(config.ai?.workflow?.sources ?? []))
    result.ai.mcp.sources.push(...(config.ai?.mcp?.sources ?? []))
    result.doc.standard.sources.push(...(config.doc?.standard?.sources ?? []))
  }

  return result
}

/** Where to look for configuration */
export interface ProjectConfigLocations {
  homeDir: string
  projectRoot: string
}

/**
 * Config file paths that exist, home first, without duplicates
 */
export async function resolveProjectConfigPaths(
  locations: ProjectConfigLocations
): Promise<string[]> {
  const candidates = [
    path.resolve(locations.homeDir, PROJECT_CONFIG_FILENAME),
    path.resolve(locations.projectRoot, PROJECT_CONFIG_FILENAME),
  ]

  const paths: string[] = []
  for (const candidate of candidates) {
    if (paths.includes(candidate)) continue
    if (await isFile(candidate)) {
      paths.push(candidate)
    }
  }
  return paths
}

/**
 * Discover, validate and merge every .projectkit.yaml
 *
 * @throws ConfigNotFoundError if no config file exists
 */
export async function loadProjectConfig(
  locations: ProjectConfigLocations
): Promise<ResolvedProjectConfig> {
  const paths = await resolveProjectConfigPaths(locations)
  if (paths.length === 0) {
    throw new ConfigNotFoundError([
      path.resolve(locations.homeDir, PROJECT_CONFIG_FILENAME),
      path.resolve(locations.projectRoot, PROJECT_CONFIG_FILENAME),
    ])
  }

  const configs: Array<{ path: string; config: ProjectConfig }> = []
  for (const configPath of paths) {
    configs.push({ path: configPath, config: await readProjectConfig(configPath) })
  }
  return mergeProjectConfigs(configs)
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile()
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT') || hasErrorCode(err, 'ENOTDIR')) {
      return false
    }
    throw err
  }
}
