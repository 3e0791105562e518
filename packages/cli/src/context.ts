/**
 * Command context: the one place the CLI wires concrete implementations
 * together.
 */

import * as os from 'node:os'
import * as path from 'node:path'
import type { FileSystem, Logger, ResolvedProjectConfig } from '@projectkit/core'
import { findProjectRoot, loadProjectConfig, NodeFileSystem } from '@projectkit/core'
import type { SourceResolver } from '@projectkit/source'
import { DriverRegistry, LocalDriver, Resolver } from '@projectkit/source'
import type { Repositories } from '@projectkit/store'
import { provideRepositories } from '@projectkit/store'

import type { GlobalOptions } from './helpers.js'
import {
  createLogger,
  DEFAULT_LOG_FORMAT,
  DEFAULT_LOG_LEVEL,
  parseLogFormat,
  parseLogLevel,
} from './logger.js'
import type { LoggerConfig } from './logger.js'

export const ENV_LOG_LEVEL = 'PROJECTKIT_LOG_LEVEL'
export const ENV_LOG_FORMAT = 'PROJECTKIT_LOG_FORMAT'

/**
 * Process facts the CLI depends on, injectable for tests.
 */
export interface CliEnvironment {
  cwd: string
  homeDir: string
  env: Record<string, string | undefined>
}

export function processEnvironment(): CliEnvironment {
  return { cwd: process.cwd(), homeDir: os.homedir(), env: process.env }
}

/**
 * Resolve the logger configuration: flags first, then environment, then
 * defaults.
 *
 * @throws LogConfigError for an empty or unknown level or format
 */
export function resolveLoggerConfig(
  options: GlobalOptions,
  env: CliEnvironment['env']
): LoggerConfig {
  return {
    level: parseLogLevel(options.logLevel ?? env[ENV_LOG_LEVEL] ?? DEFAULT_LOG_LEVEL),
    format: parseLogFormat(options.logFormat ?? env[ENV_LOG_FORMAT] ?? DEFAULT_LOG_FORMAT),
    quiet: options.quiet === true,
  }
}

export interface CommandContext {
  projectRoot: string
  homeDir: string
  logger: Logger
  /** The project root as a filesystem */
  projectFs: FileSystem
}

/**
 * Build the context for one command run.
 *
 * @throws ProjectRootNotFoundError if --project is absent and no project root
 *   is found above the working directory
 */
export async function createCommandContext(
  options: GlobalOptions,
  environment: CliEnvironment
): Promise<CommandContext> {
  const logger = createLogger(resolveLoggerConfig(options, environment.env))
  const projectRoot =
    options.project !== undefined
      ? path.resolve(environment.cwd, options.project)
      : await findProjectRoot(environment.cwd, environment.homeDir)

  logger.debug('Project root resolved.', { projectRoot })

  return {
    projectRoot,
    homeDir: environment.homeDir,
    logger,
    projectFs: new NodeFileSystem(projectRoot),
  }
}

/**
 * Source resolver with every built-in driver. Relative `local://` paths are
 * taken from the project root.
 */
export function createSourceResolver(context: CommandContext): SourceResolver {
  const registry = new DriverRegistry()
  registry.registerDriver(new LocalDriver({ baseDir: context.projectRoot }))
  return new Resolver(registry)
}

export function loadConfig(context: CommandContext): Promise<ResolvedProjectConfig> {
  return loadProjectConfig({ homeDir: context.homeDir, projectRoot: context.projectRoot })
}

export function openRepositories(context: CommandContext): Promise<Repositories> {
  return provideRepositories(context.projectFs)
}
