/**
 * @projectkit/core
 *
 * Types, schemas, errors, the filesystem capability, the project lock, project
 * configuration and the logger contract shared by every package.
 */

// Types
export * from './types/index.js'

// Schemas
export {
  instructionsSchema,
  mcpServerSchema,
  projectConfigSchema,
  rulebookSchema,
  serializedSkillSchema,
  skillMetadataSchema,
  standardSchema,
  validateInstructions,
  validateMcpServer,
  validateProjectConfig,
  validateRulebookMetadata,
  validateSerializedSkill,
  validateSkillMetadata,
  validateStandard,
  validateWorkflow,
  workflowSchema,
} from './schemas/index.js'
export type { ValidationError, ValidationResult, Validator } from './schemas/index.js'

// Project configuration
export {
  emptyProjectConfig,
  findProjectRoot,
  loadProjectConfig,
  mergeProjectConfigs,
  parseProjectConfig,
  PROJECT_CONFIG_FILENAME,
  readProjectConfig,
  resolveProjectConfigPaths,
} from './config/index.js'
export type { ProjectConfigLocations } from './config/index.js'

// Errors
export {
  ConfigError,
  ConfigNotFoundError,
  ConfigParseError,
  ConfigValidationError,
  ContextError,
  EmptySourcePathError,
  errorCodeOf,
  FileSystemError,
  findError,
  hasErrorCode,
  InvalidResourceIdError,
  isConfigError,
  isErrorOf,
  isProjectKitError,
  isResourceError,
  isSourceError,
  isStoreError,
  LockError,
  LockTimeoutError,
  NoInstructionsFoundError,
  NoMcpServersFoundError,
  NoResourcesFoundError,
  NoSkillsFoundError,
  NoStandardsFoundError,
  NoWorkflowsFoundError,
  ProjectKitError,
  ProjectRootNotFoundError,
  ReadOnlyFileSystemError,
  RepositoryReadError,
  ResourceAlreadyExistsError,
  ResourceError,
  ResourceNotFoundError,
  ResourceParseError,
  ResourceReadError,
  ResourceValidationError,
  RulebookMetadataMissingError,
  SchemeDriverAlreadyRegisteredError,
  SchemeDriverNotRegisteredError,
  SkillAlreadyExistsError,
  SkillNotFoundError,
  SourceError,
  SourceLoadError,
  SourcePathCheckError,
  SourcePathNotFoundError,
  SourceResolveError,
  StoreError,
  UnsupportedSchemeError,
  UriSchemeNotFoundError,
} from './errors.js'

// Filesystem
export {
  joinRelative,
  MemoryFileSystem,
  NodeFileSystem,
  normalizeRelative,
  ReadOnlyFileSystem,
} from './fs/index.js'
export type { FileEntry, FileSystem } from './fs/index.js'

// Locks
export { ReadWriteLock } from './rwlock.js'
export { getProjectLockPath, LOCK_FILES, PROJECTKIT_DIR, withProjectLock } from './locks.js'
export type { LockOptions } from './locks.js'

// Logging
export { isLogLevel, LOG_LEVELS, noopLogger } from './logger.js'
export type { LogFields, Logger, LogLevel } from './logger.js'
