/**
 * Typed error classes for projectkit
 *
 * Error hierarchy:
 * - ProjectKitError (base)
 *   - ContextError (adds context to an underlying failure)
 *   - ConfigError (configuration issues)
 *     - ConfigParseError (YAML/JSON parse failures)
 *     - ConfigValidationError (schema validation failures)
 *     - ConfigNotFoundError (no config file resolved)
 *     - ProjectRootNotFoundError (no project root above the working directory)
 *   - SourceError (source resolution)
 *     - UriSchemeNotFoundError, UnsupportedSchemeError
 *     - SchemeDriverNotRegisteredError, SchemeDriverAlreadyRegisteredError
 *     - EmptySourcePathError, SourcePathNotFoundError, SourcePathCheckError
 *     - SourceResolveError, SourceLoadError (context wrappers)
 *   - ResourceError (resource loading, per kind)
 *     - ResourceReadError, ResourceParseError, ResourceValidationError
 *     - NoResourcesFoundError (+ one subclass per kind)
 *     - RulebookMetadataMissingError
 *   - StoreError (repositories)
 *     - ResourceNotFoundError (SkillNotFoundError)
 *     - ResourceAlreadyExistsError (SkillAlreadyExistsError)
 *     - InvalidResourceIdError, RepositoryReadError
 *   - FileSystemError (errno-style filesystem failures)
 *     - ReadOnlyFileSystemError
 *   - LockError (file locking)
 *     - LockTimeoutError
 *
 * Wrapping classes keep the `code` of what they wrap, so a failure keeps its
 * kind however much context is added on the way up.
 */

import type { ValidationError } from './schemas/index.js'
import type { ResourceKind } from './types/resource.js'

/** Base error class for all projectkit errors */
export class ProjectKitError extends Error {
  readonly code: string

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ProjectKitError'
    this.code = code
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor)
  }
}

function messageOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * Code carried by a wrapped failure: the cause's own `code` when it has a
 * string one (projectkit codes and errno codes alike), else the fallback.
 */
export function errorCodeOf(cause: unknown, fallback: string): string {
  if (typeof cause === 'object' && cause !== null && 'code' in cause) {
    const { code } = cause
    if (typeof code === 'string') {
      return code
    }
  }
  return fallback
}

/** Adds an operation description to an underlying failure */
export class ContextError extends ProjectKitError {
  readonly context: string

  constructor(context: string, cause: unknown) {
    super(`${context}: ${messageOf(cause)}`, errorCodeOf(cause, 'UNKNOWN_ERROR'), { cause })
    this.name = 'ContextError'
    this.context = context
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

/** Base class for configuration-related errors */
export class ConfigError extends ProjectKitError {
  readonly source: string

  constructor(message: string, code: string, source: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
    this.source = source
  }
}

/** Error thrown when a config file cannot be read or parsed */
export class ConfigParseError extends ConfigError {
  constructor(message: string, source: string, options?: ErrorOptions) {
    super(message, 'CONFIG_PARSE_ERROR', source, options)
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when schema validation fails */
export class ConfigValidationError extends ConfigError {
  readonly validationErrors: ValidationError[]

  constructor(message: string, source: string, validationErrors: ValidationError[]) {
    const details = validationErrors.map((e) => `  ${e.path}: ${e.message}`).join('\n')
    super(`${message}:\n${details}`, 'CONFIG_VALIDATION_ERROR', source)
    this.name = 'ConfigValidationError'
    this.validationErrors = validationErrors
  }
}

/** Error thrown when no config file exists in any searched location */
export class ConfigNotFoundError extends ConfigError {
  readonly searchedPaths: string[]

  constructor(searchedPaths: string[]) {
    super(
      `Config not found. Searched: ${searchedPaths.join(', ')}`,
      'CONFIG_NOT_FOUND',
      searchedPaths.join(', ')
    )
    this.name = 'ConfigNotFoundError'
    this.searchedPaths = searchedPaths
  }
}

/** Error thrown when no project root is found above the start directory */
export class ProjectRootNotFoundError extends ConfigError {
  constructor(startDir: string) {
    super(`Project root not found above "${startDir}"`, 'PROJECT_ROOT_NOT_FOUND', startDir)
    this.name = 'ProjectRootNotFoundError'
  }
}

// ============================================================================
// Source errors
// ============================================================================

/** Base class for source resolution errors */
export class SourceError extends ProjectKitError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'SourceError'
  }
}

/** Error thrown when a URI lacks the `://` separator */
export class UriSchemeNotFoundError extends SourceError {
  readonly uri: string

  constructor(uri: string) {
    super(`URI scheme not found: "${uri}"`, 'URI_SCHEME_NOT_FOUND')
    this.name = 'UriSchemeNotFoundError'
    this.uri = uri
  }
}

/** Error thrown when no driver is registered for a scheme */
export class SchemeDriverNotRegisteredError extends SourceError {
  readonly scheme: string

  constructor(scheme: string) {
    super(`Scheme driver not registered: ${scheme}`, 'SCHEME_DRIVER_NOT_REGISTERED')
    this.name = 'SchemeDriverNotRegisteredError'
    this.scheme = scheme
  }
}

/** Error thrown when a driver claims a scheme that is already taken */
export class SchemeDriverAlreadyRegisteredError extends SourceError {
  readonly scheme: string

  constructor(scheme: string) {
    super(`Scheme driver already registered: ${scheme}`, 'SCHEME_DRIVER_ALREADY_REGISTERED')
    this.name = 'SchemeDriverAlreadyRegisteredError'
    this.scheme = scheme
  }
}

/** Error thrown when a driver is handed a URI of a scheme it does not own */
export class UnsupportedSchemeError extends SourceError {
  readonly uri: string

  constructor(uri: string) {
    super(`Unsupported scheme in URI: "${uri}"`, 'UNSUPPORTED_SCHEME')
    this.name = 'UnsupportedSchemeError'
    this.uri = uri
  }
}

/** Error thrown when a URI has nothing after its scheme */
export class EmptySourcePathError extends SourceError {
  readonly uri: string

  constructor(uri: string) {
    super(`Empty path in URI: "${uri}"`, 'EMPTY_SOURCE_PATH')
    this.name = 'EmptySourcePathError'
    this.uri = uri
  }
}

/** Error thrown when a source path is not an existing directory */
export class SourcePathNotFoundError extends SourceError {
  readonly path: string

  constructor(path: string) {
    super(`Path "${path}" does not exist`, 'SOURCE_PATH_NOT_FOUND')
    this.name = 'SourcePathNotFoundError'
    this.path = path
  }
}

/** Error thrown when checking a source path fails */
export class SourcePathCheckError extends SourceError {
  readonly path: string

  constructor(path: string, cause: unknown) {
    super(`Checking path "${path}": ${messageOf(cause)}`, 'SOURCE_PATH_CHECK_FAILED', { cause })
    this.name = 'SourcePathCheckError'
    this.path = path
  }
}

/** Wraps a driver failure with the URI being resolved */
export class SourceResolveError extends SourceError {
  readonly uri: string

  constructor(uri: string, cause: unknown) {
    super(`resolve ${uri}: ${messageOf(cause)}`, errorCodeOf(cause, 'SOURCE_RESOLVE_FAILED'), {
      cause,
    })
    this.name = 'SourceResolveError'
    this.uri = uri
  }
}

/** Wraps a resolution or load failure for one configured source */
export class SourceLoadError extends SourceError {
  readonly uri: string
  readonly stage: 'resolve' | 'load'

  constructor(uri: string, stage: 'resolve' | 'load', cause: unknown) {
    super(`${stage}: ${uri}: ${messageOf(cause)}`, errorCodeOf(cause, 'SOURCE_LOAD_FAILED'), {
      cause,
    })
    this.name = 'SourceLoadError'
    this.uri = uri
    this.stage = stage
  }
}

// ============================================================================
// Resource errors
// ============================================================================

/** Base class for resource loading errors */
export class ResourceError extends ProjectKitError {
  readonly kind: ResourceKind

  constructor(message: string, code: string, kind: ResourceKind, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ResourceError'
    this.kind = kind
  }
}

/** Error thrown when a resource file cannot be read */
export class ResourceReadError extends ResourceError {
  readonly path: string

  constructor(kind: ResourceKind, path: string, cause: unknown) {
    super(`${path}: read failed: ${messageOf(cause)}`, 'RESOURCE_READ_FAILED', kind, { cause })
    this.name = 'ResourceReadError'
    this.path = path
  }
}

/** Error thrown when a resource file is not well-formed YAML */
export class ResourceParseError extends ResourceError {
  readonly path: string

  constructor(kind: ResourceKind, path: string, cause: unknown) {
    super(`${path}: parse failed: ${messageOf(cause)}`, 'RESOURCE_PARSE_FAILED', kind, { cause })
    this.name = 'ResourceParseError'
    this.path = path
  }
}

/** Error thrown when a parsed resource violates its schema */
export class ResourceValidationError extends ResourceError {
  readonly path: string
  readonly validationErrors: ValidationError[]

  constructor(kind: ResourceKind, path: string, validationErrors: ValidationError[]) {
    const details = validationErrors.map((e) => `  ${e.path}: ${e.message}`).join('\n')
    super(`${path}: validation failed:\n${details}`, 'RESOURCE_VALIDATION_FAILED', kind)
    this.name = 'ResourceValidationError'
    this.path = path
    this.validationErrors = validationErrors
  }
}

/** Error thrown when a source holds no resource of the expected kind */
export class NoResourcesFoundError extends ResourceError {
  constructor(kind: ResourceKind, message: string) {
    super(message, 'NO_RESOURCES_FOUND', kind)
    this.name = 'NoResourcesFoundError'
  }
}

export class NoInstructionsFoundError extends NoResourcesFoundError {
  constructor() {
    super('instruction', 'No instructions found')
    this.name = 'NoInstructionsFoundError'
  }
}

export class NoSkillsFoundError extends NoResourcesFoundError {
  constructor() {
    super('skill', 'No skills found')
    this.name = 'NoSkillsFoundError'
  }
}

export class NoMcpServersFoundError extends NoResourcesFoundError {
  constructor() {
    super('mcp-server', 'No MCP servers found')
    this.name = 'NoMcpServersFoundError'
  }
}

export class NoWorkflowsFoundError extends NoResourcesFoundError {
  constructor() {
    super('workflow', 'No workflows found')
    this.name = 'NoWorkflowsFoundError'
  }
}

export class NoStandardsFoundError extends NoResourcesFoundError {
  constructor() {
    super('standard', 'No standards found')
    this.name = 'NoStandardsFoundError'
  }
}

/** Error thrown when a rulebook directory has no rulebook.yaml */
export class RulebookMetadataMissingError extends ResourceError {
  readonly path: string

  constructor(path: string) {
    super(`${path}: missing rulebook metadata file`, 'RULEBOOK_METADATA_MISSING', 'rulebook')
    this.name = 'RulebookMetadataMissingError'
    this.path = path
  }
}

// ============================================================================
// Store errors
// ============================================================================

/** Base class for repository errors */
export class StoreError extends ProjectKitError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'StoreError'
  }
}

/** Error thrown when a lookup matches no stored resource */
export class ResourceNotFoundError extends StoreError {
  readonly kind: ResourceKind
  readonly identity: string

  constructor(kind: ResourceKind, identity: string) {
    super(`${kind} not found: "${identity}"`, 'RESOURCE_NOT_FOUND')
    this.name = 'ResourceNotFoundError'
    this.kind = kind
    this.identity = identity
  }
}

export class SkillNotFoundError extends ResourceNotFoundError {
  constructor(name: string) {
    super('skill', name)
    this.name = 'SkillNotFoundError'
  }
}

/** Error thrown when adding a resource whose identity is already stored */
export class ResourceAlreadyExistsError extends StoreError {
  readonly kind: ResourceKind
  readonly identity: string

  constructor(kind: ResourceKind, identity: string) {
    super(`${kind} already exists: "${identity}"`, 'RESOURCE_ALREADY_EXISTS')
    this.name = 'ResourceAlreadyExistsError'
    this.kind = kind
    this.identity = identity
  }
}

export class SkillAlreadyExistsError extends ResourceAlreadyExistsError {
  constructor(name: string) {
    super('skill', name)
    this.name = 'SkillAlreadyExistsError'
  }
}

/** Error thrown when an identity cannot be used as a storage key */
export class InvalidResourceIdError extends StoreError {
  readonly kind: ResourceKind
  readonly identity: string

  constructor(kind: ResourceKind, identity: string) {
    super(
      `${kind} id must be alphanumeric with dashes: "${identity}"`,
      'INVALID_RESOURCE_ID'
    )
    this.name = 'InvalidResourceIdError'
    this.kind = kind
    this.identity = identity
  }
}

/** Error thrown when a stored resource file cannot be read back */
export class RepositoryReadError extends StoreError {
  readonly path: string

  constructor(path: string, cause: unknown) {
    super(`${path}: ${messageOf(cause)}`, errorCodeOf(cause, 'REPOSITORY_READ_FAILED'), { cause })
    this.name = 'RepositoryReadError'
    this.path = path
  }
}

// ============================================================================
// Filesystem errors
// ============================================================================

/** Errno-style failure raised by in-process filesystem implementations */
export class FileSystemError extends ProjectKitError {
  readonly path: string

  constructor(code: string, operation: string, path: string) {
    super(`${code}: ${operation} "${path}"`, code)
    this.name = 'FileSystemError'
    this.path = path
  }
}

/** Error thrown when writing through a read-only filesystem */
export class ReadOnlyFileSystemError extends FileSystemError {
  constructor(operation: string, path: string) {
    super('EROFS', operation, path)
    this.name = 'ReadOnlyFileSystemError'
  }
}

// ============================================================================
// Lock errors
// ============================================================================

/** Error thrown during file locking operations */
export class LockError extends ProjectKitError {
  readonly lockPath: string

  constructor(message: string, lockPath: string) {
    super(`Lock error for "${lockPath}": ${message}`, 'LOCK_ERROR')
    this.name = 'LockError'
    this.lockPath = lockPath
  }
}

/** Error thrown when lock acquisition times out */
export class LockTimeoutError extends LockError {
  readonly timeout: number

  constructor(lockPath: string, timeout: number) {
    super(`Timed out after ${timeout}ms`, lockPath)
    this.name = 'LockTimeoutError'
    this.timeout = timeout
  }
}

// ============================================================================
// Type guards and chain helpers
// ============================================================================

export function isProjectKitError(error: unknown): error is ProjectKitError {
  return error instanceof ProjectKitError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError
}

export function isResourceError(error: unknown): error is ResourceError {
  return error instanceof ResourceError
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError
}

/**
 * Walk an error and its `cause` chain, returning the first instance of `type`.
 */
export function findError<T extends Error>(
  error: unknown,
  type: abstract new (...args: never[]) => T
): T | undefined {
  let current: unknown = error
  const seen = new Set<unknown>()
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof type) {
      return current
    }
    seen.add(current)
    current = current.cause
  }
  return undefined
}

/**
 * True if the error or anything in its `cause` chain is an instance of `type`.
 */
export function isErrorOf(
  error: unknown,
  type: abstract new (...args: never[]) => Error
): boolean {
  return findError(error, type) !== undefined
}

/**
 * True if the error or anything in its `cause` chain carries `code`
 * (errno codes such as ENOENT included).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  let current: unknown = error
  const seen = new Set<unknown>()
  while (typeof current === 'object' && current !== null && !seen.has(current)) {
    if ('code' in current && current.code === code) {
      return true
    }
    seen.add(current)
    current = current instanceof Error ? current.cause : undefined
  }
  return false
}
