/**
 * JSON Schema validation for resource files and project configuration
 *
 * Validation is structural only: nothing is checked against other resources.
 * Every object schema is closed with `additionalProperties: false`, and the
 * validators strip undeclared fields in place, so a valid value holds only
 * the fields its type declares.
 */

import { createRequire } from 'node:module'
import type { ErrorObject } from 'ajv'
import AjvModule from 'ajv'
import addFormatsModule from 'ajv-formats'
import * as semver from 'semver'

import type { Instructions } from '../types/instruction.js'
import type { McpServer } from '../types/mcp.js'
import type { ProjectConfig } from '../types/project.js'
import type { RulebookMetadata } from '../types/rulebook.js'
import type { SerializedSkill, SkillMetadata } from '../types/skill.js'
import type { Standard } from '../types/standard.js'
import type { Workflow } from '../types/workflow.js'

const require = createRequire(import.meta.url)
const instructionsSchema = require('./instructions.schema.json')
const mcpServerSchema = require('./mcp-server.schema.json')
const projectConfigSchema = require('./project-config.schema.json')
const rulebookSchema = require('./rulebook.schema.json')
const serializedSkillSchema = require('./serialized-skill.schema.json')
const skillMetadataSchema = require('./skill-metadata.schema.json')
const standardSchema = require('./standard.schema.json')
const workflowSchema = require('./workflow.schema.json')

// ============================================================================
// Ajv instance setup
// ============================================================================

// Both packages are CommonJS with a default export
const Ajv = AjvModule.default
const addFormats = addFormatsModule.default

const ajv = new Ajv({
  strict: true,
  allErrors: true,
  verbose: true,
  removeAdditional: true,
})

addFormats(ajv, ['uri'])
ajv.addFormat('semver', {
  type: 'string',
  validate: (value: string) => semver.valid(value) !== null,
})

// Compile validators
const validateInstructionsSchema = ajv.compile<Instructions>(instructionsSchema)
const validateMcpServerSchema = ajv.compile<McpServer>(mcpServerSchema)
const validateProjectConfigSchema = ajv.compile<ProjectConfig>(projectConfigSchema)
const validateRulebookSchema = ajv.compile<RulebookMetadata>(rulebookSchema)
const validateSerializedSkillSchema = ajv.compile<SerializedSkill>(serializedSkillSchema)
const validateSkillMetadataSchema = ajv.compile<SkillMetadata>(skillMetadataSchema)
const validateStandardSchema = ajv.compile<Standard>(standardSchema)
const validateWorkflowSchema = ajv.compile<Workflow>(workflowSchema)

// ============================================================================
// Validation result types
// ============================================================================

export interface ValidationError {
  path: string
  message: string
  keyword: string
  params: Record<string, unknown>
}

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationError[] }

/** Validator for one schema */
export type Validator<T> = (data: unknown) => ValidationResult<T>

// ============================================================================
// Validation functions
// ============================================================================

/**
 * Provide a more helpful error message for known validation patterns.
 */
function friendlyMessage(err: ErrorObject): string {
  const defaultMsg = err.message || 'Unknown error'

  if (err.keyword === 'required') {
    const prop: unknown = err.params['missingProperty']
    return `missing required property "${String(prop)}"`
  }

  if (err.keyword === 'format' && err.params['format'] === 'semver') {
    return `"${String(err.data)}" is not a valid semantic version`
  }

  if (err.keyword === 'enum') {
    const allowed: unknown = err.params['allowedValues']
    return Array.isArray(allowed) ? `must be one of: ${allowed.join(', ')}` : defaultMsg
  }

  return defaultMsg
}

function formatErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  if (!errors) return []

  return errors.map((err) => ({
    path: err.instancePath || '/',
    message: friendlyMessage(err),
    keyword: err.keyword,
    params: err.params,
  }))
}

function createValidator<T>(validate: {
  (data: unknown): data is T
  errors?: ErrorObject[] | null
}): Validator<T> {
  return (data) => {
    if (validate(data)) {
      return { valid: true, data }
    }
    return { valid: false, errors: formatErrors(validate.errors) }
  }
}

/** Validate an instruction set (one YAML file) */
export const validateInstructions: Validator<Instructions> =
  createValidator(validateInstructionsSchema)

/** Validate a skill's metadata.yaml */
export const validateSkillMetadata: Validator<SkillMetadata> = createValidator(
  validateSkillMetadataSchema
)

/** Validate a skill read back from the repository */
export const validateSerializedSkill: Validator<SerializedSkill> = createValidator(
  validateSerializedSkillSchema
)

/** Validate an MCP server definition */
export const validateMcpServer: Validator<McpServer> = createValidator(validateMcpServerSchema)

/** Validate a workflow definition */
export const validateWorkflow: Validator<Workflow> = createValidator(validateWorkflowSchema)

/** Validate a documentation standard */
export const validateStandard: Validator<Standard> = createValidator(validateStandardSchema)

/** Validate a rulebook.yaml */
export const validateRulebookMetadata: Validator<RulebookMetadata> =
  createValidator(validateRulebookSchema)

/** Validate a .projectkit.yaml */
export const validateProjectConfig: Validator<ProjectConfig> = createValidator(
  validateProjectConfigSchema
)

// ============================================================================
// Schema exports for external use
// ============================================================================

export {
  instructionsSchema,
  mcpServerSchema,
  projectConfigSchema,
  rulebookSchema,
  serializedSkillSchema,
  skillMetadataSchema,
  standardSchema,
  workflowSchema,
}
