import type { ResourceKind, Validator } from '@projectkit/core'
import { ResourceParseError, ResourceValidationError } from '@projectkit/core'
import { parse } from 'yaml'

/**
 * Parse YAML resource content.
 *
 * @throws ResourceParseError naming the kind and file
 */
export function parseResourceYaml(kind: ResourceKind, path: string, content: Buffer): unknown {
  try {
    return parse(content.toString('utf-8'))
  } catch (err) {
    throw new ResourceParseError(kind, path, err)
  }
}

/**
 * Validate a parsed resource.
 *
 * @throws ResourceValidationError listing every violated constraint
 */
export function validateResource<T>(
  kind: ResourceKind,
  path: string,
  data: unknown,
  validate: Validator<T>
): T {
  const result = validate(data)
  if (!result.valid) {
    throw new ResourceValidationError(kind, path, result.errors)
  }
  return result.data
}
