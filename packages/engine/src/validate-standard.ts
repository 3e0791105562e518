/**
 * Standard validation (doc standard validate command).
 *
 * WHY: Authors check a standard file before publishing it in a source, with
 * the same parse and schema checks `update` applies when loading it.
 */

import type { FileSystem, Standard } from '@projectkit/core'
import { ResourceReadError, validateStandard } from '@projectkit/core'
import { parseResourceYaml, validateResource } from '@projectkit/loader'

export interface ValidateStandardOptions {
  fs: FileSystem
  /** Path of the standard YAML file within `fs` */
  path: string
}

/**
 * Read, parse and validate one standard file.
 *
 * @throws ResourceReadError if the file cannot be read
 * @throws ResourceParseError if it is not well-formed YAML
 * @throws ResourceValidationError listing every violated constraint
 */
export async function validateStandardFile(options: ValidateStandardOptions): Promise<Standard> {
  let content: Buffer
  try {
    content = await options.fs.readFile(options.path)
  } catch (err) {
    throw new ResourceReadError('standard', options.path, err)
  }

  const data = parseResourceYaml('standard', options.path, content)
  return validateResource('standard', options.path, data, validateStandard)
}
