/**
 * Flat-file resource loader
 *
 * Every top-level `.yaml`/`.yml` file of a source is one resource. Nested
 * directories are not searched.
 */

import type { FileEntry, FileSystem } from '@projectkit/core'
import { ContextError, ResourceReadError } from '@projectkit/core'

import type { ResourceDefinition, ResourceLoader } from './resource-loader.js'
import { parseResourceYaml, validateResource } from './yaml.js'

const YAML_EXTENSIONS = ['.yaml', '.yml']

export function isYamlFile(entry: FileEntry): boolean {
  if (entry.isDirectory) return false
  const name = entry.name.toLowerCase()
  return YAML_EXTENSIONS.some((ext) => name.endsWith(ext))
}

/**
 * List the entries at the root of a source.
 *
 * @throws ContextError ('read directory') when listing fails
 */
export async function readRootEntries(fs: FileSystem): Promise<FileEntry[]> {
  try {
    return await fs.readDir('')
  } catch (err) {
    throw new ContextError('read directory', err)
  }
}

export class FlatFileResourceLoader<T> implements ResourceLoader<T> {
  private readonly definition: ResourceDefinition<T>

  constructor(definition: ResourceDefinition<T>) {
    this.definition = definition
  }

  /**
   * Load every resource file in listing order.
   *
   * @throws the definition's NoResourcesFoundError when there is no file
   * @throws ResourceReadError, ResourceParseError or ResourceValidationError
   *   for the first file that fails
   */
  async load(fs: FileSystem): Promise<T[]> {
    const { kind, validate, noneFound } = this.definition

    const files = (await readRootEntries(fs)).filter(isYamlFile).map((entry) => entry.name)
    if (files.length === 0) {
      throw noneFound()
    }

    const resources: T[] = []
    for (const file of files) {
      let content: Buffer
      try {
        content = await fs.readFile(file)
      } catch (err) {
        throw new ResourceReadError(kind, file, err)
      }
      const parsed = parseResourceYaml(kind, file, content)
      resources.push(validateResource(kind, file, parsed, validate))
    }
    return resources
  }
}
