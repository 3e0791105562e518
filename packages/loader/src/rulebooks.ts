/**
 * Rulebook loader
 *
 * A rulebook bundles resources of several kinds under one directory. Its
 * rulebook.yaml lists, per kind, `rulebook://` sources relative to that
 * directory; each list is loaded like a project's own sources.
 */

import type {
  FileSystem,
  Logger,
  Rulebook,
  RulebookMetadata,
  SourceConfig,
} from '@projectkit/core'
import {
  hasErrorCode,
  noopLogger,
  ResourceReadError,
  RulebookMetadataMissingError,
  validateRulebookMetadata,
} from '@projectkit/core'
import { DriverRegistry, Resolver } from '@projectkit/source'

import { loadFromSources } from './aggregate.js'
import type { ResourceLoader } from './resource-loader.js'
import type { ResourceLoaders } from './resources.js'
import { createResourceLoaders } from './resources.js'
import { RulebookDriver } from './rulebook-driver.js'
import { parseResourceYaml, validateResource } from './yaml.js'

export const RULEBOOK_METADATA_FILE = 'rulebook.yaml'

export interface RulebookLoaderOptions {
  loaders?: ResourceLoaders
  logger?: Logger
}

function sourcesOf(config: SourceConfig | undefined): SourceConfig['sources'] {
  return config?.sources ?? []
}

export class RulebookLoader implements ResourceLoader<Rulebook> {
  private readonly loaders: ResourceLoaders
  private readonly logger: Logger

  constructor(options: RulebookLoaderOptions = {}) {
    this.loaders = options.loaders ?? createResourceLoaders()
    this.logger = options.logger ?? noopLogger
  }

  /**
   * Read and validate rulebook.yaml
   *
   * @throws RulebookMetadataMissingError if the file does not exist
   */
  async loadMetadata(fs: FileSystem): Promise<RulebookMetadata> {
    let content: Buffer
    try {
      content = await fs.readFile(RULEBOOK_METADATA_FILE)
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        throw new RulebookMetadataMissingError(RULEBOOK_METADATA_FILE)
      }
      throw new ResourceReadError('rulebook', RULEBOOK_METADATA_FILE, err)
    }

    const parsed = parseResourceYaml('rulebook', RULEBOOK_METADATA_FILE, content)
    // An empty rulebook.yaml declares no sources
    return validateResource(
      'rulebook',
      RULEBOOK_METADATA_FILE,
      parsed ?? {},
      validateRulebookMetadata
    )
  }

  /**
   * Load one rulebook. Kinds without sources come back empty.
   */
  async loadRulebook(fs: FileSystem): Promise<Rulebook> {
    const metadata = await this.loadMetadata(fs)

    const registry = new DriverRegistry()
    registry.registerDriver(new RulebookDriver(fs))
    const resolver = new Resolver(registry)
    const options = { logger: this.logger }

    return {
      ai: {
        instructions: await loadFromSources(
          sourcesOf(metadata.ai?.instruction),
          resolver,
          this.loaders.instructions,
          options
        ),
        skills: await loadFromSources(
          sourcesOf(metadata.ai?.skill),
          resolver,
          this.loaders.skills,
          options
        ),
        workflows: await loadFromSources(
          sourcesOf(metadata.ai?.workflow),
          resolver,
          this.loaders.workflows,
          options
        ),
        mcpServers: await loadFromSources(
          sourcesOf(metadata.ai?.mcp),
          resolver,
          this.loaders.mcpServers,
          options
        ),
      },
      doc: {
        standards: await loadFromSources(
          sourcesOf(metadata.doc?.standard),
          resolver,
          this.loaders.standards,
          options
        ),
      },
    }
  }

  /** A source holds exactly one rulebook, at its root */
  async load(fs: FileSystem): Promise<Rulebook[]> {
    return [await this.loadRulebook(fs)]
  }
}
