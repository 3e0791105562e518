/**
 * Config-driven aggregation: resolve each configured source, load it, and
 * concatenate the results in source order.
 */

import type { FileSystem, Logger, SourceRef } from '@projectkit/core'
import { noopLogger, SourceLoadError } from '@projectkit/core'
import type { SourceResolver } from '@projectkit/source'

import type { ResourceLoader } from './resource-loader.js'

export interface LoadFromSourcesOptions {
  logger?: Logger
}

/**
 * Load resources from every source, in order.
 *
 * Zero sources yield an empty list. The first failure stops the walk: later
 * sources are never resolved and nothing loaded so far is returned.
 *
 * @throws SourceLoadError with stage 'resolve' or 'load', naming the URI
 */
export async function loadFromSources<T>(
  sources: readonly SourceRef[],
  resolver: SourceResolver,
  loader: ResourceLoader<T>,
  options: LoadFromSourcesOptions = {}
): Promise<T[]> {
  const logger = options.logger ?? noopLogger
  const result: T[] = []

  for (const { uri } of sources) {
    let fs: FileSystem
    try {
      fs = await resolver.resolve(uri)
    } catch (err) {
      throw new SourceLoadError(uri, 'resolve', err)
    }

    let loaded: T[]
    try {
      loaded = await loader.load(fs)
    } catch (err) {
      throw new SourceLoadError(uri, 'load', err)
    }

    logger.debug('Source loaded.', { uri, count: loaded.length })
    result.push(...loaded)
  }

  return result
}
