/**
 * Resolver - dispatches source URIs to the driver registered for their scheme
 */

import type { FileSystem } from '@projectkit/core'
import { ContextError, SourceResolveError, UriSchemeNotFoundError } from '@projectkit/core'

import type { Driver, SourceResolver } from './driver.js'
import { SCHEME_SEPARATOR } from './driver.js'
import type { DriverRegistry } from './registry.js'

/**
 * Extract the scheme of a URI: everything before the first `://`.
 *
 * @throws UriSchemeNotFoundError if the URI has no `://`
 */
export function parseScheme(uri: string): string {
  const idx = uri.indexOf(SCHEME_SEPARATOR)
  if (idx === -1) {
    throw new UriSchemeNotFoundError(uri)
  }
  return uri.slice(0, idx)
}

export class Resolver implements SourceResolver {
  private readonly registry: DriverRegistry

  constructor(registry: DriverRegistry) {
    this.registry = registry
  }

  /**
   * Resolve a URI through the driver registered for its scheme.
   *
   * The driver receives the whole URI, not just the part after the scheme.
   *
   * @throws UriSchemeNotFoundError if the URI has no scheme
   * @throws ContextError wrapping SchemeDriverNotRegisteredError if no driver
   *   claims the scheme
   * @throws SourceResolveError wrapping whatever the driver threw
   */
  async resolve(uri: string): Promise<FileSystem> {
    const scheme = parseScheme(uri)

    let driver: Driver
    try {
      driver = this.registry.getDriverByScheme(scheme)
    } catch (err) {
      throw new ContextError('get driver by scheme', err)
    }

    try {
      return await driver.resolve(uri)
    } catch (err) {
      throw new SourceResolveError(uri, err)
    }
  }
}
