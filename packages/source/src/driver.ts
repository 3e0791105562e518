import type { FileSystem } from '@projectkit/core'

/**
 * Source driver: turns URIs of the schemes it supports into a filesystem.
 *
 * Drivers hold no mutable state beyond their root filesystem, so one
 * instance may be registered for several schemes and called concurrently.
 */
export interface Driver {
  /** Schemes this driver resolves, without the `://` separator */
  getSupportedSchemes(): readonly string[]
  /** Resolve a full URI (scheme included) to a read-only filesystem */
  resolve(uri: string): Promise<FileSystem>
}

/** Anything that can resolve a source URI */
export interface SourceResolver {
  resolve(uri: string): Promise<FileSystem>
}

/** Separator between a URI's scheme and its opaque part */
export const SCHEME_SEPARATOR = '://'
