/**
 * LocalDriver - resolves `local://<path>` to a read-only view of a host
 * directory
 */

import * as path from 'node:path'
import type { FileSystem } from '@projectkit/core'
import {
  EmptySourcePathError,
  NodeFileSystem,
  SourcePathCheckError,
  SourcePathNotFoundError,
  UnsupportedSchemeError,
} from '@projectkit/core'

import type { Driver } from './driver.js'

export const LOCAL_SCHEME = 'local'

const LOCAL_PREFIX = `${LOCAL_SCHEME}://`

export interface LocalDriverOptions {
  /** Filesystem rooted at the host root (default: the host filesystem) */
  rootFs?: FileSystem
  /** Directory relative paths are taken from (default: the working directory) */
  baseDir?: string
}

export class LocalDriver implements Driver {
  private readonly rootFs: FileSystem
  private readonly baseDir: string

  constructor(options: LocalDriverOptions = {}) {
    this.rootFs = options.rootFs ?? new NodeFileSystem(path.parse(process.cwd()).root)
    this.baseDir = options.baseDir ?? process.cwd()
  }

  getSupportedSchemes(): readonly string[] {
    return [LOCAL_SCHEME]
  }

  /**
   * @throws UnsupportedSchemeError if the URI does not start with `local://`
   * @throws EmptySourcePathError if nothing follows the scheme
   * @throws SourcePathCheckError if the existence check itself fails
   * @throws SourcePathNotFoundError if the path is not a directory
   */
  async resolve(uri: string): Promise<FileSystem> {
    if (!uri.startsWith(LOCAL_PREFIX)) {
      throw new UnsupportedSchemeError(uri)
    }

    const rawPath = uri.slice(LOCAL_PREFIX.length)
    if (rawPath === '') {
      throw new EmptySourcePathError(uri)
    }

    const dirPath = path.resolve(this.baseDir, rawPath)

    let exists: boolean
    try {
      exists = await this.rootFs.dirExists(dirPath)
    } catch (err) {
      throw new SourcePathCheckError(dirPath, err)
    }
    if (!exists) {
      throw new SourcePathNotFoundError(dirPath)
    }

    return this.rootFs.scope(dirPath).readOnly()
  }
}
