import type { FileSystem } from '@projectkit/core'
import {
  EmptySourcePathError,
  SourcePathCheckError,
  SourcePathNotFoundError,
  UnsupportedSchemeError,
} from '@projectkit/core'
import type { Driver } from '@projectkit/source'

export const RULEBOOK_SCHEME = 'rulebook'

const RULEBOOK_PREFIX = `${RULEBOOK_SCHEME}://`

/**
 * Resolves `rulebook://<path>` to a directory inside one rulebook.
 *
 * Paths are relative to the rulebook root and cannot leave it.
 */
export class RulebookDriver implements Driver {
  private readonly rulebookFs: FileSystem

  constructor(rulebookFs: FileSystem) {
    this.rulebookFs = rulebookFs
  }

  getSupportedSchemes(): readonly string[] {
    return [RULEBOOK_SCHEME]
  }

  async resolve(uri: string): Promise<FileSystem> {
    if (!uri.startsWith(RULEBOOK_PREFIX)) {
      throw new UnsupportedSchemeError(uri)
    }

    const dirPath = uri.slice(RULEBOOK_PREFIX.length)
    if (dirPath === '') {
      throw new EmptySourcePathError(uri)
    }

    let exists: boolean
    try {
      exists = await this.rulebookFs.dirExists(dirPath)
    } catch (err) {
      throw new SourcePathCheckError(dirPath, err)
    }
    if (!exists) {
      throw new SourcePathNotFoundError(dirPath)
    }

    return this.rulebookFs.scope(dirPath).readOnly()
  }
}
