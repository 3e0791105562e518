import { ReadOnlyFileSystemError } from '../errors.js'
import type { FileEntry, FileSystem } from './types.js'

/**
 * Read-only view over another FileSystem. Writes reject with
 * ReadOnlyFileSystemError (code EROFS).
 */
export class ReadOnlyFileSystem implements FileSystem {
  private readonly inner: FileSystem

  constructor(inner: FileSystem) {
    this.inner = inner
  }

  readDir(p: string): Promise<FileEntry[]> {
    return this.inner.readDir(p)
  }

  readFile(p: string): Promise<Buffer> {
    return this.inner.readFile(p)
  }

  async writeFile(p: string): Promise<void> {
    throw new ReadOnlyFileSystemError('write', p)
  }

  async remove(p: string): Promise<void> {
    throw new ReadOnlyFileSystemError('remove', p)
  }

  async mkdir(p: string): Promise<void> {
    throw new ReadOnlyFileSystemError('mkdir', p)
  }

  exists(p: string): Promise<boolean> {
    return this.inner.exists(p)
  }

  dirExists(p: string): Promise<boolean> {
    return this.inner.dirExists(p)
  }

  scope(subPath: string): FileSystem {
    return new ReadOnlyFileSystem(this.inner.scope(subPath))
  }

  readOnly(): FileSystem {
    return this
  }
}
