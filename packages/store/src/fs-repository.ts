/**
 * Filesystem-backed repository
 *
 * One JSON file per resource in a single directory. File names carry no
 * meaning on read: getAll() returns every stored resource ordered by its
 * identity. A ReadWriteLock per instance lets reads overlap while writes run
 * alone; there is no per-file locking and no cross-process locking here.
 */

import { randomUUID } from 'node:crypto'
import type { FileEntry, FileSystem, StoredResourceKind, ValidationResult } from '@projectkit/core'
import {
  hasErrorCode,
  ReadWriteLock,
  RepositoryReadError,
  ResourceValidationError,
} from '@projectkit/core'

export const STORED_FILE_EXTENSION = '.json'

/** Converts one kind of resource to and from its stored JSON form */
export interface RepositoryCodec<T> {
  kind: StoredResourceKind
  /** Sort key, and the key duplicate checks compare */
  identify(resource: T): string
  encode(resource: T): unknown
  decode(data: unknown): ValidationResult<T>
}

/** A stored resource and the file it came from */
export interface StoredEntry<T> {
  file: string
  identity: string
  resource: T
}

export function isStoredFile(entry: FileEntry): boolean {
  return !entry.isDirectory && entry.name.toLowerCase().endsWith(STORED_FILE_EXTENSION)
}

function compareIdentity<T>(a: StoredEntry<T>, b: StoredEntry<T>): number {
  return a.identity < b.identity ? -1 : a.identity > b.identity ? 1 : 0
}

export class FsRepository<T> {
  protected readonly fs: FileSystem
  protected readonly codec: RepositoryCodec<T>
  private readonly lock = new ReadWriteLock()

  constructor(fs: FileSystem, codec: RepositoryCodec<T>) {
    this.fs = fs
    this.codec = codec
  }

  /**
   * Every stored resource, sorted ascending by identity.
   *
   * @throws RepositoryReadError naming the first file that cannot be read,
   *   parsed or validated
   */
  async getAll(): Promise<T[]> {
    const entries = await this.withReadLock(() => this.readEntries())
    return entries.map((entry) => entry.resource)
  }

  /**
   * Delete every stored resource. Safe on an empty or missing directory.
   */
  async removeAll(): Promise<void> {
    await this.withWriteLock(async () => {
      for (const file of await this.listStoredFiles()) {
        await this.fs.remove(file)
      }
    })
  }

  protected withReadLock<R>(fn: () => Promise<R>): Promise<R> {
    return this.lock.withReadLock(fn)
  }

  protected withWriteLock<R>(fn: () => Promise<R>): Promise<R> {
    return this.lock.withWriteLock(fn)
  }

  // ==========================================================================
  // Unlocked helpers; callers hold the lock
  // ==========================================================================

  protected async listStoredFiles(): Promise<string[]> {
    let entries: FileEntry[]
    try {
      entries = await this.fs.readDir('')
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) {
        return []
      }
      throw new RepositoryReadError('.', err)
    }
    return entries.filter(isStoredFile).map((entry) => entry.name)
  }

  protected async readEntries(): Promise<StoredEntry<T>[]> {
    const entries: StoredEntry<T>[] = []
    for (const file of await this.listStoredFiles()) {
      const resource = await this.readStored(file)
      entries.push({ file, identity: this.codec.identify(resource), resource })
    }
    return entries.sort(compareIdentity)
  }

  protected async readStored(file: string): Promise<T> {
    let data: unknown
    try {
      data = JSON.parse((await this.fs.readFile(file)).toString('utf-8'))
    } catch (err) {
      throw new RepositoryReadError(file, err)
    }

    const result = this.codec.decode(data)
    if (!result.valid) {
      throw new RepositoryReadError(
        file,
        new ResourceValidationError(this.codec.kind, file, result.errors)
      )
    }
    return result.data
  }

  protected async writeStored(file: string, resource: T): Promise<void> {
    await this.fs.writeFile(file, `${JSON.stringify(this.codec.encode(resource), null, 2)}\n`)
  }

  /** Store a resource under a fresh file name */
  protected async insert(resource: T): Promise<void> {
    await this.writeStored(`${randomUUID()}${STORED_FILE_EXTENSION}`, resource)
  }
}
