/**
 * In-process FileSystem.
 *
 * Scoped views share one store with the filesystem they were scoped from, so
 * writes through a scope are visible at the root and the other way around.
 */

import { FileSystemError } from '../errors.js'
import { joinRelative, normalizeRelative } from './paths.js'
import { ReadOnlyFileSystem } from './read-only-fs.js'
import type { FileEntry, FileSystem } from './types.js'

interface MemoryStore {
  files: Map<string, Buffer>
  /** Every directory except the root, which always exists */
  dirs: Set<string>
}

function parentOf(key: string): string {
  const idx = key.lastIndexOf('/')
  return idx === -1 ? '' : key.slice(0, idx)
}

function ancestorsOf(key: string): string[] {
  const result: string[] = []
  let current = parentOf(key)
  while (current !== '') {
    result.unshift(current)
    current = parentOf(current)
  }
  return result
}

export class MemoryFileSystem implements FileSystem {
  private store: MemoryStore = { files: new Map(), dirs: new Set() }
  private root = ''

  /**
   * @param files - Initial files keyed by path; parent directories are created
   */
  constructor(files: Record<string, string | Buffer> = {}) {
    for (const [p, content] of Object.entries(files)) {
      this.put(this.key(p), content, p)
    }
  }

  async readDir(p: string): Promise<FileEntry[]> {
    const key = this.key(p)
    if (this.store.files.has(key)) {
      throw new FileSystemError('ENOTDIR', 'readdir', p)
    }
    if (!this.isDir(key)) {
      throw new FileSystemError('ENOENT', 'readdir', p)
    }

    const entries: FileEntry[] = []
    for (const dir of this.store.dirs) {
      if (dir !== key && parentOf(dir) === key) {
        entries.push({ name: this.childName(key, dir), isDirectory: true })
      }
    }
    for (const file of this.store.files.keys()) {
      if (parentOf(file) === key) {
        entries.push({ name: this.childName(key, file), isDirectory: false })
      }
    }
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  async readFile(p: string): Promise<Buffer> {
    const key = this.key(p)
    const content = this.store.files.get(key)
    if (content === undefined) {
      throw new FileSystemError(this.isDir(key) ? 'EISDIR' : 'ENOENT', 'read', p)
    }
    return Buffer.from(content)
  }

  async writeFile(p: string, content: string | Buffer): Promise<void> {
    this.put(this.key(p), content, p)
  }

  async remove(p: string): Promise<void> {
    const key = this.key(p)
    const prefix = key === '' ? '' : `${key}/`
    this.store.files.delete(key)
    this.store.dirs.delete(key)
    for (const file of [...this.store.files.keys()]) {
      if (file.startsWith(prefix)) this.store.files.delete(file)
    }
    for (const dir of [...this.store.dirs]) {
      if (dir.startsWith(prefix)) this.store.dirs.delete(dir)
    }
  }

  async mkdir(p: string): Promise<void> {
    const key = this.key(p)
    if (key === '') return
    for (const dir of [...ancestorsOf(key), key]) {
      if (this.store.files.has(dir)) {
        throw new FileSystemError(dir === key ? 'EEXIST' : 'ENOTDIR', 'mkdir', p)
      }
    }
    for (const dir of [...ancestorsOf(key), key]) {
      this.store.dirs.add(dir)
    }
  }

  async exists(p: string): Promise<boolean> {
    const key = this.key(p)
    return this.store.files.has(key) || this.isDir(key)
  }

  async dirExists(p: string): Promise<boolean> {
    return this.isDir(this.key(p))
  }

  scope(subPath: string): FileSystem {
    const scoped = new MemoryFileSystem()
    scoped.store = this.store
    scoped.root = this.key(subPath)
    return scoped
  }

  readOnly(): FileSystem {
    return new ReadOnlyFileSystem(this)
  }

  private key(p: string): string {
    return joinRelative(this.root, normalizeRelative(p))
  }

  private isDir(key: string): boolean {
    return key === '' || this.store.dirs.has(key)
  }

  private childName(dirKey: string, childKey: string): string {
    return dirKey === '' ? childKey : childKey.slice(dirKey.length + 1)
  }

  private put(key: string, content: string | Buffer, p: string): void {
    if (key === '' || this.store.dirs.has(key)) {
      throw new FileSystemError('EISDIR', 'write', p)
    }
    const parents = ancestorsOf(key)
    if (parents.some((dir) => this.store.files.has(dir))) {
      throw new FileSystemError('ENOTDIR', 'write', p)
    }
    for (const dir of parents) {
      this.store.dirs.add(dir)
    }
    this.store.files.set(
      key,
      typeof content === 'string' ? Buffer.from(content, 'utf-8') : Buffer.from(content)
    )
  }
}
