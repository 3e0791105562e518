/**
 * FileSystem backed by a directory on the host.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'

import { writeFileAtomically } from '../atomic.js'
import { hasErrorCode } from '../errors.js'
import { normalizeRelative } from './paths.js'
import { ReadOnlyFileSystem } from './read-only-fs.js'
import type { FileEntry, FileSystem } from './types.js'

export class NodeFileSystem implements FileSystem {
  /** Absolute host directory every path is relative to */
  readonly rootDir: string

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir)
  }

  /** Host path for a root-relative path */
  resolvePath(p: string): string {
    return path.join(this.rootDir, normalizeRelative(p))
  }

  async readDir(p: string): Promise<FileEntry[]> {
    const entries = await fs.promises.readdir(this.resolvePath(p), { withFileTypes: true })
    return entries
      .map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  async readFile(p: string): Promise<Buffer> {
    return fs.promises.readFile(this.resolvePath(p))
  }

  async writeFile(p: string, content: string | Buffer): Promise<void> {
    await writeFileAtomically(this.resolvePath(p), content)
  }

  async remove(p: string): Promise<void> {
    await fs.promises.rm(this.resolvePath(p), { recursive: true, force: true })
  }

  async mkdir(p: string): Promise<void> {
    await fs.promises.mkdir(this.resolvePath(p), { recursive: true })
  }

  async exists(p: string): Promise<boolean> {
    return (await this.stat(p)) !== undefined
  }

  async dirExists(p: string): Promise<boolean> {
    const stats = await this.stat(p)
    return stats?.isDirectory() ?? false
  }

  scope(subPath: string): FileSystem {
    return new NodeFileSystem(this.resolvePath(subPath))
  }

  readOnly(): FileSystem {
    return new ReadOnlyFileSystem(this)
  }

  /** Stat a path; undefined when it (or a parent) does not exist */
  private async stat(p: string): Promise<fs.Stats | undefined> {
    try {
      return await fs.promises.stat(this.resolvePath(p))
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT') || hasErrorCode(err, 'ENOTDIR')) {
        return undefined
      }
      throw err
    }
  }
}
