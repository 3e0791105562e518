/**
 * Abstract filesystem capability.
 *
 * Drivers resolve source URIs to a FileSystem, loaders read resources through
 * it and repositories persist through it. Paths are POSIX-style and relative
 * to the filesystem's root; a leading `/` and `..` segments never leave it.
 */

export interface FileEntry {
  name: string
  isDirectory: boolean
}

export interface FileSystem {
  /** List the entries of a directory */
  readDir(path: string): Promise<FileEntry[]>
  readFile(path: string): Promise<Buffer>
  /** Write a file, creating parent directories as needed */
  writeFile(path: string, content: string | Buffer): Promise<void>
  /** Remove a file or a directory tree; missing paths are not an error */
  remove(path: string): Promise<void>
  /** Create a directory and its parents */
  mkdir(path: string): Promise<void>
  exists(path: string): Promise<boolean>
  dirExists(path: string): Promise<boolean>
  /** A filesystem whose root is the given sub-directory */
  scope(subPath: string): FileSystem
  /** A view of this filesystem that rejects every write */
  readOnly(): FileSystem
}
