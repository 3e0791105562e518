export { MemoryFileSystem } from './memory-fs.js'
export { NodeFileSystem } from './node-fs.js'
export { joinRelative, normalizeRelative } from './paths.js'
export { ReadOnlyFileSystem } from './read-only-fs.js'
export type { FileEntry, FileSystem } from './types.js'
