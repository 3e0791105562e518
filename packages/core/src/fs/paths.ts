import * as path from 'node:path'

/**
 * Normalize a path relative to a filesystem root.
 *
 * Returns '' for the root itself, otherwise a relative POSIX path with no `.`
 * or `..` segments. `..` above the root stays at the root.
 */
export function normalizeRelative(p: string): string {
  const normalized = path.posix.normalize(`/${p.replaceAll('\\', '/')}`)
  return normalized === '/' ? '' : normalized.slice(1).replace(/\/$/, '')
}

/** Join two root-relative paths */
export function joinRelative(base: string, p: string): string {
  return normalizeRelative(base === '' ? p : `${base}/${p}`)
}
