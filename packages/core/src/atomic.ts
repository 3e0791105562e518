/**
 * Atomic file replacement for NodeFileSystem.writeFile
 *
 * A reader of a repository file sees either the old content or the new one,
 * never a half-written file.
 */

import { randomUUID } from 'node:crypto'
import * as fs from 'node:fs'
import * as path from 'node:path'

/** Temporary sibling of the target; same directory, so rename stays on one device */
export function tempPathFor(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`)
}

/**
 * Write `content` to a temporary sibling, flush it, and rename it over
 * `filePath`. Parent directories are created.
 */
export async function writeFileAtomically(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true })

  const tmpPath = tempPathFor(filePath)
  try {
    const handle = await fs.promises.open(tmpPath, 'wx')
    try {
      await handle.writeFile(content)
      await handle.sync()
    } finally {
      await handle.close()
    }
    await fs.promises.rename(tmpPath, filePath)
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true })
    throw err
  }
}
