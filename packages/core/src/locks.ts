/**
 * Project lock
 *
 * Uses proper-lockfile. The lock keeps two `update` runs from rewriting the
 * same repositories at once.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import lockfile from 'proper-lockfile'

import { LockError, LockTimeoutError, hasErrorCode } from './errors.js'

/** Directory under the project root holding projectkit state */
export const PROJECTKIT_DIR = '.projectkit'

/** Lock file names */
export const LOCK_FILES = {
  /** Held while `update` rewrites the repositories */
  UPDATE: 'update.lock',
} as const

/** Lock options */
export interface LockOptions {
  /** How long to wait for a held lock, in milliseconds (default: 30000) */
  timeout?: number
  /** Age in milliseconds after which an abandoned lock is taken over (default: 10000) */
  stale?: number
}

const DEFAULT_TIMEOUT = 30000
const DEFAULT_STALE = 10000

/** Delay between attempts while the lock is held elsewhere */
export const LOCK_RETRY_INTERVAL = 100

/**
 * Number of retries that spends `timeout` waiting at a fixed interval.
 */
export function retriesFor(timeout: number): number {
  return Math.max(0, Math.ceil(timeout / LOCK_RETRY_INTERVAL))
}

/**
 * Get the project lock file path: <project-root>/.projectkit/update.lock
 */
export function getProjectLockPath(projectRoot: string): string {
  return path.join(projectRoot, PROJECTKIT_DIR, LOCK_FILES.UPDATE)
}

/**
 * Create the lock target (and its directory) if it is missing
 */
async function ensureLockFile(lockPath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(lockPath), { recursive: true })
  // 'a' creates without truncating an existing file
  const handle = await fs.promises.open(lockPath, 'a')
  await handle.close()
}

/**
 * @throws LockTimeoutError if the lock is still held after `timeout`
 * @throws LockError for other lock failures
 */
async function acquire(
  lockPath: string,
  timeout: number,
  stale: number
): Promise<() => Promise<void>> {
  await ensureLockFile(lockPath)
  try {
    return await lockfile.lock(lockPath, {
      stale,
      retries: {
        retries: retriesFor(timeout),
        minTimeout: LOCK_RETRY_INTERVAL,
        maxTimeout: LOCK_RETRY_INTERVAL,
        factor: 1,
      },
    })
  } catch (err) {
    if (hasErrorCode(err, 'ELOCKED')) {
      throw new LockTimeoutError(lockPath, timeout)
    }
    throw new LockError(err instanceof Error ? err.message : String(err), lockPath)
  }
}

/**
 * Execute a function with the project lock held. The lock is released when
 * the function settles, whether it resolves or throws.
 */
export async function withProjectLock<T>(
  projectRoot: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const lockPath = getProjectLockPath(projectRoot)
  const release = await acquire(
    lockPath,
    options.timeout ?? DEFAULT_TIMEOUT,
    options.stale ?? DEFAULT_STALE
  )
  try {
    return await fn()
  } finally {
    try {
      await release()
    } catch (err) {
      // A compromised lock was already released by proper-lockfile
      if (!hasErrorCode(err, 'ERELEASED')) {
        throw new LockError(
          `Failed to release lock: ${err instanceof Error ? err.message : String(err)}`,
          lockPath
        )
      }
    }
  }
}
