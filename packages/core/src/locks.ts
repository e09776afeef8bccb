/**
 * Cross-process file locking for toolcache
 *
 * Uses proper-lockfile for reliable file locking across platforms.
 * The store itself never takes a global lock; locks guard the few
 * files several processes append to (team usage logs).
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import lockfile from 'proper-lockfile'

import { LockError, LockTimeoutError } from './errors.js'

/** Lock options */
export interface LockOptions {
  /** Give up after this many milliseconds (default: 30000) */
  timeout?: number | undefined
  /** Treat a lock older than this as abandoned, in milliseconds (default: 10000) */
  stale?: number | undefined
}

const RETRY_INTERVAL_MS = 100

/** Lock release function */
export type ReleaseFn = () => Promise<void>

/** Lock handle returned by lock acquisition */
export interface LockHandle {
  release: ReleaseFn
  /** Path that is locked */
  path: string
}

/**
 * Ensure a file exists (create empty if needed) for locking
 */
async function ensureLockFile(lockPath: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(lockPath), { recursive: true })
  // 'a' creates the file without truncating an existing one
  const handle = await fs.promises.open(lockPath, 'a')
  await handle.close()
}

/**
 * Acquire a lock on a file
 *
 * @param lockPath - Path to lock (will create if needed)
 * @throws LockTimeoutError if lock cannot be acquired within timeout
 * @throws LockError for other lock failures
 */
export async function acquireLock(lockPath: string, options: LockOptions = {}): Promise<LockHandle> {
  const timeout = options.timeout ?? 30000
  const stale = options.stale ?? 10000

  await ensureLockFile(lockPath)

  try {
    const release = await lockfile.lock(lockPath, {
      stale,
      retries: {
        retries: Math.max(0, Math.ceil(timeout / RETRY_INTERVAL_MS)),
        minTimeout: RETRY_INTERVAL_MS,
        maxTimeout: RETRY_INTERVAL_MS * 2,
        factor: 1,
      },
    })

    return {
      release: async () => {
        try {
          await release()
        } catch (err) {
          // Already released or compromised locks are not an error for the caller
          if (
            err instanceof Error &&
            !err.message.includes('not acquired') &&
            !err.message.includes('already released')
          ) {
            throw new LockError(`Failed to release lock: ${err.message}`, lockPath)
          }
        }
      },
      path: lockPath,
    }
  } catch (err) {
    if (err instanceof Error) {
      if (err.message.includes('ELOCKED') || err.message.includes('already being held')) {
        throw new LockTimeoutError(lockPath, timeout)
      }
      throw new LockError(err.message, lockPath)
    }
    throw new LockError(String(err), lockPath)
  }
}

/**
 * Check if a file is currently locked
 */
export async function isLocked(lockPath: string): Promise<boolean> {
  try {
    await fs.promises.access(lockPath)
  } catch {
    return false
  }
  return lockfile.check(lockPath)
}

/**
 * Execute a function with a lock held
 *
 * @returns Result of the function
 */
export async function withLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const handle = await acquireLock(lockPath, options)
  try {
    return await fn()
  } finally {
    await handle.release()
  }
}
