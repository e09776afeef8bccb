/**
 * Atomic file write utilities for toolcache
 *
 * Provides crash-safe file writes by writing to a temporary file
 * and then atomically renaming to the target path. Readers observe
 * either the previous content or the complete new content, never a
 * partial file.
 */

import * as crypto from 'node:crypto'
import * as fs from 'node:fs'
import * as path from 'node:path'

/** Options for atomic write operations */
export interface AtomicWriteOptions {
  /** File mode (default: 0o644) */
  mode?: number | undefined
  /** Temporary file suffix (default: .tmp) */
  tmpSuffix?: string | undefined
  /** Whether to fsync before rename (default: true for durability) */
  fsync?: boolean | undefined
  /**
   * Directory for the temporary file (default: the target's directory).
   * Must be on the same filesystem as the target for rename to be atomic.
   */
  tmpDir?: string | undefined
}

/**
 * Generate a unique temporary file path
 */
export function getTmpPath(targetPath: string, suffix = '.tmp', tmpDir?: string): string {
  const dir = tmpDir ?? path.dirname(targetPath)
  const base = path.basename(targetPath)
  const rand = crypto.randomBytes(6).toString('hex')
  return path.join(dir, `.${base}.${rand}${suffix}`)
}

/** True for names produced by getTmpPath */
export function isTmpName(name: string): boolean {
  return name.startsWith('.') && name.endsWith('.tmp')
}

/**
 * Write content to a file atomically
 *
 * @param filePath - Target file path
 * @param content - Content to write (string or Buffer)
 * @param options - Write options
 */
export async function atomicWrite(
  filePath: string,
  content: string | Uint8Array,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const mode = options.mode ?? 0o644
  const fsync = options.fsync ?? true

  await fs.promises.mkdir(path.dirname(filePath), { recursive: true })
  if (options.tmpDir) {
    await fs.promises.mkdir(options.tmpDir, { recursive: true })
  }

  const tmpPath = getTmpPath(filePath, options.tmpSuffix ?? '.tmp', options.tmpDir)

  try {
    await fs.promises.writeFile(tmpPath, content, { mode })
    // writeFile honours the umask; chmod makes the mode exact
    await fs.promises.chmod(tmpPath, mode)

    if (fsync) {
      const fd = await fs.promises.open(tmpPath, 'r')
      try {
        await fd.sync()
      } finally {
        await fd.close()
      }
    }

    await fs.promises.rename(tmpPath, filePath)
  } catch (err) {
    await fs.promises.rm(tmpPath, { force: true })
    throw err
  }
}

/**
 * Write JSON content to a file atomically (pretty-printed)
 *
 * @param filePath - Target file path
 * @param data - Data to serialize as JSON
 * @param options - Write options
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const content = `${JSON.stringify(data, null, 2)}\n`
  await atomicWrite(filePath, content, options)
}
