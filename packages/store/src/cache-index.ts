/**
 * Reference → digest index.
 *
 * WHY: Each reference has its own record file, so updating one reference
 * never rewrites state another reference depends on and no global lock
 * is needed. Back-link files under `index/digests/` answer "which
 * references share this blob" without scanning every record.
 */

import { readFile, readdir, rm, writeFile } from 'node:fs/promises'
import {
  type ArtifactReference,
  type CacheEntry,
  type Digest,
  type Logger,
  atomicWriteJson,
  createLogger,
  errnoCode,
  formatReference,
  isTmpName,
  repositoryOf,
  validateCacheEntry,
} from '@toolcache/core'

import { type PathResolver, decodeRefKey, ensureDir } from './paths.js'

export interface CacheIndexOptions {
  paths: PathResolver
  logger?: Logger | undefined
}

function keyOf(ref: ArtifactReference | string): string {
  return typeof ref === 'string' ? ref : formatReference(ref)
}

/**
 * Metadata index over the digest store.
 */
export class CacheIndex {
  readonly paths: PathResolver
  private readonly log: Logger

  constructor(options: CacheIndexOptions) {
    this.paths = options.paths
    this.log = options.logger ?? createLogger('cache-index')
  }

  /**
   * Read the record for a reference.
   *
   * Unreadable or malformed records are reported and treated as absent.
   */
  async get(ref: ArtifactReference | string): Promise<CacheEntry | null> {
    const key = keyOf(ref)
    const recordPath = this.paths.refRecord(key)

    let content: string
    try {
      content = await readFile(recordPath, 'utf8')
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return null
      }
      throw err
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch {
      this.log.warn('Ignoring unreadable index record', { ref: key, path: recordPath })
      return null
    }

    const result = validateCacheEntry(parsed)
    if (!result.valid || formatReference(result.data.reference) !== key) {
      this.log.warn('Ignoring invalid index record', { ref: key, path: recordPath })
      return null
    }
    return result.data
  }

  /**
   * Write (or replace) the record for an entry's reference.
   *
   * The back-link is written before the record, so a record is never
   * visible without its back-link.
   */
  async put(entry: CacheEntry): Promise<void> {
    const key = formatReference(entry.reference)
    const previous = await this.get(key)

    const linkPath = this.paths.digestLink(entry.digest, key)
    await ensureDir(this.paths.digestLinks(entry.digest))
    await writeFile(linkPath, `${key}\n`)

    await atomicWriteJson(this.paths.refRecord(key), entry, { tmpDir: this.paths.temp })

    if (previous && previous.digest !== entry.digest) {
      await rm(this.paths.digestLink(previous.digest, key), { force: true })
    }
  }

  /**
   * Update lastAccessedAt. Returns the updated entry, or null if absent.
   */
  async touch(ref: ArtifactReference | string, at: Date = new Date()): Promise<CacheEntry | null> {
    const entry = await this.get(ref)
    if (!entry) {
      return null
    }
    const updated: CacheEntry = { ...entry, lastAccessedAt: at.toISOString() }
    await atomicWriteJson(this.paths.refRecord(keyOf(ref)), updated, {
      tmpDir: this.paths.temp,
      fsync: false,
    })
    return updated
  }

  /**
   * Remove a reference's record and back-link. Returns the removed entry.
   */
  async remove(ref: ArtifactReference | string): Promise<CacheEntry | null> {
    const key = keyOf(ref)
    const entry = await this.get(key)
    await rm(this.paths.refRecord(key), { force: true })
    if (entry) {
      await rm(this.paths.digestLink(entry.digest, key), { force: true })
    }
    return entry
  }

  /**
   * References whose current record points at the digest.
   */
  async referencesFor(digest: Digest): Promise<string[]> {
    let names: string[]
    try {
      names = await readdir(this.paths.digestLinks(digest))
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return []
      }
      throw err
    }

    const refs: string[] = []
    for (const name of names.sort()) {
      const ref = decodeRefKey(name)
      const entry = await this.get(ref)
      if (entry?.digest === digest) {
        refs.push(ref)
      }
    }
    return refs
  }

  /**
   * Every readable record, ordered by reference.
   */
  async list(): Promise<CacheEntry[]> {
    let names: string[]
    try {
      names = await readdir(this.paths.refIndex)
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return []
      }
      throw err
    }

    const entries: CacheEntry[] = []
    for (const name of names.sort()) {
      if (isTmpName(name) || !name.endsWith('.json')) continue
      const entry = await this.get(decodeRefKey(name.slice(0, -'.json'.length)))
      if (entry) {
        entries.push(entry)
      }
    }
    return entries
  }

  /**
   * Records for one repository (`ecosystem/namespace/name`).
   */
  async listRepository(repository: string): Promise<CacheEntry[]> {
    const entries = await this.list()
    return entries.filter((entry) => repositoryOf(entry.reference) === repository)
  }
}
