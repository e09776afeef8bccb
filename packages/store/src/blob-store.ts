/**
 * Content-addressable blob storage.
 *
 * WHY: Artifact bytes are stored once per digest no matter how many
 * references resolve to them. A blob's path is derived from its digest,
 * so a write of the same bytes lands on the same file and a completed
 * rename is the only way a blob becomes visible.
 */

import { chmod, readFile, readdir, rm, stat, utimes } from 'node:fs/promises'
import { join } from 'node:path'
import {
  CacheCorruptionError,
  type Digest,
  NotFoundError,
  atomicWrite,
  errnoCode,
  isDigest,
  isTmpName,
} from '@toolcache/core'

import { computeDigest, digestFile, verifyDigest } from './digest.js'
import type { PathResolver } from './paths.js'

const HEX_PATTERN = /^[0-9a-f]{64}$/
const FANOUT_PATTERN = /^[0-9a-f]{2}$/

export interface DigestStoreOptions {
  paths: PathResolver
}

export interface PutOptions {
  /** Install the blob with the executable bit (0o755) */
  executable?: boolean | undefined
}

/** A blob as found on disk */
export interface StoredBlob {
  digest: Digest
  sizeBytes: number
  /** Last modification (or touch) time, milliseconds since epoch */
  mtimeMs: number
}

/**
 * Blob storage keyed by digest.
 */
export class DigestStore {
  readonly paths: PathResolver
  /** Open readers per digest; leased blobs are never evicted */
  private readonly leases = new Map<Digest, number>()

  constructor(options: DigestStoreOptions) {
    this.paths = options.paths
  }

  /** Absolute path of a blob (whether or not it exists) */
  path(digest: Digest): string {
    return this.paths.blob(digest)
  }

  /**
   * Store bytes and return their digest.
   *
   * Writing bytes that are already stored only refreshes the blob's
   * access time (and mode, when executable is requested). A stored blob
   * that no longer hashes to its digest is replaced.
   */
  async put(content: Uint8Array, options: PutOptions = {}): Promise<Digest> {
    const digest = computeDigest(content)
    const target = this.path(digest)
    const mode = options.executable ? 0o755 : 0o644

    const existing = await this.stat(digest)
    if (
      existing &&
      existing.sizeBytes === content.byteLength &&
      (await this.withRead(digest, (blobPath) => digestFile(blobPath))) === digest
    ) {
      const now = new Date()
      await utimes(target, now, now)
      if (options.executable) {
        await chmod(target, mode)
      }
      return digest
    }

    await atomicWrite(target, content, { mode, tmpDir: this.paths.temp })
    return digest
  }

  /**
   * Read a blob, verifying it on the way out.
   *
   * @throws NotFoundError if no blob is stored under the digest
   * @throws CacheCorruptionError if the bytes no longer match the digest
   */
  async get(digest: Digest): Promise<Buffer> {
    let content: Buffer
    try {
      content = await this.withRead(digest, (blobPath) => readFile(blobPath))
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new NotFoundError(digest, 'not in store')
      }
      throw err
    }

    const actual = computeDigest(content)
    if (actual !== digest) {
      throw new CacheCorruptionError(digest, actual)
    }
    return content
  }

  async has(digest: Digest): Promise<boolean> {
    return (await this.stat(digest)) !== null
  }

  /** Check bytes against a digest without touching the store */
  verify(digest: Digest, content: Uint8Array): boolean {
    return verifyDigest(digest, content)
  }

  /**
   * Re-hash a stored blob.
   *
   * @throws NotFoundError if no blob is stored under the digest
   * @throws CacheCorruptionError if the bytes no longer match the digest
   */
  async verifyStored(digest: Digest): Promise<void> {
    let actual: Digest
    try {
      actual = await this.withRead(digest, (blobPath) => digestFile(blobPath))
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new NotFoundError(digest, 'not in store')
      }
      throw err
    }
    if (actual !== digest) {
      throw new CacheCorruptionError(digest, actual)
    }
  }

  async stat(digest: Digest): Promise<StoredBlob | null> {
    try {
      const stats = await stat(this.path(digest))
      return { digest, sizeBytes: stats.size, mtimeMs: stats.mtimeMs }
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return null
      }
      throw err
    }
  }

  /**
   * Delete a blob. Returns whether anything was removed.
   */
  async remove(digest: Digest): Promise<boolean> {
    const existed = await this.has(digest)
    await rm(this.path(digest), { force: true })
    return existed
  }

  /**
   * Hold a read lease on a blob while `fn` runs.
   */
  async withRead<T>(digest: Digest, fn: (blobPath: string) => Promise<T>): Promise<T> {
    this.leases.set(digest, (this.leases.get(digest) ?? 0) + 1)
    try {
      return await fn(this.path(digest))
    } finally {
      const remaining = (this.leases.get(digest) ?? 1) - 1
      if (remaining > 0) {
        this.leases.set(digest, remaining)
      } else {
        this.leases.delete(digest)
      }
    }
  }

  isLeased(digest: Digest): boolean {
    return this.leases.has(digest)
  }

  /**
   * List every stored blob. Staging files and foreign names are ignored.
   */
  async list(): Promise<StoredBlob[]> {
    let fanouts: string[]
    try {
      fanouts = await readdir(this.paths.blobs)
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return []
      }
      throw err
    }

    const blobs: StoredBlob[] = []
    for (const fanout of fanouts.sort()) {
      if (!FANOUT_PATTERN.test(fanout)) continue
      const names = await readdir(join(this.paths.blobs, fanout))
      for (const name of names.sort()) {
        if (isTmpName(name) || !HEX_PATTERN.test(name) || !name.startsWith(fanout)) continue
        const digest = `sha256:${name}`
        if (!isDigest(digest)) continue
        const blob = await this.stat(digest)
        if (blob) {
          blobs.push(blob)
        }
      }
    }
    return blobs
  }

  async totalSize(): Promise<number> {
    const blobs = await this.list()
    return blobs.reduce((sum, blob) => sum + blob.sizeBytes, 0)
  }
}
