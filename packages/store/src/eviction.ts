/**
 * Cache eviction and clearing.
 *
 * WHY: The cache grows with every new artifact version. Eviction keeps it
 * within the configured size or age by removing least-recently-used
 * blobs together with every reference that points at them.
 */

import { type CacheEntry, type Digest, formatReference } from '@toolcache/core'

import type { DigestStore, StoredBlob } from './blob-store.js'
import type { CacheIndex } from './cache-index.js'

/** Eviction policy */
export type EvictionPolicy =
  /** Remove LRU blobs until the total size is at most maxBytes */
  | { kind: 'size'; maxBytes: number }
  /** Remove blobs not accessed within maxAgeMs */
  | { kind: 'age'; maxAgeMs: number }
  /** Remove blobs past maxAgeMs, then LRU blobs until at most maxBytes */
  | { kind: 'limits'; maxBytes: number; maxAgeMs: number }

export interface EvictionOptions {
  policy: EvictionPolicy
  /** Report what would be removed without removing it */
  dryRun?: boolean | undefined
  /** Clock override */
  now?: Date | undefined
}

/** A blob chosen for eviction */
export interface EvictedBlob {
  digest: Digest
  sizeBytes: number
  /** References that pointed at the blob */
  references: string[]
  /** Most recent access over all its references, ms since epoch */
  lastAccessedMs: number
}

/**
 * Eviction result statistics.
 */
export interface EvictionResult {
  evicted: EvictedBlob[]
  /** Index records removed (including records whose blob was already gone) */
  entriesRemoved: number
  /** Bytes freed */
  bytesFreed: number
  /** Blobs kept only because a reader held them */
  skippedLeased: number
  /** Total stored bytes after eviction */
  remainingBytes: number
}

/**
 * Build one candidate per stored blob, newest access taken over all
 * references. Blobs with no references fall back to their mtime.
 */
function rankBlobs(
  blobs: StoredBlob[],
  entries: CacheEntry[]
): { candidates: EvictedBlob[]; dangling: CacheEntry[] } {
  const byDigest = new Map<Digest, CacheEntry[]>()
  for (const entry of entries) {
    const list = byDigest.get(entry.digest) ?? []
    list.push(entry)
    byDigest.set(entry.digest, list)
  }

  const candidates: EvictedBlob[] = []
  const stored = new Set<Digest>()
  for (const blob of blobs) {
    stored.add(blob.digest)
    const refs = byDigest.get(blob.digest) ?? []
    const lastAccessedMs =
      refs.length > 0
        ? Math.max(...refs.map((e) => Date.parse(e.lastAccessedAt)))
        : blob.mtimeMs
    candidates.push({
      digest: blob.digest,
      sizeBytes: blob.sizeBytes,
      references: refs.map((e) => formatReference(e.reference)),
      lastAccessedMs,
    })
  }

  // Oldest first; digest breaks ties so the order is deterministic
  candidates.sort(
    (a, b) => a.lastAccessedMs - b.lastAccessedMs || (a.digest < b.digest ? -1 : 1)
  )

  const dangling = entries.filter((entry) => !stored.has(entry.digest))
  return { candidates, dangling }
}

async function removeBlob(
  candidate: EvictedBlob,
  store: DigestStore,
  index: CacheIndex
): Promise<void> {
  // Records first: a record pointing at a missing blob reads as a miss,
  // a blob without records is just an orphan
  for (const ref of candidate.references) {
    await index.remove(ref)
  }
  await store.remove(candidate.digest)
}

/**
 * Evict blobs according to a policy, least recently used first.
 */
export async function evict(
  store: DigestStore,
  index: CacheIndex,
  options: EvictionOptions
): Promise<EvictionResult> {
  const now = (options.now ?? new Date()).getTime()
  const [blobs, entries] = await Promise.all([store.list(), index.list()])
  const { candidates, dangling } = rankBlobs(blobs, entries)

  const result: EvictionResult = {
    evicted: [],
    entriesRemoved: 0,
    bytesFreed: 0,
    skippedLeased: 0,
    remainingBytes: blobs.reduce((sum, blob) => sum + blob.sizeBytes, 0),
  }

  for (const entry of dangling) {
    if (!options.dryRun) {
      await index.remove(entry.reference)
    }
    result.entriesRemoved++
  }

  const { policy } = options
  for (const candidate of candidates) {
    const overSize = policy.kind !== 'age' && result.remainingBytes > policy.maxBytes
    const expired = policy.kind !== 'size' && now - candidate.lastAccessedMs > policy.maxAgeMs
    // Sorted oldest first: once neither limit applies, none applies to the rest
    if (!overSize && !expired) {
      break
    }
    if (store.isLeased(candidate.digest)) {
      result.skippedLeased++
      continue
    }

    if (!options.dryRun) {
      await removeBlob(candidate, store, index)
    }
    result.evicted.push(candidate)
    result.entriesRemoved += candidate.references.length
    result.bytesFreed += candidate.sizeBytes
    result.remainingBytes -= candidate.sizeBytes
  }

  return result
}

export interface ClearOptions {
  /** Only clear entries created before this time; everything when absent */
  olderThan?: Date | undefined
  dryRun?: boolean | undefined
}

export interface ClearResult {
  /** Index records removed */
  entriesRemoved: number
  /** Blobs left without any reference and removed */
  blobsRemoved: number
  bytesFreed: number
}

/**
 * Remove entries by creation time, then any blob no record points at.
 */
export async function clearEntries(
  store: DigestStore,
  index: CacheIndex,
  options: ClearOptions = {}
): Promise<ClearResult> {
  const cutoff = options.olderThan?.getTime()
  const entries = await index.list()
  const doomed = entries.filter(
    (entry) => cutoff === undefined || Date.parse(entry.createdAt) < cutoff
  )
  const doomedRefs = new Set(doomed.map((entry) => formatReference(entry.reference)))
  const doomedDigests = new Set(doomed.map((entry) => entry.digest))

  const result: ClearResult = { entriesRemoved: 0, blobsRemoved: 0, bytesFreed: 0 }
  for (const entry of doomed) {
    if (!options.dryRun) {
      await index.remove(entry.reference)
    }
    result.entriesRemoved++
  }

  const stillReferenced = new Set(
    entries
      .filter((entry) => !doomedRefs.has(formatReference(entry.reference)))
      .map((entry) => entry.digest)
  )
  for (const blob of await store.list()) {
    if (stillReferenced.has(blob.digest) || store.isLeased(blob.digest)) continue
    // An orphan newer than the cutoff may belong to an install in progress
    if (!doomedDigests.has(blob.digest) && cutoff !== undefined && blob.mtimeMs >= cutoff) continue
    if (!options.dryRun) {
      await store.remove(blob.digest)
    }
    result.blobsRemoved++
    result.bytesFreed += blob.sizeBytes
  }

  return result
}
