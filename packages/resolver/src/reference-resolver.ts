/**
 * Reference resolution against the local index.
 *
 * WHY: The resolver answers "do we already have this?" without touching
 * the network. A hit refreshes the entry's access time, which is what
 * drives LRU eviction.
 */

import {
  type ArtifactReference,
  type CacheEntry,
  type Digest,
  type Logger,
  createLogger,
  formatReference,
  versionTag,
} from '@toolcache/core'
import type { CacheIndex, DigestStore } from '@toolcache/store'

import { compareVersions } from './versions.js'

/** Result of a local lookup */
export type Resolution =
  | { kind: 'hit'; digest: Digest; entry: CacheEntry; blobPath: string }
  | { kind: 'miss'; reason: 'absent' | 'stale' }

export interface ReferenceResolverOptions {
  store: DigestStore
  index: CacheIndex
  logger?: Logger | undefined
  /** Clock override */
  now?: (() => Date) | undefined
}

/**
 * Resolves references to digests using only local state.
 */
export class ReferenceResolver {
  private readonly store: DigestStore
  private readonly index: CacheIndex
  private readonly log: Logger
  private readonly now: () => Date

  constructor(options: ReferenceResolverOptions) {
    this.store = options.store
    this.index = options.index
    this.log = options.logger ?? createLogger('resolver')
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Resolve a reference. On a hit the entry's lastAccessedAt is updated.
   *
   * A record whose blob has disappeared is dropped and reported as a miss.
   */
  async resolve(ref: ArtifactReference): Promise<Resolution> {
    const entry = await this.index.get(ref)
    if (!entry) {
      return { kind: 'miss', reason: 'absent' }
    }

    if (!(await this.store.has(entry.digest))) {
      this.log.debug('Dropping index record without blob', {
        ref: formatReference(ref),
        digest: entry.digest,
      })
      await this.index.remove(ref)
      return { kind: 'miss', reason: 'stale' }
    }

    const touched = (await this.index.touch(ref, this.now())) ?? entry
    return {
      kind: 'hit',
      digest: touched.digest,
      entry: touched,
      blobPath: this.store.path(touched.digest),
    }
  }

  /**
   * Look up an entry without counting it as an access.
   */
  async peek(ref: ArtifactReference): Promise<CacheEntry | null> {
    return this.index.get(ref)
  }

  /**
   * Locally cached version tags of a repository, ascending.
   */
  async listVersions(repository: string): Promise<string[]> {
    const entries = await this.index.listRepository(repository)
    entries.sort(
      (a, b) =>
        compareVersions(a.reference.version, b.reference.version) ||
        (a.reference.platform ?? '').localeCompare(b.reference.platform ?? '')
    )
    return entries.map((entry) => versionTag(entry.reference))
  }
}
