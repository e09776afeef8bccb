/**
 * Cache and installation result types
 */

import type { ToolcacheError } from '../errors.js'
import type { ArtifactReference, Digest, ReferenceString } from './refs.js'

/** Installer tiers in their fixed precedence order */
export type TierName = 'native' | 'registry' | 'http'

export const TIER_ORDER: readonly TierName[] = ['native', 'registry', 'http']

/** Where a resolution was served from. A cache hit is a zero-cost tier named `cache`. */
export type SourceTier = TierName | 'cache'

/** How an entry got into the cache: through a tier, or built locally (bundles) */
export type EntryOrigin = TierName | 'local'

/**
 * Metadata for one cached reference.
 *
 * Owned by the digest store's index. The blob it points at lives under
 * `blobs/` and is shared by every reference with the same digest.
 */
export interface CacheEntry {
  reference: ArtifactReference
  digest: Digest
  sizeBytes: number
  /** ISO-8601 */
  createdAt: string
  /** ISO-8601, updated on every cache hit */
  lastAccessedAt: string
  sourceTier: EntryOrigin
  /** Whether the blob is installed with the executable bit */
  executable?: boolean | undefined
}

/** Outcome of one tier during an install */
export interface TierAttempt {
  tier: TierName
  status: 'skipped' | 'failed' | 'succeeded'
  durationMs: number
  error?: ToolcacheError | undefined
}

export interface InstallSuccess {
  success: true
  reference: ReferenceString
  digest: Digest
  /** Absolute path of the verified blob */
  binaryPath: string
  sizeBytes: number
  tierUsed: SourceTier
  durationMs: number
  attempts: TierAttempt[]
}

export interface InstallFailure {
  success: false
  reference: ReferenceString
  error: ToolcacheError
  /** Tier that produced a terminal error, null when every tier was exhausted */
  tierUsed: TierName | null
  durationMs: number
  attempts: TierAttempt[]
}

/** Result of one resolution attempt. Produced once, never mutated. */
export type InstallResult = InstallSuccess | InstallFailure
