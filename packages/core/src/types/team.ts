/**
 * Team usage and optimization types
 */

import type { Digest, ReferenceString } from './refs.js'
import type { SourceTier } from './cache.js'

/** One successful resolution by a team member. Append-only. */
export interface UsageEvent {
  team: string
  reference: ReferenceString
  actor: string
  /** ISO-8601 */
  timestamp: string
}

/**
 * How often two references are used together by the same actor.
 *
 * Derived, never stored. `referenceA < referenceB` lexically.
 */
export interface CoOccurrencePair {
  referenceA: ReferenceString
  referenceB: ReferenceString
  /** joint uses / max(uses of A, uses of B), in [0, 1] */
  score: number
  /** Number of joint uses */
  usageCount: number
}

/** A candidate bundle, not yet written to the store */
export interface BundleProposal {
  name: string
  team: string
  memberReferences: ReferenceString[]
  score: number
  usageCount: number
  description: string
}

/** A published bundle. Membership is immutable once published. */
export interface Bundle {
  name: string
  team: string
  /** Reference the bundle manifest is indexed under */
  reference: ReferenceString
  memberReferences: ReferenceString[]
  digest: Digest
  description: string
  /** ISO-8601 */
  createdAt: string
}

export type CacheStrategyName = 'aggressive' | 'balanced' | 'conservative'

/** Team configuration input (team.toml) */
export interface TeamConfig {
  name: string
  members: string[]
  cacheStrategy: CacheStrategyName
  bundleDependencies: ReferenceString[]
}

export type RecommendationKind =
  | 'increase-cache-size'
  | 'create-bundle'
  | 'preload'
  | 'prefer-registry'
  | 'cache-warming'

export type RecommendationPriority = 'high' | 'medium' | 'low'

export interface OptimizationRecommendation {
  kind: RecommendationKind
  priority: RecommendationPriority
  rationale: string
  expectedImpact: string
  /** Projected gain in [0, 1], used to order recommendations of equal priority */
  projectedImprovement: number
  references?: ReferenceString[] | undefined
}

export type ResolutionOutcome = 'hit' | 'fetched' | 'failed'

/** One counter sample per resolution */
export interface ResolutionRecord {
  reference: ReferenceString
  team?: string | undefined
  tier: SourceTier | null
  outcome: ResolutionOutcome
  durationMs: number
  sizeBytes: number
  /** ISO-8601 */
  timestamp: string
  errorCode?: string | undefined
}

/** Receives usage events. Implementations must not block the caller. */
export interface UsageSink {
  record(event: UsageEvent): void
}

/** Receives resolution samples. Implementations must not block the caller. */
export interface ResolutionRecorder {
  recordResolution(record: ResolutionRecord): void
}

/** One member of a bundle manifest, pinned to its digest */
export interface BundleMember {
  reference: ReferenceString
  digest: Digest
}

/**
 * Bundle manifest as stored in the digest store. Serialized canonically,
 * so the same member set always produces the same digest.
 */
export interface BundleManifest {
  schemaVersion: 1
  name: string
  team: string
  description: string
  members: BundleMember[]
}
