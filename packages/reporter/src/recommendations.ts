/**
 * Optimization recommendations.
 *
 * WHY: Recommendations are derived on demand from resolution samples and
 * team usage and are never stored. Each carries a projected improvement
 * in [0, 1]; its priority follows from that number, so ordering by
 * priority and then by projection is consistent.
 */

import type {
  Bundle,
  CoOccurrencePair,
  OptimizationRecommendation,
  RecommendationKind,
  RecommendationPriority,
  ReferenceString,
  ResolutionRecord,
} from '@toolcache/core'
import { type WarmSlot, comparePairs } from '@toolcache/team'

import type { PerformanceMetrics } from './metrics.js'

/** Hit rate below which a larger cache is recommended */
export const HIT_RATE_LOW_WATER = 0.8
/** Hit rate a larger cache is expected to reach */
export const TARGET_HIT_RATE = 0.85
/** Successful resolutions needed before the hit rate is judged */
export const MIN_SAMPLE = 20
/** Pairs recommended for bundling at most */
export const MAX_BUNDLE_RECOMMENDATIONS = 3
/** Share of download time a bundle saves */
export const BUNDLE_TIME_SAVED = 0.5
/** Network fetches of one reference that count as repeated */
export const PRELOAD_MIN_FETCHES = 2
/** Network fetches needed before the tier mix is judged */
export const MIN_NETWORK_FETCHES = 5
/** Share of network fetches through http above which a registry is recommended */
export const HTTP_SHARE_LIMIT = 0.5

const WARMING_IMPROVEMENT = 0.05

const PRIORITY_RANK: Record<RecommendationPriority, number> = { high: 0, medium: 1, low: 2 }
const KIND_RANK: Record<RecommendationKind, number> = {
  'increase-cache-size': 0,
  'create-bundle': 1,
  preload: 2,
  'prefer-registry': 3,
  'cache-warming': 4,
}

export interface RecommendationInput {
  metrics: PerformanceMetrics
  records: readonly ResolutionRecord[]
  pairs: readonly CoOccurrencePair[]
  bundles: readonly Bundle[]
  schedule: readonly WarmSlot[]
  bundleThreshold: number
  bundleMinUsage: number
  preloadCount: number
}

export function priorityFor(projectedImprovement: number): RecommendationPriority {
  if (projectedImprovement >= 0.3) return 'high'
  if (projectedImprovement >= 0.1) return 'medium'
  return 'low'
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value))
}

function recommendation(
  kind: RecommendationKind,
  projectedImprovement: number,
  rationale: string,
  expectedImpact: string,
  references?: ReferenceString[]
): OptimizationRecommendation {
  const projected = clamp(projectedImprovement)
  return {
    kind,
    priority: priorityFor(projected),
    rationale,
    expectedImpact,
    projectedImprovement: projected,
    ...(references ? { references } : {}),
  }
}

function cacheSize(metrics: PerformanceMetrics): OptimizationRecommendation[] {
  const successes = metrics.hits + metrics.fetches
  if (successes < MIN_SAMPLE || metrics.hitRate >= HIT_RATE_LOW_WATER) {
    return []
  }
  return [
    recommendation(
      'increase-cache-size',
      TARGET_HIT_RATE - metrics.hitRate,
      `Hit rate is ${percent(metrics.hitRate)} over ${successes} resolutions, below ${percent(HIT_RATE_LOW_WATER)}`,
      `Raise the hit rate to ${percent(TARGET_HIT_RATE)}`
    ),
  ]
}

function isCovered(pair: CoOccurrencePair, bundles: readonly Bundle[]): boolean {
  return bundles.some(
    (bundle) =>
      bundle.memberReferences.includes(pair.referenceA) &&
      bundle.memberReferences.includes(pair.referenceB)
  )
}

function bundling(input: RecommendationInput): OptimizationRecommendation[] {
  return input.pairs
    .filter(
      (pair) =>
        pair.score > input.bundleThreshold &&
        pair.usageCount > input.bundleMinUsage &&
        !isCovered(pair, input.bundles)
    )
    .sort(comparePairs)
    .slice(0, MAX_BUNDLE_RECOMMENDATIONS)
    .map((pair) =>
      recommendation(
        'create-bundle',
        pair.score * BUNDLE_TIME_SAVED,
        `${pair.referenceA} and ${pair.referenceB} are used together (score ${pair.score.toFixed(2)}, ${pair.usageCount} joint uses)`,
        '40-60% less download time for these references',
        [pair.referenceA, pair.referenceB]
      )
    )
}

function preloading(input: RecommendationInput): OptimizationRecommendation[] {
  const fetchCounts = new Map<ReferenceString, number>()
  for (const record of input.records) {
    if (record.outcome === 'fetched') {
      fetchCounts.set(record.reference, (fetchCounts.get(record.reference) ?? 0) + 1)
    }
  }

  const repeated = [...fetchCounts.entries()]
    .filter(([, count]) => count >= PRELOAD_MIN_FETCHES)
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, input.preloadCount)
  if (repeated.length === 0) {
    return []
  }

  const total = repeated.reduce((sum, [, count]) => sum + count, 0)
  const successes = input.metrics.hits + input.metrics.fetches
  return [
    recommendation(
      'preload',
      successes > 0 ? total / successes : 0,
      `${repeated.length} references were fetched over the network ${total} times`,
      `Up to ${total} fewer network fetches`,
      repeated.map(([reference]) => reference)
    ),
  ]
}

function registryPreference(metrics: PerformanceMetrics): OptimizationRecommendation[] {
  const counts = metrics.countsByTier
  const network = (counts.native ?? 0) + (counts.registry ?? 0) + (counts.http ?? 0)
  if (network < MIN_NETWORK_FETCHES) {
    return []
  }
  const httpShare = (counts.http ?? 0) / network
  if (httpShare <= HTTP_SHARE_LIMIT) {
    return []
  }
  return [
    recommendation(
      'prefer-registry',
      httpShare / 2,
      `${percent(httpShare)} of network fetches fell back to direct HTTP download`,
      'Publish these artifacts to a registry so they resolve on an earlier tier'
    ),
  ]
}

function warming(schedule: readonly WarmSlot[]): OptimizationRecommendation[] {
  if (schedule.length === 0) {
    return []
  }
  const references = [...new Set(schedule.flatMap((slot) => slot.references))]
  return [
    {
      kind: 'cache-warming',
      priority: 'low',
      rationale: `Peak hours (UTC): ${schedule.map((slot) => slot.hour).join(', ')}`,
      expectedImpact: 'Lower latency during peak hours',
      projectedImprovement: WARMING_IMPROVEMENT,
      references,
    },
  ]
}

export function compareRecommendations(
  a: OptimizationRecommendation,
  b: OptimizationRecommendation
): number {
  return (
    PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] ||
    b.projectedImprovement - a.projectedImprovement ||
    KIND_RANK[a.kind] - KIND_RANK[b.kind]
  )
}

/**
 * Every applicable recommendation, highest priority first.
 */
export function recommend(input: RecommendationInput): OptimizationRecommendation[] {
  return [
    ...cacheSize(input.metrics),
    ...bundling(input),
    ...preloading(input),
    ...registryPreference(input.metrics),
    ...warming(input.schedule),
  ].sort(compareRecommendations)
}
