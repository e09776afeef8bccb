/**
 * Metrics over resolution samples.
 */

import type { ResolutionRecord, SourceTier } from '@toolcache/core'

export type TierCounts = Partial<Record<SourceTier, number>>

export interface PerformanceMetrics {
  requests: number
  hits: number
  /** Successful resolutions that went to the network */
  fetches: number
  failures: number
  /** hits / successful resolutions; 0 without any */
  hitRate: number
  /** Mean duration of successful resolutions per tier, ms */
  avgLatencyByTier: TierCounts
  /** Successful resolutions per tier */
  countsByTier: TierCounts
  /** Bytes served from the cache instead of the network */
  bandwidthSavedEstimate: number
  bytesFetched: number
}

export function computeMetrics(records: readonly ResolutionRecord[]): PerformanceMetrics {
  let hits = 0
  let fetches = 0
  let failures = 0
  let bandwidthSavedEstimate = 0
  let bytesFetched = 0
  const countsByTier: TierCounts = {}
  const totalLatency: TierCounts = {}

  for (const record of records) {
    if (record.outcome === 'failed' || record.tier === null) {
      failures++
      continue
    }
    if (record.outcome === 'hit') {
      hits++
      bandwidthSavedEstimate += record.sizeBytes
    } else {
      fetches++
      bytesFetched += record.sizeBytes
    }
    countsByTier[record.tier] = (countsByTier[record.tier] ?? 0) + 1
    totalLatency[record.tier] = (totalLatency[record.tier] ?? 0) + record.durationMs
  }

  const avgLatencyByTier: TierCounts = {}
  for (const [tier, count] of tierEntries(countsByTier)) {
    avgLatencyByTier[tier] = (totalLatency[tier] ?? 0) / count
  }

  const successes = hits + fetches
  return {
    requests: records.length,
    hits,
    fetches,
    failures,
    hitRate: successes > 0 ? hits / successes : 0,
    avgLatencyByTier,
    countsByTier,
    bandwidthSavedEstimate,
    bytesFetched,
  }
}

const TIER_ORDER: readonly SourceTier[] = ['cache', 'native', 'registry', 'http']

/** Entries of a per-tier record in tier order */
export function tierEntries(counts: TierCounts): Array<[SourceTier, number]> {
  const entries: Array<[SourceTier, number]> = []
  for (const tier of TIER_ORDER) {
    const value = counts[tier]
    if (value !== undefined) {
      entries.push([tier, value])
    }
  }
  return entries
}
