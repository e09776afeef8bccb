/**
 * Cache strategy presets.
 *
 * A team's `cache_strategy` picks one of three threshold sets. Aggressive
 * teams cache more and bundle sooner; conservative ones keep the cache
 * small and only bundle pairs that are almost always used together.
 */

import type { CacheStrategyName } from '@toolcache/core'

const MB = 1024 * 1024
const HOUR_MS = 60 * 60 * 1000
const DAY_MS = 24 * HOUR_MS

export interface CacheStrategy {
  name: CacheStrategyName
  maxCacheSizeBytes: number
  /** Usage events older than this are pruned */
  retentionDays: number
  /** How many of the most used references to preload */
  preloadCount: number
  /** How long a warm schedule stays current */
  syncFrequencyMinutes: number
  /** Pairs must score strictly above this to be bundled */
  bundleThreshold: number
  /** Pairs must have strictly more joint uses than this to be bundled */
  bundleMinUsage: number
  maxBundleSize: number
  /** Two uses by one actor this close together count as used together */
  pairWindowMs: number
  /** Events considered by analysis */
  analysisWindowMs: number
  /** Hours of the day to warm */
  warmHours: number
  /** Warm this many minutes before a peak hour starts */
  leadMinutes: number
}

const SHARED = {
  maxBundleSize: 10,
  pairWindowMs: HOUR_MS,
  analysisWindowMs: 7 * DAY_MS,
  warmHours: 3,
  leadMinutes: 15,
}

export const STRATEGIES: Readonly<Record<CacheStrategyName, CacheStrategy>> = {
  aggressive: {
    ...SHARED,
    name: 'aggressive',
    maxCacheSizeBytes: 2000 * MB,
    retentionDays: 90,
    preloadCount: 10,
    syncFrequencyMinutes: 30,
    bundleThreshold: 0.5,
    bundleMinUsage: 3,
  },
  balanced: {
    ...SHARED,
    name: 'balanced',
    maxCacheSizeBytes: 1000 * MB,
    retentionDays: 30,
    preloadCount: 5,
    syncFrequencyMinutes: 60,
    bundleThreshold: 0.7,
    bundleMinUsage: 5,
  },
  conservative: {
    ...SHARED,
    name: 'conservative',
    maxCacheSizeBytes: 500 * MB,
    retentionDays: 7,
    preloadCount: 3,
    syncFrequencyMinutes: 120,
    bundleThreshold: 0.85,
    bundleMinUsage: 10,
  },
}

export function strategyFor(name: CacheStrategyName): CacheStrategy {
  return STRATEGIES[name]
}
