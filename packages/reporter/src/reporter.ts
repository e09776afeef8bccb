/**
 * Performance reporter.
 *
 * Reads resolution samples and team usage on demand; holds no state of
 * its own.
 */

import type { Bundle, CoOccurrencePair, OptimizationRecommendation } from '@toolcache/core'
import {
  type AnalysisWindow,
  type TeamCacheCoordinator,
  type WarmSlot,
  strategyFor,
} from '@toolcache/team'

import type { MetricsCollector, RecordFilter } from './collector.js'
import { type PerformanceMetrics, computeMetrics } from './metrics.js'
import { recommend } from './recommendations.js'

export interface PerformanceReporterOptions {
  collector: MetricsCollector
  /** Team usage for bundle and warming recommendations */
  coordinator?: TeamCacheCoordinator | undefined
  now?: (() => Date) | undefined
}

export interface PerformanceReport {
  team: string
  /** ISO-8601 */
  generatedAt: string
  since: string
  metrics: PerformanceMetrics
  recommendations: OptimizationRecommendation[]
}

export class PerformanceReporter {
  private readonly collector: MetricsCollector
  private readonly coordinator: TeamCacheCoordinator | undefined
  private readonly now: () => Date

  constructor(options: PerformanceReporterOptions) {
    this.collector = options.collector
    this.coordinator = options.coordinator
    this.now = options.now ?? (() => new Date())
  }

  /** Metrics over the samples matching the filter (all teams when none is given) */
  async metrics(filter: RecordFilter = {}): Promise<PerformanceMetrics> {
    return computeMetrics(await this.collector.records(filter))
  }

  async recommendations(
    team: string,
    window: AnalysisWindow = {}
  ): Promise<OptimizationRecommendation[]> {
    return (await this.report(team, window)).recommendations
  }

  /**
   * Metrics and recommendations for one team over a window (default:
   * the team strategy's analysis window).
   */
  async report(team: string, window: AnalysisWindow = {}): Promise<PerformanceReport> {
    const now = this.now()
    const strategy = this.coordinator?.strategyOf(team) ?? strategyFor('balanced')
    const since = window.since ?? new Date(now.getTime() - strategy.analysisWindowMs)
    const bounded = { since, until: window.until }

    const records = await this.collector.records({ team, ...bounded })
    const metrics = computeMetrics(records)
    let pairs: CoOccurrencePair[] = []
    let bundles: Bundle[] = []
    let schedule: WarmSlot[] = []
    if (this.coordinator) {
      ;[pairs, bundles, schedule] = await Promise.all([
        this.coordinator.coOccurrence(team, bounded),
        this.coordinator.listBundles(team),
        this.coordinator.warmSchedule(team, bounded),
      ])
    }

    return {
      team,
      generatedAt: now.toISOString(),
      since: since.toISOString(),
      metrics,
      recommendations: recommend({
        metrics,
        records,
        pairs,
        bundles,
        schedule,
        bundleThreshold: strategy.bundleThreshold,
        bundleMinUsage: strategy.bundleMinUsage,
        preloadCount: strategy.preloadCount,
      }),
    }
  }
}
