/**
 * Tests for the reporter over a collector and a team coordinator.
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { DEFAULT_SETTINGS, type UsageEvent } from '@toolcache/core'
import { ArtifactEngine } from '@toolcache/engine'
import { PathResolver } from '@toolcache/store'
import { TeamCacheCoordinator } from '@toolcache/team'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import { MetricsCollector } from './collector.js'
import { PerformanceReporter } from './reporter.js'

const HOUR = 60 * 60 * 1000
const BASE = Date.parse('2026-03-01T00:00:00.000Z')
const NOW = new Date('2026-03-05T00:00:00.000Z')

const X = 'github/acme/x-tool:1.0.0'
const Y = 'github/acme/y-tool:2.0.0'

function use(reference: string, at: number): UsageEvent {
  return { team: 'platform', reference, actor: 'alice', timestamp: new Date(at).toISOString() }
}

describe('PerformanceReporter', () => {
  let home: string
  let coordinator: TeamCacheCoordinator
  let collector: MetricsCollector
  let reporter: PerformanceReporter

  beforeEach(async () => {
    home = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'reporter-test-'))
    const engine = new ArtifactEngine({
      paths: new PathResolver({ home }),
      settings: DEFAULT_SETTINGS,
      tiers: [],
      now: () => NOW,
    })
    coordinator = new TeamCacheCoordinator({ engine, now: () => NOW })
    collector = new MetricsCollector()
    reporter = new PerformanceReporter({ collector, coordinator, now: () => NOW })
  })

  afterEach(async () => {
    await coordinator.close()
    await fs.promises.rm(home, { recursive: true, force: true })
  })

  test('computes metrics for one team', async () => {
    collector.recordResolution({
      reference: X,
      team: 'platform',
      tier: 'cache',
      outcome: 'hit',
      durationMs: 2,
      sizeBytes: 4096,
      timestamp: NOW.toISOString(),
    })
    collector.recordResolution({
      reference: Y,
      team: 'mobile',
      tier: 'registry',
      outcome: 'fetched',
      durationMs: 300,
      sizeBytes: 1024,
      timestamp: NOW.toISOString(),
    })

    const metrics = await reporter.metrics({ team: 'platform' })

    expect(metrics.requests).toBe(1)
    expect(metrics.hitRate).toBe(1)
    expect(metrics.bandwidthSavedEstimate).toBe(4096)
    expect((await reporter.metrics()).requests).toBe(2)
  })

  test('recommends a bundle and warming from team usage', async () => {
    // Ten joint uses of X and Y, two hours apart
    for (let k = 0; k < 10; k++) {
      coordinator.record(use(X, BASE + k * 2 * HOUR))
      coordinator.record(use(Y, BASE + k * 2 * HOUR + 60_000))
    }

    const report = await reporter.report('platform')

    expect(report.since).toBe('2026-02-26T00:00:00.000Z')
    expect(report.metrics.requests).toBe(0)
    expect(report.recommendations.map((r) => [r.kind, r.priority])).toEqual([
      ['create-bundle', 'high'],
      ['cache-warming', 'low'],
    ])
    expect(report.recommendations[0]?.references).toEqual([X, Y])
  })

  test('recommends nothing without data', async () => {
    expect(await reporter.recommendations('platform')).toEqual([])
  })
})
