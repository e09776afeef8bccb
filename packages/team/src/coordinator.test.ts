/**
 * Tests for the team cache coordinator against a real engine with a fake tier.
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import {
  type ArtifactReference,
  BundleError,
  DEFAULT_SETTINGS,
  NotFoundError,
  type UsageEvent,
  VerificationFailedError,
  formatReference,
} from '@toolcache/core'
import { ArtifactEngine, type InstallTier, type TierOutcome } from '@toolcache/engine'
import { PathResolver } from '@toolcache/store'
import { type Mock, afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import { TeamCacheCoordinator } from './coordinator.js'

const HOUR = 60 * 60 * 1000
const MINUTE = 60 * 1000
const DAY = 24 * HOUR
const BASE = Date.parse('2026-03-01T00:00:00.000Z')
const NOW = new Date('2026-03-25T12:00:00.000Z')

const X = 'github/acme/x-tool:1.0.0'
const Y = 'github/acme/y-tool:2.0.0'
const MISSING = 'github/acme/missing:1.0.0'

function use(reference: string, at: number, actor = 'alice'): UsageEvent {
  return { team: 'platform', reference, actor, timestamp: new Date(at).toISOString() }
}

describe('TeamCacheCoordinator', () => {
  let home: string
  let engine: ArtifactEngine
  let coordinator: TeamCacheCoordinator
  let attempt: Mock<InstallTier['attempt']>

  beforeEach(async () => {
    home = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'team-test-'))
    attempt = vi.fn<InstallTier['attempt']>(async (ref: ArtifactReference): Promise<TierOutcome> => {
      if (ref.ecosystem === 'bundles') {
        return { status: 'skip', reason: 'bundles are published locally' }
      }
      if (ref.name === 'missing') {
        return { status: 'fail', error: new NotFoundError(formatReference(ref)) }
      }
      return { status: 'success', content: Buffer.from(`bin:${formatReference(ref)}`) }
    })
    engine = new ArtifactEngine({
      paths: new PathResolver({ home }),
      settings: DEFAULT_SETTINGS,
      tiers: [{ name: 'registry', attempt }],
      now: () => NOW,
    })
    coordinator = new TeamCacheCoordinator({ engine, now: () => NOW })
  })

  afterEach(async () => {
    await coordinator.close()
    await fs.promises.rm(home, { recursive: true, force: true })
  })

  describe('usage events', () => {
    test('persists recorded events', async () => {
      const event = use(X, BASE)
      coordinator.record(event)

      expect(await coordinator.events('platform', { since: new Date(0) })).toEqual([event])
    })

    test('notifies listeners after record returns', async () => {
      const listener = vi.fn()
      const unsubscribe = coordinator.subscribe(listener)
      const event = use(X, BASE)

      coordinator.record(event)
      expect(listener).not.toHaveBeenCalled()
      await coordinator.flush()
      expect(listener).toHaveBeenCalledWith(event)

      unsubscribe()
      coordinator.record(use(Y, BASE))
      await coordinator.flush()
      expect(listener).toHaveBeenCalledTimes(1)
    })

    test('receives team pulls from the engine once attached', async () => {
      coordinator.attach()

      await engine.pull(X, { team: 'platform', actor: 'alice' })
      await engine.pull(Y)

      expect(await coordinator.events('platform')).toEqual([
        { team: 'platform', reference: X, actor: 'alice', timestamp: NOW.toISOString() },
      ])
    })

    test('prunes events past the strategy retention', async () => {
      coordinator.record(use(X, NOW.getTime() - 40 * DAY))
      coordinator.record(use(X, NOW.getTime() - 10 * DAY))

      expect(await coordinator.prune('platform')).toBe(1)
      expect(await coordinator.events('platform', { since: new Date(0) })).toHaveLength(1)
    })
  })

  describe('strategy', () => {
    test('defaults to balanced and follows the team configuration', () => {
      coordinator.configure({
        name: 'platform',
        members: ['alice'],
        cacheStrategy: 'aggressive',
        bundleDependencies: [],
      })

      expect(coordinator.strategyOf('platform').bundleThreshold).toBe(0.5)
      expect(coordinator.strategyOf('mobile').name).toBe('balanced')
    })
  })

  describe('cache size', () => {
    test('evicts down to the strategy size of the team', async () => {
      coordinator.configure({
        name: 'platform',
        members: ['alice'],
        cacheStrategy: 'conservative',
        bundleDependencies: [],
      })
      await engine.pull(X)
      const evict = vi.spyOn(engine, 'evict')

      const result = await coordinator.enforceCacheSize('platform', true)

      expect(evict).toHaveBeenCalledWith({
        policy: { kind: 'size', maxBytes: 500 * 1024 * 1024 },
        dryRun: true,
      })
      expect(result.evicted).toEqual([])
      expect(result.remainingBytes).toBe((await engine.info(X)).sizeBytes)
    })
  })

  describe('sync', () => {
    test('follows the sync frequency of the team strategy', () => {
      coordinator.configure({
        name: 'platform',
        members: ['alice'],
        cacheStrategy: 'aggressive',
        bundleDependencies: [],
      })

      expect(coordinator.nextSync('platform').toISOString()).toBe('2026-03-25T12:30:00.000Z')
      expect(coordinator.nextSync('mobile').toISOString()).toBe('2026-03-25T13:00:00.000Z')
    })
  })

  describe('analysis', () => {
    beforeEach(() => {
      for (let k = 0; k < 45; k++) {
        coordinator.record(use(X, BASE + k * 2 * HOUR))
        coordinator.record(use(Y, BASE + k * 2 * HOUR + 5 * MINUTE))
      }
      for (let k = 0; k < 5; k++) {
        coordinator.record(use(X, BASE + 10 * DAY + k * 2 * HOUR))
        coordinator.record(use(Y, BASE + 20 * DAY + k * 2 * HOUR))
      }
    })

    test('proposes bundling the references used together', async () => {
      const proposal = await coordinator.proposeBundle('platform', { since: new Date(0) })

      expect(proposal?.memberReferences).toEqual([X, Y])
      expect(proposal?.score).toBe(0.9)
      expect(proposal?.usageCount).toBe(45)
    })

    test('proposes nothing below the strategy minimum usage', async () => {
      coordinator.setStrategy('platform', 'conservative')

      // Five joint uses score 1.0 but conservative needs more than ten
      expect(
        await coordinator.proposeBundle('platform', {
          since: new Date(0),
          until: new Date(BASE + 10 * HOUR),
        })
      ).toBeNull()
    })

    test('only looks at the default analysis window', async () => {
      // NOW is 24.5 days after BASE; only the solo Y uses fall in the last 7 days
      expect(await coordinator.coOccurrence('platform')).toEqual([])
    })
  })

  describe('bundles', () => {
    const config = {
      name: 'platform',
      members: ['alice'],
      cacheStrategy: 'balanced' as const,
      bundleDependencies: [Y, X],
    }

    test('materializes a proposal under a content-derived reference', async () => {
      const proposal = coordinator.configuredBundle(config)
      if (!proposal) throw new Error('expected a proposal')

      const first = await coordinator.materializeBundle(proposal)
      const second = await coordinator.materializeBundle(proposal)

      expect(first.reference).toMatch(/^bundles\/platform\/team-dependencies:[0-9a-f]{12}$/)
      expect(second).toEqual(first)
      expect(first.memberReferences).toEqual([X, Y])
      expect(attempt).toHaveBeenCalledTimes(2)
      expect(await coordinator.listBundles('platform')).toEqual([first])
      expect(await coordinator.listBundles('mobile')).toEqual([])
    })

    test('fails when a member cannot be pulled', async () => {
      await expect(
        coordinator.materializeBundle({
          name: 'broken',
          team: 'platform',
          memberReferences: [MISSING, X],
          score: 1,
          usageCount: 0,
          description: 'broken',
        })
      ).rejects.toBeInstanceOf(BundleError)
    })

    test('re-fetches a member missing from the cache', async () => {
      const proposal = coordinator.configuredBundle(config)
      if (!proposal) throw new Error('expected a proposal')
      const bundle = await coordinator.materializeBundle(proposal)
      await engine.index.remove(X)

      const result = await coordinator.installBundle(bundle.reference)

      expect(result.members.map((m) => [m.reference, m.tierUsed])).toEqual([
        [X, 'registry'],
        [Y, 'cache'],
      ])
      expect(await fs.promises.readFile(result.members[0]?.path ?? '', 'utf8')).toBe(`bin:${X}`)
    })

    test('rejects a member whose upstream bytes changed', async () => {
      const proposal = coordinator.configuredBundle(config)
      if (!proposal) throw new Error('expected a proposal')
      const bundle = await coordinator.materializeBundle(proposal)
      await engine.index.remove(X)
      attempt.mockImplementation(async () => ({ status: 'success', content: Buffer.from('changed') }))

      await expect(coordinator.installBundle(bundle.reference)).rejects.toBeInstanceOf(
        VerificationFailedError
      )
    })

    test('installs a published bundle and records member usage', async () => {
      coordinator.attach()
      const proposal = coordinator.configuredBundle(config)
      if (!proposal) throw new Error('expected a proposal')
      const bundle = await coordinator.materializeBundle(proposal)

      const result = await coordinator.installBundle(bundle.reference, {
        team: 'platform',
        actor: 'bob',
      })

      expect(result.bundle).toEqual(bundle)
      expect(result.members.map((m) => [m.reference, m.tierUsed])).toEqual([
        [X, 'cache'],
        [Y, 'cache'],
      ])
      expect((await coordinator.events('platform')).map((e) => [e.reference, e.actor])).toEqual([
        [X, 'bob'],
        [Y, 'bob'],
      ])
    })

    test('refuses references outside the bundle namespace', async () => {
      await expect(coordinator.installBundle(X)).rejects.toBeInstanceOf(BundleError)
    })
  })

  describe('prewarm', () => {
    test('reports each reference on its own', async () => {
      const results = await coordinator.prewarm({
        time: NOW.toISOString(),
        hour: 9,
        rank: 1,
        requestCount: 2,
        references: [X, MISSING],
      })

      expect(results[0]).toEqual({ reference: X, ok: true, tierUsed: 'registry' })
      expect(results[1]?.ok).toBe(false)
      expect(results[1]).toMatchObject({
        reference: MISSING,
        error: expect.stringMatching(/^All tiers failed for github\/acme\/missing:1\.0\.0:/),
      })
    })
  })
})
