/**
 * Tests for tier ordering, fallthrough and verification.
 */

import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import {
  AggregateResolutionError,
  type ArtifactReference,
  DownloadError,
  NotFoundError,
  type TierName,
  TierUnavailableError,
  VerificationFailedError,
} from '@toolcache/core'
import { parseReference } from '@toolcache/resolver'
import { CacheIndex, DigestStore, PathResolver, computeDigest } from '@toolcache/store'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import { TieredInstaller } from './tiered-installer.js'
import type { InstallTier, TierContext, TierOutcome } from './tiers/types.js'

const BYTES = Buffer.from('protoc-binary')
const OTHER_DIGEST = `sha256:${'0'.repeat(64)}` as const
const REF = 'github/protocolbuffers/protoc:31.1-linux-x86_64'

describe('TieredInstaller', () => {
  let home: string
  let store: DigestStore
  let index: CacheIndex
  let ref: ArtifactReference
  let calls: TierName[]

  function tier(name: TierName, outcome: TierOutcome): InstallTier {
    return {
      name,
      attempt: async () => {
        calls.push(name)
        return outcome
      },
    }
  }

  function installer(tiers: InstallTier[]): TieredInstaller {
    return new TieredInstaller({
      tiers,
      store,
      index,
      now: () => new Date('2026-03-01T12:00:00.000Z'),
    })
  }

  beforeEach(async () => {
    home = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'installer-test-'))
    const paths = new PathResolver({ home })
    store = new DigestStore({ paths })
    index = new CacheIndex({ paths })
    ref = parseReference(REF)
    calls = []
  })

  afterEach(async () => {
    await fs.promises.rm(home, { recursive: true, force: true })
  })

  test('falls through skipped and failed tiers in order', async () => {
    const result = await installer([
      tier('native', { status: 'skip', reason: 'cargo not found' }),
      tier('registry', { status: 'fail', error: new NotFoundError(REF) }),
      tier('http', { status: 'success', content: BYTES }),
    ]).install(ref)

    if (!result.success) throw result.error
    expect(calls).toEqual(['native', 'registry', 'http'])
    expect(result.tierUsed).toBe('http')
    expect(result.digest).toBe(computeDigest(BYTES))
    expect(result.sizeBytes).toBe(13)
    expect(result.attempts.map((a) => [a.tier, a.status])).toEqual([
      ['native', 'skipped'],
      ['registry', 'failed'],
      ['http', 'succeeded'],
    ])
    expect(result.attempts[0]?.error).toBeInstanceOf(TierUnavailableError)
    expect(await fs.promises.readFile(result.binaryPath, 'utf8')).toBe('protoc-binary')
  })

  test('records a cache entry for the winning tier', async () => {
    await installer([tier('registry', { status: 'success', content: BYTES })]).install(ref)

    const entry = await index.get(ref)
    expect(entry).toEqual({
      reference: ref,
      digest: computeDigest(BYTES),
      sizeBytes: 13,
      createdAt: '2026-03-01T12:00:00.000Z',
      lastAccessedAt: '2026-03-01T12:00:00.000Z',
      sourceTier: 'registry',
      executable: true,
    })
  })

  test('stops at the first success', async () => {
    const result = await installer([
      tier('native', { status: 'success', content: BYTES }),
      tier('registry', { status: 'success', content: Buffer.from('other') }),
    ]).install(ref)

    expect(result.success).toBe(true)
    expect(calls).toEqual(['native'])
  })

  test('reports every tier when all are exhausted', async () => {
    const result = await installer([
      tier('native', { status: 'skip', reason: 'cargo not found' }),
      tier('registry', { status: 'fail', error: new NotFoundError(REF) }),
      tier('http', {
        status: 'fail',
        error: new DownloadError('HTTP 503', 'https://downloads.example.invalid/protoc', 503),
      }),
    ]).install(ref)

    if (result.success) throw new Error('expected failure')
    expect(result.tierUsed).toBeNull()
    expect(result.error).toBeInstanceOf(AggregateResolutionError)
    expect(result.error.message).toBe(
      [
        `All tiers failed for ${REF}:`,
        '  native: Tier native unavailable: cargo not found',
        `  registry: Artifact not found: ${REF}`,
        '  http: Download failed for https://downloads.example.invalid/protoc: HTTP 503',
      ].join('\n')
    )
    expect(await store.list()).toEqual([])
    expect(await index.get(ref)).toBeNull()
  })

  test('a digest mismatch is terminal and stores nothing', async () => {
    const result = await installer([
      tier('registry', { status: 'success', content: BYTES, digest: OTHER_DIGEST }),
      tier('http', { status: 'success', content: BYTES }),
    ]).install(ref)

    if (result.success) throw new Error('expected failure')
    expect(calls).toEqual(['registry'])
    expect(result.tierUsed).toBe('registry')
    expect(result.error).toBeInstanceOf(VerificationFailedError)
    expect(result.error.message).toBe(
      `Verification failed for ${REF}: expected ${OTHER_DIGEST}, got ${computeDigest(BYTES)}`
    )
    expect(await store.list()).toEqual([])
    expect(await index.get(ref)).toBeNull()
  })

  test('the caller expected digest is checked even when the tier vouches for the bytes', async () => {
    const result = await installer([
      tier('registry', { status: 'success', content: BYTES, digest: computeDigest(BYTES) }),
      tier('http', { status: 'success', content: BYTES }),
    ]).install(ref, { expectedDigest: OTHER_DIGEST })

    if (result.success) throw new Error('expected failure')
    expect(result.error).toBeInstanceOf(VerificationFailedError)
    expect(calls).toEqual(['registry'])
  })

  test('a verification failure reported by a tier is terminal', async () => {
    const result = await installer([
      tier('registry', {
        status: 'fail',
        error: new VerificationFailedError(REF, OTHER_DIGEST, computeDigest(BYTES)),
      }),
      tier('http', { status: 'success', content: BYTES }),
    ]).install(ref)

    expect(result.success).toBe(false)
    expect(calls).toEqual(['registry'])
  })

  test('a tier that throws counts as a failure', async () => {
    const broken: InstallTier = {
      name: 'native',
      attempt: async () => {
        throw new Error('boom')
      },
    }
    const result = await installer([broken, tier('http', { status: 'success', content: BYTES })]).install(
      ref
    )

    if (!result.success) throw result.error
    expect(result.attempts[0]?.status).toBe('failed')
    expect(result.attempts[0]?.error?.message).toBe('boom')
    expect(result.attempts[0]?.error?.code).toBe('UNEXPECTED_ERROR')
  })

  test('each tier gets a scratch directory that is removed afterwards', async () => {
    const seen: { dir: string; existed: boolean }[] = []
    const attempt = vi.fn(async (_ref: ArtifactReference, context: TierContext): Promise<TierOutcome> => {
      seen.push({ dir: context.workDir, existed: fs.existsSync(context.workDir) })
      return { status: 'skip', reason: 'not applicable' }
    })

    await installer([{ name: 'native', attempt }]).install(ref)

    expect(attempt).toHaveBeenCalledTimes(1)
    expect(seen[0]?.existed).toBe(true)
    expect(path.dirname(seen[0]?.dir ?? '')).toBe(path.join(home, 'tmp'))
    expect(fs.existsSync(seen[0]?.dir ?? '')).toBe(false)
  })
})
