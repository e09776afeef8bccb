/**
 * Tiered installation: native, then registry, then http.
 *
 * WHY: Each tier is tried in a fixed order until one produces bytes.
 * Skips and ordinary failures fall through to the next tier. A digest
 * mismatch does not: bytes that fail verification mean the source is
 * wrong or tampered with, and trying somewhere else would hide that.
 *
 * Bytes reach the digest store only after verification.
 */

import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import {
  AggregateResolutionError,
  type ArtifactReference,
  type CacheEntry,
  type Digest,
  type InstallFailure,
  type InstallResult,
  type Logger,
  type TierAttempt,
  type TierName,
  TierUnavailableError,
  type ToolcacheError,
  VerificationFailedError,
  createLogger,
  formatReference,
  toToolcacheError,
} from '@toolcache/core'
import { type CacheIndex, type DigestStore, computeDigest, ensureDir } from '@toolcache/store'

import type { InstallTier, TierOutcome } from './tiers/types.js'

export interface TieredInstallerOptions {
  tiers: InstallTier[]
  store: DigestStore
  index: CacheIndex
  logger?: Logger | undefined
  now?: (() => Date) | undefined
}

export interface InstallOptions {
  /** Digest the bytes must hash to, whatever the tier claims */
  expectedDigest?: Digest | undefined
}

/**
 * Runs tiers in order. Never throws: every outcome is an InstallResult.
 */
export class TieredInstaller {
  readonly tiers: readonly InstallTier[]
  private readonly store: DigestStore
  private readonly index: CacheIndex
  private readonly log: Logger
  private readonly now: () => Date

  constructor(options: TieredInstallerOptions) {
    this.tiers = options.tiers
    this.store = options.store
    this.index = options.index
    this.log = options.logger ?? createLogger('installer')
    this.now = options.now ?? (() => new Date())
  }

  async install(ref: ArtifactReference, options: InstallOptions = {}): Promise<InstallResult> {
    const reference = formatReference(ref)
    const started = performance.now()
    const attempts: TierAttempt[] = []

    const fail = (error: ToolcacheError, tierUsed: TierName | null): InstallFailure => ({
      success: false,
      reference,
      error,
      tierUsed,
      durationMs: performance.now() - started,
      attempts,
    })

    for (const tier of this.tiers) {
      const tierStarted = performance.now()
      const outcome = await this.runTier(tier, ref, options.expectedDigest)
      const durationMs = performance.now() - tierStarted

      if (outcome.status === 'skip') {
        this.log.debug('Tier skipped', { ref: reference, tier: tier.name, reason: outcome.reason })
        attempts.push({
          tier: tier.name,
          status: 'skipped',
          durationMs,
          error: new TierUnavailableError(tier.name, outcome.reason),
        })
        continue
      }

      if (outcome.status === 'fail') {
        attempts.push({ tier: tier.name, status: 'failed', durationMs, error: outcome.error })
        if (outcome.error instanceof VerificationFailedError) {
          this.log.error('Verification failed', { ref: reference, tier: tier.name })
          return fail(outcome.error, tier.name)
        }
        this.log.info('Tier failed, falling through', {
          ref: reference,
          tier: tier.name,
          error: outcome.error.message,
        })
        continue
      }

      const actual = computeDigest(outcome.content)
      const claimed = outcome.digest ?? options.expectedDigest
      for (const expected of [claimed, options.expectedDigest]) {
        if (expected && expected !== actual) {
          const error = new VerificationFailedError(reference, expected, actual)
          attempts.push({ tier: tier.name, status: 'failed', durationMs, error })
          this.log.error('Verification failed', { ref: reference, tier: tier.name, expected, actual })
          return fail(error, tier.name)
        }
      }

      let entry: CacheEntry
      try {
        entry = await this.commit(ref, outcome.content, tier.name, outcome.executable ?? true)
      } catch (err) {
        const error = toToolcacheError(err, 'STORE_ERROR')
        attempts.push({ tier: tier.name, status: 'failed', durationMs, error })
        return fail(error, tier.name)
      }

      attempts.push({ tier: tier.name, status: 'succeeded', durationMs })
      this.log.info('Installed', { ref: reference, tier: tier.name, digest: entry.digest })
      return {
        success: true,
        reference,
        digest: entry.digest,
        binaryPath: this.store.path(entry.digest),
        sizeBytes: entry.sizeBytes,
        tierUsed: tier.name,
        durationMs: performance.now() - started,
        attempts,
      }
    }

    const failures = attempts.flatMap((a) => (a.error ? [{ tier: a.tier, error: a.error }] : []))
    return fail(new AggregateResolutionError(reference, failures), null)
  }

  /**
   * Run one tier in its own scratch directory. Anything it throws
   * counts as a failure of that tier.
   */
  private async runTier(
    tier: InstallTier,
    ref: ArtifactReference,
    expectedDigest: Digest | undefined
  ): Promise<TierOutcome> {
    let workDir: string | undefined
    try {
      await ensureDir(this.store.paths.temp)
      workDir = await mkdtemp(join(this.store.paths.temp, `${tier.name}-`))
      return await tier.attempt(ref, {
        expectedDigest,
        workDir,
        logger: this.log.child({ tier: tier.name }),
      })
    } catch (err) {
      return { status: 'fail', error: toToolcacheError(err) }
    } finally {
      if (workDir) {
        await rm(workDir, { recursive: true, force: true })
      }
    }
  }

  private async commit(
    ref: ArtifactReference,
    content: Uint8Array,
    tier: TierName,
    executable: boolean
  ): Promise<CacheEntry> {
    const digest = await this.store.put(content, { executable })
    const now = this.now().toISOString()
    const entry: CacheEntry = {
      reference: ref,
      digest,
      sizeBytes: content.byteLength,
      createdAt: now,
      lastAccessedAt: now,
      sourceTier: tier,
      executable,
    }
    await this.index.put(entry)
    return entry
  }
}
