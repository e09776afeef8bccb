/**
 * The artifact engine: pull, list, info, clear, evict.
 *
 * WHY: Callers deal in reference strings and paths. The engine wires the
 * store, resolver, installer and fetch coordinator together, re-verifies
 * cache hits before handing out a path, heals corrupt entries by
 * re-fetching, and reports every resolution to whoever listens (team
 * usage, performance counters).
 */

import {
  type ArtifactReference,
  type CacheEntry,
  CacheCorruptionError,
  type Digest,
  type InstallResult,
  type Logger,
  NotFoundError,
  type ResolutionRecord,
  type ResolutionRecorder,
  type Settings,
  type SourceTier,
  StoreError,
  type TierAttempt,
  TierUnavailableError,
  type UsageSink,
  createLogger,
  formatReference,
  readSettings,
} from '@toolcache/core'
import { ReferenceResolver, parseReference, parseRepository, sortVersions } from '@toolcache/resolver'
import {
  CacheIndex,
  DigestStore,
  type EvictionPolicy,
  type EvictionResult,
  PathResolver,
  clearEntries,
  computeDigest,
  evict,
} from '@toolcache/store'

import type { CommandRunner } from './exec.js'
import { createTiers } from './factory.js'
import { FetchCoordinator } from './fetch-coordinator.js'
import { type FetchFn, RegistryClient } from './registry-client.js'
import { TieredInstaller } from './tiered-installer.js'
import type { InstallTier } from './tiers/types.js'

const DAY_MS = 24 * 60 * 60 * 1000

export interface ArtifactEngineOptions {
  paths: PathResolver
  settings: Settings
  /** Replaces the default native → registry → http chain */
  tiers?: InstallTier[] | undefined
  fetch?: FetchFn | undefined
  runner?: CommandRunner | undefined
  hostPlatform?: string | null | undefined
  logger?: Logger | undefined
  now?: (() => Date) | undefined
}

export interface OpenEngineOptions extends Omit<ArtifactEngineOptions, 'paths' | 'settings'> {
  /** Toolcache home (default: TOOLCACHE_HOME or ~/.toolcache) */
  home?: string | undefined
  /** Settings override; read from `<home>/config.toml` when absent */
  settings?: Settings | undefined
}

export interface PullOptions {
  /** Digest the artifact must have */
  expectedDigest?: Digest | undefined
  /** Team the pull is made for; recorded as a usage event */
  team?: string | undefined
  /** Who made the pull (default: "anonymous") */
  actor?: string | undefined
  /** Abort to stop waiting */
  signal?: AbortSignal | undefined
}

export interface PullResult {
  reference: string
  /** Path of the verified blob */
  path: string
  digest: Digest
  sizeBytes: number
  tierUsed: SourceTier
  durationMs: number
  attempts: TierAttempt[]
  /** Problems healed along the way */
  warnings: string[]
}

export interface EvictOptions {
  /** Default: the configured maximum size and retention */
  policy?: EvictionPolicy | undefined
  dryRun?: boolean | undefined
}

export class ArtifactEngine {
  readonly paths: PathResolver
  readonly settings: Settings
  readonly store: DigestStore
  readonly index: CacheIndex
  readonly resolver: ReferenceResolver
  readonly installer: TieredInstaller
  readonly coordinator: FetchCoordinator
  private readonly fetch: FetchFn | undefined
  private readonly log: Logger
  private readonly now: () => Date
  private readonly usageSinks = new Set<UsageSink>()
  private readonly recorders = new Set<ResolutionRecorder>()

  constructor(options: ArtifactEngineOptions) {
    this.paths = options.paths
    this.settings = options.settings
    this.fetch = options.fetch
    this.log = options.logger ?? createLogger('engine')
    this.now = options.now ?? (() => new Date())

    this.store = new DigestStore({ paths: this.paths })
    this.index = new CacheIndex({ paths: this.paths, logger: this.log.child({ component: 'index' }) })
    this.resolver = new ReferenceResolver({
      store: this.store,
      index: this.index,
      logger: this.log,
      now: this.now,
    })
    this.installer = new TieredInstaller({
      tiers:
        options.tiers ??
        createTiers(this.settings, {
          fetch: options.fetch,
          runner: options.runner,
          hostPlatform: options.hostPlatform,
        }),
      store: this.store,
      index: this.index,
      logger: this.log,
      now: this.now,
    })
    this.coordinator = new FetchCoordinator({
      resolver: this.resolver,
      installer: this.installer,
      logger: this.log,
    })
  }

  /**
   * Open the engine for a home directory, reading its config.toml.
   */
  static async open(options: OpenEngineOptions = {}): Promise<ArtifactEngine> {
    const { home, settings, ...rest } = options
    const paths = new PathResolver({ home })
    await paths.ensureAll()
    return new ArtifactEngine({
      ...rest,
      paths,
      settings: settings ?? (await readSettings(paths.settings)),
    })
  }

  // ==========================================================================
  // Listeners
  // ==========================================================================

  /** Receive a usage event for every successful pull made for a team */
  addUsageSink(sink: UsageSink): () => void {
    this.usageSinks.add(sink)
    return () => {
      this.usageSinks.delete(sink)
    }
  }

  /** Receive a sample for every completed pull */
  addRecorder(recorder: ResolutionRecorder): () => void {
    this.recorders.add(recorder)
    return () => {
      this.recorders.delete(recorder)
    }
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /**
   * Resolve a reference to a verified local path, installing it on a miss.
   *
   * @throws RefParseError for a malformed reference
   * @throws VerificationFailedError when bytes do not match the expected digest
   * @throws AggregateResolutionError when every tier failed
   * @throws ResolutionCancelledError when the signal aborts
   */
  async pull(input: string | ArtifactReference, options: PullOptions = {}): Promise<PullResult> {
    const ref = typeof input === 'string' ? parseReference(input) : input
    const reference = formatReference(ref)
    const acquireOptions = { expectedDigest: options.expectedDigest, signal: options.signal }
    const warnings: string[] = []

    let result = await this.coordinator.acquire(ref, acquireOptions)
    if (result.success && result.tierUsed === 'cache') {
      const problem = await this.checkCached(ref, result.digest)
      if (problem) {
        if (problem instanceof CacheCorruptionError) {
          warnings.push(`Discarded corrupt cache entry for ${reference} (${problem.message})`)
        }
        result = await this.coordinator.acquire(ref, acquireOptions)
      }
    }

    this.report(result, options)

    if (!result.success) {
      throw result.error
    }
    return {
      reference,
      path: result.binaryPath,
      digest: result.digest,
      sizeBytes: result.sizeBytes,
      tierUsed: result.tierUsed,
      durationMs: result.durationMs,
      attempts: result.attempts,
      warnings,
    }
  }

  /**
   * Store locally built bytes under a reference.
   *
   * Publishing the same bytes again is a no-op. A reference never moves
   * to different bytes.
   *
   * @throws StoreError if the reference already points at other bytes
   */
  async publish(
    input: string | ArtifactReference,
    content: Uint8Array,
    options: { executable?: boolean | undefined } = {}
  ): Promise<CacheEntry> {
    const ref = typeof input === 'string' ? parseReference(input) : input
    const reference = formatReference(ref)
    const digest = computeDigest(content)

    const existing = await this.index.get(ref)
    if (existing && (await this.store.has(existing.digest))) {
      if (existing.digest !== digest) {
        throw new StoreError(
          `${reference} already points at ${existing.digest}`,
          'IMMUTABLE_REFERENCE'
        )
      }
      return existing
    }

    const executable = options.executable ?? false
    await this.store.put(content, { executable })
    const now = this.now().toISOString()
    const entry: CacheEntry = {
      reference: ref,
      digest,
      sizeBytes: content.byteLength,
      createdAt: now,
      lastAccessedAt: now,
      sourceTier: 'local',
      executable,
    }
    await this.index.put(entry)
    return entry
  }

  /** Read a cached artifact's bytes, verified */
  async read(input: string | ArtifactReference): Promise<Buffer> {
    const entry = await this.info(input)
    return this.store.get(entry.digest)
  }

  /**
   * Version tags cached locally for `ecosystem/namespace/name`.
   */
  async list(repository: string): Promise<string[]> {
    const { ecosystem, namespace, name } = parseRepository(repository)
    return this.resolver.listVersions(`${ecosystem}/${namespace}/${name}`)
  }

  /**
   * Version tags the ecosystem's registry publishes for a repository.
   *
   * @throws TierUnavailableError when no registry serves the ecosystem
   */
  async listRemote(repository: string): Promise<string[]> {
    const { ecosystem, namespace, name } = parseRepository(repository)
    const source = this.settings.registries.find((r) => r.ecosystem === ecosystem)
    if (!source) {
      throw new TierUnavailableError('registry', `no registry configured for ecosystem "${ecosystem}"`)
    }
    const client = new RegistryClient({
      baseUrl: source.url,
      fetch: this.fetch,
      timeoutMs: this.settings.network.timeoutMs,
    })
    return sortVersions(await client.listTags(`${namespace}/${name}`))
  }

  /**
   * Cache entry for a reference. Does not count as an access.
   *
   * @throws NotFoundError when the reference is not cached
   */
  async info(input: string | ArtifactReference): Promise<CacheEntry> {
    const ref = typeof input === 'string' ? parseReference(input) : input
    const entry = await this.resolver.peek(ref)
    if (!entry) {
      throw new NotFoundError(formatReference(ref), 'not cached')
    }
    return entry
  }

  /**
   * Remove entries created more than `olderThanDays` ago (all entries when
   * absent) and any blobs left unreferenced. Returns the entries removed.
   */
  async clear(olderThanDays?: number): Promise<number> {
    const olderThan =
      olderThanDays === undefined ? undefined : new Date(this.now().getTime() - olderThanDays * DAY_MS)
    const result = await clearEntries(this.store, this.index, { olderThan })
    this.log.info('Cleared cache entries', {
      entriesRemoved: result.entriesRemoved,
      bytesFreed: result.bytesFreed,
    })
    return result.entriesRemoved
  }

  /**
   * Evict least recently used blobs.
   */
  async evict(options: EvictOptions = {}): Promise<EvictionResult> {
    const policy = options.policy ?? {
      kind: 'limits',
      maxBytes: this.settings.cache.maxSizeBytes,
      maxAgeMs: this.settings.cache.retentionDays * DAY_MS,
    }
    return evict(this.store, this.index, { policy, dryRun: options.dryRun, now: this.now() })
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Re-hash a cache hit. A corrupt blob is discarded with every reference
   * to it. Returns the problem found, or null when the blob is sound.
   */
  private async checkCached(
    ref: ArtifactReference,
    digest: Digest
  ): Promise<CacheCorruptionError | NotFoundError | null> {
    try {
      await this.store.verifyStored(digest)
      return null
    } catch (err) {
      if (err instanceof CacheCorruptionError) {
        this.log.warn('Discarding corrupt cache entry', {
          ref: formatReference(ref),
          digest,
          actual: err.actual,
        })
        for (const other of await this.index.referencesFor(digest)) {
          await this.index.remove(other)
        }
        await this.index.remove(ref)
        await this.store.remove(digest)
        return err
      }
      if (err instanceof NotFoundError) {
        // Evicted between lookup and verification
        await this.index.remove(ref)
        return err
      }
      throw err
    }
  }

  private report(result: InstallResult, options: PullOptions): void {
    const timestamp = this.now().toISOString()
    const record: ResolutionRecord = result.success
      ? {
          reference: result.reference,
          team: options.team,
          tier: result.tierUsed,
          outcome: result.tierUsed === 'cache' ? 'hit' : 'fetched',
          durationMs: result.durationMs,
          sizeBytes: result.sizeBytes,
          timestamp,
        }
      : {
          reference: result.reference,
          team: options.team,
          tier: result.tierUsed,
          outcome: 'failed',
          durationMs: result.durationMs,
          sizeBytes: 0,
          timestamp,
          errorCode: result.error.code,
        }

    for (const recorder of this.recorders) {
      try {
        recorder.recordResolution(record)
      } catch (err) {
        this.log.warn('Resolution recorder failed', { error: String(err) })
      }
    }

    if (!result.success || !options.team) return
    const event = {
      team: options.team,
      reference: result.reference,
      actor: options.actor ?? 'anonymous',
      timestamp,
    }
    for (const sink of this.usageSinks) {
      try {
        sink.record(event)
      } catch (err) {
        this.log.warn('Usage sink failed', { error: String(err) })
      }
    }
  }
}
