/**
 * Team cache coordinator.
 *
 * WHY: The engine reports every successful pull made for a team. The
 * coordinator persists those events without ever making the pull wait,
 * and answers the team-level questions built on them: what is used
 * together, what should be bundled, when to warm the cache. Every call
 * names its team; one coordinator serves any number of teams.
 */

import { readFile } from 'node:fs/promises'
import {
  type Bundle,
  BundleError,
  type BundleMember,
  type BundleProposal,
  type CacheStrategyName,
  type CoOccurrencePair,
  type Logger,
  type SourceTier,
  StoreError,
  type TeamConfig,
  type UsageEvent,
  type UsageSink,
  createLogger,
  formatReference,
  toToolcacheError,
} from '@toolcache/core'
import type { ArtifactEngine, PullOptions } from '@toolcache/engine'
import { parseReference } from '@toolcache/resolver'
import { type EvictionResult, computeDigest } from '@toolcache/store'

import {
  BUNDLE_ECOSYSTEM,
  bundleReference,
  configuredBundle,
  createManifest,
  isBundleReference,
  parseManifest,
  proposeBundle,
  serializeManifest,
} from './bundles.js'
import { coOccurrence } from './co-occurrence.js'
import { type CacheStrategy, strategyFor } from './strategy.js'
import { UsageLog } from './usage-log.js'
import { type WarmSlot, warmSchedule } from './warming.js'

const MINUTE_MS = 60 * 1000
const DAY_MS = 24 * 60 * MINUTE_MS

export type UsageListener = (event: UsageEvent) => void

export interface TeamCacheCoordinatorOptions {
  engine: ArtifactEngine
  usageLog?: UsageLog | undefined
  logger?: Logger | undefined
  now?: (() => Date) | undefined
}

/** Period of events an analysis looks at */
export interface AnalysisWindow {
  /** Default: the team strategy's analysis window before now */
  since?: Date | undefined
  until?: Date | undefined
}

export interface InstalledMember {
  reference: string
  path: string
  tierUsed: SourceTier
}

export interface BundleInstallResult {
  bundle: Bundle
  members: InstalledMember[]
}

export type PrewarmResult =
  | { reference: string; ok: true; tierUsed: SourceTier }
  | { reference: string; ok: false; error: string }

export class TeamCacheCoordinator implements UsageSink {
  readonly engine: ArtifactEngine
  readonly usageLog: UsageLog
  private readonly log: Logger
  private readonly now: () => Date
  private readonly strategies = new Map<string, CacheStrategy>()
  private readonly listeners = new Set<UsageListener>()
  private readonly pending = new Map<string, UsageEvent[]>()
  private writes: Promise<void> = Promise.resolve()
  private drainScheduled = false
  private detach: (() => void) | null = null

  constructor(options: TeamCacheCoordinatorOptions) {
    this.engine = options.engine
    this.usageLog = options.usageLog ?? new UsageLog({ paths: options.engine.paths })
    this.log = options.logger ?? createLogger('team')
    this.now = options.now ?? (() => new Date())
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  /** Apply a team's configured strategy */
  configure(config: TeamConfig): void {
    this.strategies.set(config.name, strategyFor(config.cacheStrategy))
  }

  setStrategy(team: string, name: CacheStrategyName): void {
    this.strategies.set(team, strategyFor(name))
  }

  /** Strategy of a team; balanced unless configured */
  strategyOf(team: string): CacheStrategy {
    return this.strategies.get(team) ?? strategyFor('balanced')
  }

  /** Start receiving usage events from the engine */
  attach(): void {
    if (!this.detach) {
      this.detach = this.engine.addUsageSink(this)
    }
  }

  /** Stop receiving events and wait for pending writes */
  async close(): Promise<void> {
    this.detach?.()
    this.detach = null
    await this.flush()
  }

  // ==========================================================================
  // Usage events
  // ==========================================================================

  /**
   * Queue an event for the team's usage log. Returns immediately;
   * listeners are called asynchronously.
   */
  record(event: UsageEvent): void {
    const batch = this.pending.get(event.team) ?? []
    batch.push(event)
    this.pending.set(event.team, batch)

    if (!this.drainScheduled) {
      this.drainScheduled = true
      this.writes = this.writes.then(() => this.drain())
    }

    for (const listener of this.listeners) {
      queueMicrotask(() => {
        try {
          listener(event)
        } catch (err) {
          this.log.warn('Usage listener failed', { error: String(err) })
        }
      })
    }
  }

  /** Register a listener for every recorded event. Returns the unsubscribe function. */
  subscribe(listener: UsageListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /** Wait until every recorded event has been written */
  async flush(): Promise<void> {
    await this.writes
  }

  private async drain(): Promise<void> {
    this.drainScheduled = false
    const batches = [...this.pending.entries()]
    this.pending.clear()
    for (const [team, events] of batches) {
      try {
        await this.usageLog.append(team, events)
      } catch (err) {
        this.log.warn('Failed to write usage events', {
          team,
          count: events.length,
          error: toToolcacheError(err).message,
        })
      }
    }
  }

  /**
   * Recorded events of a team within a window, pending ones included.
   */
  async events(team: string, window: AnalysisWindow = {}): Promise<UsageEvent[]> {
    await this.flush()
    const since =
      window.since ?? new Date(this.now().getTime() - this.strategyOf(team).analysisWindowMs)
    return this.usageLog.read(team, { since, until: window.until })
  }

  /**
   * Remove usage events older than the retention period (default: the
   * team strategy's). Returns the number removed.
   */
  async prune(team: string, retentionDays?: number): Promise<number> {
    await this.flush()
    const days = retentionDays ?? this.strategyOf(team).retentionDays
    const removed = await this.usageLog.prune(team, new Date(this.now().getTime() - days * DAY_MS))
    this.log.info('Pruned usage events', { team, removed })
    return removed
  }

  // ==========================================================================
  // Analysis
  // ==========================================================================

  async coOccurrence(team: string, window: AnalysisWindow = {}): Promise<CoOccurrencePair[]> {
    const events = await this.events(team, window)
    return coOccurrence(events, { pairWindowMs: this.strategyOf(team).pairWindowMs })
  }

  /** A bundle worth creating, or null. Nothing is written. */
  async proposeBundle(team: string, window: AnalysisWindow = {}): Promise<BundleProposal | null> {
    const strategy = this.strategyOf(team)
    return proposeBundle(team, await this.coOccurrence(team, window), {
      threshold: strategy.bundleThreshold,
      minUsage: strategy.bundleMinUsage,
      maxBundleSize: strategy.maxBundleSize,
    })
  }

  /** The bundle a team declares in its configuration, or null */
  configuredBundle(config: TeamConfig): BundleProposal | null {
    return configuredBundle(config)
  }

  async warmSchedule(team: string, window: AnalysisWindow = {}): Promise<WarmSlot[]> {
    const strategy = this.strategyOf(team)
    return warmSchedule(await this.events(team, window), {
      topHours: strategy.warmHours,
      leadMinutes: strategy.leadMinutes,
      referencesPerSlot: strategy.preloadCount,
      now: this.now(),
    })
  }

  /**
   * When a schedule computed now goes stale and usage should be analyzed
   * again, per the team strategy's sync frequency.
   */
  nextSync(team: string): Date {
    return new Date(this.now().getTime() + this.strategyOf(team).syncFrequencyMinutes * MINUTE_MS)
  }

  // ==========================================================================
  // Bundles
  // ==========================================================================

  /**
   * Pull every member, then publish a manifest pinning each to its digest.
   *
   * @throws BundleError if a member cannot be pulled or the bundle
   *   reference is taken by a different manifest
   */
  async materializeBundle(proposal: BundleProposal): Promise<Bundle> {
    const members: BundleMember[] = []
    for (const reference of proposal.memberReferences) {
      try {
        const pulled = await this.engine.pull(reference)
        members.push({ reference: pulled.reference, digest: pulled.digest })
      } catch (err) {
        throw new BundleError(`member ${reference} could not be pulled`, proposal.name, {
          cause: err,
        })
      }
    }

    const manifest = createManifest(proposal, members)
    const content = Buffer.from(serializeManifest(manifest))
    const digest = computeDigest(content)
    const ref = bundleReference(proposal.team, proposal.name, digest)

    let createdAt: string
    try {
      createdAt = (await this.engine.publish(ref, content)).createdAt
    } catch (err) {
      if (err instanceof StoreError) {
        throw new BundleError(`${formatReference(ref)} holds a different manifest`, proposal.name, {
          cause: err,
        })
      }
      throw err
    }

    this.log.info('Published bundle', { team: proposal.team, bundle: formatReference(ref) })
    return {
      name: manifest.name,
      team: manifest.team,
      reference: formatReference(ref),
      memberReferences: manifest.members.map((m) => m.reference),
      digest,
      description: manifest.description,
      createdAt,
    }
  }

  /** Published bundles of a team, by name then creation time */
  async listBundles(team: string): Promise<Bundle[]> {
    const entries = (await this.engine.index.list()).filter(
      (entry) => entry.reference.ecosystem === BUNDLE_ECOSYSTEM && entry.reference.namespace === team
    )

    const bundles: Bundle[] = []
    for (const entry of entries) {
      const reference = formatReference(entry.reference)
      try {
        const manifest = parseManifest((await this.engine.read(reference)).toString('utf8'), reference)
        bundles.push({
          name: manifest.name,
          team: manifest.team,
          reference,
          memberReferences: manifest.members.map((m) => m.reference),
          digest: entry.digest,
          description: manifest.description,
          createdAt: entry.createdAt,
        })
      } catch (err) {
        this.log.warn('Skipping unreadable bundle', {
          bundle: reference,
          error: toToolcacheError(err).message,
        })
      }
    }
    return bundles.sort((a, b) => a.name.localeCompare(b.name) || a.createdAt.localeCompare(b.createdAt))
  }

  /**
   * Pull a bundle and every member at its pinned digest.
   *
   * @throws BundleError for a reference outside the bundle namespace or
   *   an invalid manifest
   */
  async installBundle(
    reference: string,
    options: Pick<PullOptions, 'team' | 'actor' | 'signal'> = {}
  ): Promise<BundleInstallResult> {
    const ref = parseReference(reference)
    if (!isBundleReference(ref)) {
      throw new BundleError('not a bundle reference', reference)
    }

    const pulled = await this.engine.pull(ref, { signal: options.signal })
    const manifest = parseManifest(await readFile(pulled.path, 'utf8'), pulled.reference)

    const members: InstalledMember[] = []
    for (const member of manifest.members) {
      const result = await this.engine.pull(member.reference, {
        ...options,
        expectedDigest: member.digest,
      })
      members.push({ reference: result.reference, path: result.path, tierUsed: result.tierUsed })
    }

    return {
      bundle: {
        name: manifest.name,
        team: manifest.team,
        reference: pulled.reference,
        memberReferences: manifest.members.map((m) => m.reference),
        digest: pulled.digest,
        description: manifest.description,
        createdAt: (await this.engine.info(ref)).createdAt,
      },
      members,
    }
  }

  // ==========================================================================
  // Warming
  // ==========================================================================

  /**
   * Pull every reference of a schedule slot. Failures are reported per
   * reference; one failing reference does not stop the others.
   */
  async prewarm(slot: WarmSlot, options: Pick<PullOptions, 'signal'> = {}): Promise<PrewarmResult[]> {
    const settled = await Promise.allSettled(
      slot.references.map((reference) => this.engine.pull(reference, options))
    )
    return settled.map((outcome, i): PrewarmResult => {
      const reference = slot.references[i] ?? ''
      if (outcome.status === 'fulfilled') {
        return { reference, ok: true, tierUsed: outcome.value.tierUsed }
      }
      return { reference, ok: false, error: toToolcacheError(outcome.reason).message }
    })
  }

  /**
   * Evict down to the team strategy's cache size.
   */
  async enforceCacheSize(team: string, dryRun = false): Promise<EvictionResult> {
    return this.engine.evict({
      policy: { kind: 'size', maxBytes: this.strategyOf(team).maxCacheSizeBytes },
      dryRun,
    })
  }
}
