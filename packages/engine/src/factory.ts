/**
 * Build the default tier chain from settings.
 */

import type { Settings } from '@toolcache/core'

import type { CommandRunner } from './exec.js'
import type { FetchFn } from './registry-client.js'
import { HttpTier } from './tiers/http.js'
import { NativeTier } from './tiers/native.js'
import { RegistryTier } from './tiers/registry.js'
import type { InstallTier } from './tiers/types.js'

export interface TierDependencies {
  fetch?: FetchFn | undefined
  runner?: CommandRunner | undefined
  hostPlatform?: string | null | undefined
  /** Backoff sleep override for the http tier */
  sleep?: ((ms: number) => Promise<void>) | undefined
}

/** native → registry → http */
export function createTiers(settings: Settings, deps: TierDependencies = {}): InstallTier[] {
  return [
    new NativeTier({
      enabled: settings.native.enabled,
      runner: deps.runner,
      hostPlatform: deps.hostPlatform,
    }),
    new RegistryTier({
      registries: settings.registries,
      fetch: deps.fetch,
      timeoutMs: settings.network.timeoutMs,
    }),
    new HttpTier({
      downloads: settings.downloads,
      fetch: deps.fetch,
      timeoutMs: settings.network.timeoutMs,
      retries: settings.network.retries,
      sleep: deps.sleep,
    }),
  ]
}
