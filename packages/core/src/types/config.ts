/**
 * Raw configuration documents as written in TOML (snake_case).
 *
 * These are validated by JSON Schema and then normalized into the
 * camelCase types the rest of the code uses.
 */

import type { CacheStrategyName } from './team.js'

export interface SettingsFile {
  cache?: {
    max_size_mb?: number
    retention_days?: number
  }
  network?: {
    timeout_ms?: number
    retries?: number
  }
  native?: {
    enabled?: boolean
  }
  registries?: Array<{
    ecosystem: string
    url: string
  }>
  downloads?: Array<{
    repository: string
    url: string
    checksum_url?: string
    executable?: boolean
    checksums?: Record<string, string>
  }>
}

export interface TeamFile {
  name: string
  members?: string[]
  cache_strategy?: CacheStrategyName
  bundle_dependencies?: string[]
}
