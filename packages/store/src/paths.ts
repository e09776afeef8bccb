/**
 * Path management for toolcache storage.
 *
 * WHY: All toolcache data lives under TOOLCACHE_HOME (~/.toolcache by
 * default). This module provides consistent path builders for every
 * storage location so no other code hand-builds cache paths.
 */

import { mkdir } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { type Digest, digestHex } from '@toolcache/core'

/**
 * Default TOOLCACHE_HOME location.
 */
export const DEFAULT_TOOLCACHE_HOME = join(homedir(), '.toolcache')

/**
 * Get the TOOLCACHE_HOME directory path.
 * Uses the TOOLCACHE_HOME env var if set, otherwise ~/.toolcache
 */
export function getToolcacheHome(): string {
  return process.env['TOOLCACHE_HOME'] ?? DEFAULT_TOOLCACHE_HOME
}

/**
 * Storage structure under TOOLCACHE_HOME:
 *
 * ~/.toolcache/
 * ├── config.toml               # Engine settings
 * ├── blobs/                    # Content-addressed artifact bytes
 * │   └── <hh>/<hex>            # Two-level fan-out on the digest
 * ├── index/
 * │   ├── refs/                 # One record per reference
 * │   │   └── <encoded-ref>.json
 * │   └── digests/              # Back-links: which references share a blob
 * │       └── <hh>/<hex>/<encoded-ref>
 * ├── teams/
 * │   └── <team>/
 * │       ├── usage.jsonl       # Append-only usage events
 * │       └── usage.lock
 * ├── metrics/
 * │   └── resolutions.jsonl     # One line per resolution
 * └── tmp/                      # Staging for atomic writes
 */

/**
 * Encode a reference string into a single safe filename.
 */
export function encodeRefKey(ref: string): string {
  return encodeURIComponent(ref)
}

export function decodeRefKey(key: string): string {
  return decodeURIComponent(key)
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true })
}

/**
 * Options for path resolution.
 */
export interface PathOptions {
  /** Override TOOLCACHE_HOME */
  home?: string | undefined
}

/**
 * Path resolver for one toolcache home.
 */
export class PathResolver {
  readonly home: string

  constructor(options: PathOptions = {}) {
    this.home = options.home ?? getToolcacheHome()
  }

  get settings(): string {
    return join(this.home, 'config.toml')
  }

  get blobs(): string {
    return join(this.home, 'blobs')
  }

  get index(): string {
    return join(this.home, 'index')
  }

  get refIndex(): string {
    return join(this.index, 'refs')
  }

  get digestIndex(): string {
    return join(this.index, 'digests')
  }

  get teams(): string {
    return join(this.home, 'teams')
  }

  get metrics(): string {
    return join(this.home, 'metrics')
  }

  get resolutionLog(): string {
    return join(this.metrics, 'resolutions.jsonl')
  }

  get temp(): string {
    return join(this.home, 'tmp')
  }

  blob(digest: Digest): string {
    const hex = digestHex(digest)
    return join(this.blobs, hex.slice(0, 2), hex)
  }

  refRecord(ref: string): string {
    return join(this.refIndex, `${encodeRefKey(ref)}.json`)
  }

  digestLinks(digest: Digest): string {
    const hex = digestHex(digest)
    return join(this.digestIndex, hex.slice(0, 2), hex)
  }

  digestLink(digest: Digest, ref: string): string {
    return join(this.digestLinks(digest), encodeRefKey(ref))
  }

  teamDir(team: string): string {
    return join(this.teams, encodeURIComponent(team))
  }

  usageLog(team: string): string {
    return join(this.teamDir(team), 'usage.jsonl')
  }

  usageLock(team: string): string {
    return join(this.teamDir(team), 'usage.lock')
  }

  async ensureAll(): Promise<void> {
    await Promise.all([
      ensureDir(this.blobs),
      ensureDir(this.refIndex),
      ensureDir(this.digestIndex),
      ensureDir(this.teams),
      ensureDir(this.metrics),
      ensureDir(this.temp),
    ])
  }
}
