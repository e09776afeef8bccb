/**
 * Engine settings (config.toml) parser
 */

import { readFile } from 'node:fs/promises'
import TOML from '@iarna/toml'

import { ConfigParseError, ConfigValidationError, errnoCode } from '../errors.js'
import { validateSettingsFile } from '../schemas/index.js'
import type { SettingsFile } from '../types/config.js'
import { type Digest, isDigest } from '../types/refs.js'

/** Default filename for engine settings, under the toolcache home */
export const SETTINGS_FILENAME = 'config.toml'

const MB = 1024 * 1024

/** Registry serving one ecosystem over the OCI distribution API */
export interface RegistrySource {
  ecosystem: string
  url: string
}

/**
 * Direct download source for one repository (`ecosystem/namespace/name`).
 *
 * `url` and `checksumUrl` are templates over `{ecosystem}`, `{namespace}`,
 * `{name}`, `{version}`, `{platform}` and `{tag}`.
 */
export interface DownloadSource {
  repository: string
  url: string
  checksumUrl?: string | undefined
  executable: boolean
  /** Known digests keyed by version tag (`31.1-linux-x86_64`) */
  checksums: Record<string, Digest>
}

export interface Settings {
  cache: {
    maxSizeBytes: number
    retentionDays: number
  }
  network: {
    timeoutMs: number
    retries: number
  }
  native: {
    enabled: boolean
  }
  registries: RegistrySource[]
  downloads: DownloadSource[]
}

export const DEFAULT_SETTINGS: Settings = {
  cache: { maxSizeBytes: 1000 * MB, retentionDays: 30 },
  network: { timeoutMs: 30_000, retries: 3 },
  native: { enabled: true },
  registries: [],
  downloads: [],
}

function normalizeChecksums(raw: Record<string, string> | undefined): Record<string, Digest> {
  const checksums: Record<string, Digest> = {}
  for (const [tag, value] of Object.entries(raw ?? {})) {
    // Schema enforces the pattern; the guard narrows the type
    if (isDigest(value)) {
      checksums[tag] = value
    }
  }
  return checksums
}

/** Convert a validated raw document into Settings, filling defaults */
export function normalizeSettings(file: SettingsFile): Settings {
  return {
    cache: {
      maxSizeBytes:
        file.cache?.max_size_mb !== undefined
          ? Math.floor(file.cache.max_size_mb * MB)
          : DEFAULT_SETTINGS.cache.maxSizeBytes,
      retentionDays: file.cache?.retention_days ?? DEFAULT_SETTINGS.cache.retentionDays,
    },
    network: {
      timeoutMs: file.network?.timeout_ms ?? DEFAULT_SETTINGS.network.timeoutMs,
      retries: file.network?.retries ?? DEFAULT_SETTINGS.network.retries,
    },
    native: {
      enabled: file.native?.enabled ?? DEFAULT_SETTINGS.native.enabled,
    },
    registries: (file.registries ?? []).map((r) => ({
      ecosystem: r.ecosystem,
      url: r.url.replace(/\/+$/, ''),
    })),
    downloads: (file.downloads ?? []).map((d) => ({
      repository: d.repository,
      url: d.url,
      checksumUrl: d.checksum_url,
      executable: d.executable ?? true,
      checksums: normalizeChecksums(d.checksums),
    })),
  }
}

/**
 * Parse config.toml content into validated Settings
 *
 * @param content - Raw TOML string content
 * @param filePath - Path to the file (for error messages)
 * @throws ConfigParseError if TOML parsing fails
 * @throws ConfigValidationError if schema validation fails
 */
export function parseSettingsToml(content: string, filePath?: string): Settings {
  const source = filePath ?? SETTINGS_FILENAME

  let parsed: unknown
  try {
    parsed = TOML.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to parse TOML: ${message}`, source)
  }

  const result = validateSettingsFile(parsed)
  if (!result.valid) {
    throw new ConfigValidationError(`Invalid ${SETTINGS_FILENAME}`, source, result.errors)
  }

  return normalizeSettings(result.data)
}

/**
 * Read settings from disk. A missing file yields the defaults.
 */
export async function readSettings(filePath: string): Promise<Settings> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      return DEFAULT_SETTINGS
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to read file: ${message}`, filePath)
  }
  return parseSettingsToml(content, filePath)
}
