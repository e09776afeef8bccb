/**
 * Artifact reference types for toolcache
 *
 * A reference is: `<ecosystem>/<namespace>/<name>:<version>[-<platform>]`
 *
 * - ecosystem: the distribution family (`github`, `cargo`, `go`, `buf`, ...)
 * - namespace: one or more `/`-separated segments (`protocolbuffers`, `golang.org/x/tools`)
 * - name: the last path segment
 * - version: everything after `:` up to an optional platform suffix
 * - platform: `<os>-<arch>`, e.g. `linux-x86_64`
 *
 * Two references that differ only in platform are distinct artifacts.
 */

/** SHA-256 content digest in the form `sha256:<64-hex-chars>` */
export type Digest = `sha256:${string}`

/** Parsed artifact reference */
export interface ArtifactReference {
  readonly ecosystem: string
  readonly namespace: string
  readonly name: string
  readonly version: string
  readonly platform?: string | undefined
}

/** Canonical reference string: `ecosystem/namespace/name:version[-platform]` */
export type ReferenceString = string

/** Repository part of a reference (`ecosystem/namespace/name`), used by `list` */
export type RepositoryString = string

// ============================================================================
// Patterns
// ============================================================================

export const PLATFORM_OS = ['linux', 'darwin', 'windows', 'freebsd'] as const
export const PLATFORM_ARCH = ['x86_64', 'aarch64', 'arm64', 'amd64', 'i386', 'armv7'] as const

const DIGEST_PATTERN = /^sha256:[0-9a-f]{64}$/
const SEGMENT_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/
const VERSION_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._+-]*$/
const PLATFORM_PATTERN = new RegExp(`^(${PLATFORM_OS.join('|')})-(${PLATFORM_ARCH.join('|')})$`)
const VERSION_WITH_PLATFORM_PATTERN = new RegExp(
  `^(.+)-((?:${PLATFORM_OS.join('|')})-(?:${PLATFORM_ARCH.join('|')}))$`
)

// ============================================================================
// Digests
// ============================================================================

export function isDigest(value: string): value is Digest {
  return DIGEST_PATTERN.test(value)
}

export function asDigest(value: string): Digest {
  if (!isDigest(value)) {
    throw new Error(`Invalid digest: "${value}" (expected sha256:<64 hex chars>)`)
  }
  return value
}

/** Strip the algorithm tag, leaving the 64-char hex. */
export function digestHex(digest: Digest): string {
  return digest.slice('sha256:'.length)
}

// ============================================================================
// Reference components
// ============================================================================

export function isPlatform(value: string): boolean {
  return PLATFORM_PATTERN.test(value)
}

export function isValidSegment(value: string): boolean {
  return SEGMENT_PATTERN.test(value)
}

export function isValidVersion(value: string): boolean {
  return VERSION_PATTERN.test(value)
}

/**
 * Split a version tail into version and platform.
 *
 * `31.1-linux-x86_64` → `{ version: '31.1', platform: 'linux-x86_64' }`
 * `1.0.0-rc1` → `{ version: '1.0.0-rc1' }`
 */
export function splitPlatform(tail: string): { version: string; platform?: string | undefined } {
  const match = tail.match(VERSION_WITH_PLATFORM_PATTERN)
  const version = match?.[1]
  const platform = match?.[2]
  if (version && platform) {
    return { version, platform }
  }
  return { version: tail }
}

/** Version tag as published: `version` or `version-platform`. */
export function versionTag(ref: ArtifactReference): string {
  return ref.platform ? `${ref.version}-${ref.platform}` : ref.version
}

/** Format a reference to its canonical string form. */
export function formatReference(ref: ArtifactReference): ReferenceString {
  return `${repositoryOf(ref)}:${versionTag(ref)}`
}

/** `ecosystem/namespace/name` for a reference. */
export function repositoryOf(ref: ArtifactReference): RepositoryString {
  return `${ref.ecosystem}/${ref.namespace}/${ref.name}`
}
