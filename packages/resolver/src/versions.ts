/**
 * Version ordering for cached and published tags.
 *
 * Versions that read as semver (directly, or after coercion like
 * `31.1` → `31.1.0`) are ordered by semver; anything else sorts after
 * them, lexically.
 */

import semver from 'semver'

function semverKey(version: string): string | null {
  return semver.valid(version) ?? semver.coerce(version)?.version ?? null
}

/**
 * Compare two versions, ascending.
 */
export function compareVersions(a: string, b: string): number {
  const keyA = semverKey(a)
  const keyB = semverKey(b)

  if (keyA && keyB) {
    const order = semver.compare(keyA, keyB)
    if (order !== 0) return order
  } else if (keyA) {
    return -1
  } else if (keyB) {
    return 1
  }
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Sort versions ascending without mutating the input.
 */
export function sortVersions(versions: readonly string[]): string[] {
  return [...versions].sort(compareVersions)
}
