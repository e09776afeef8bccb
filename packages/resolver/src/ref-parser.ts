/**
 * Artifact reference parsing.
 *
 * Syntax: `<ecosystem>/<namespace...>/<name>:<version>[-<os>-<arch>]`
 */

import {
  type ArtifactReference,
  RefParseError,
  formatReference,
  isValidSegment,
  isValidVersion,
  splitPlatform,
} from '@toolcache/core'

/** Parsed repository (`ecosystem/namespace/name`) */
export interface RepositoryRef {
  ecosystem: string
  namespace: string
  name: string
}

/**
 * Parse `ecosystem/namespace/name` (no version).
 *
 * @throws RefParseError when fewer than three segments are present or a segment is invalid
 */
export function parseRepository(input: string): RepositoryRef {
  const trimmed = input.trim()
  const segments = trimmed.split('/')
  if (segments.length < 3) {
    throw new RefParseError('Expected <ecosystem>/<namespace>/<name>', input)
  }
  for (const segment of segments) {
    if (!isValidSegment(segment)) {
      throw new RefParseError(`Invalid path segment "${segment}"`, input)
    }
  }

  const ecosystem = segments[0]
  const name = segments[segments.length - 1]
  if (ecosystem === undefined || name === undefined) {
    throw new RefParseError('Expected <ecosystem>/<namespace>/<name>', input)
  }
  return { ecosystem, namespace: segments.slice(1, -1).join('/'), name }
}

/**
 * Parse a full artifact reference.
 *
 * @throws RefParseError on missing name or version, or malformed parts
 */
export function parseReference(input: string): ArtifactReference {
  const trimmed = input.trim()
  const colon = trimmed.lastIndexOf(':')
  if (colon === -1) {
    throw new RefParseError('Missing version', input)
  }

  const repository = trimmed.slice(0, colon)
  const tail = trimmed.slice(colon + 1)
  if (repository === '' || repository.endsWith('/')) {
    throw new RefParseError('Missing name', input)
  }
  if (tail === '') {
    throw new RefParseError('Missing version', input)
  }

  const { ecosystem, namespace, name } = parseRepository(repository)
  const { version, platform } = splitPlatform(tail)
  if (!isValidVersion(version)) {
    throw new RefParseError(`Invalid version "${version}"`, input)
  }

  return platform ? { ecosystem, namespace, name, version, platform } : { ecosystem, namespace, name, version }
}

/** Parse and re-format, giving the canonical spelling of a reference string */
export function canonicalizeReference(input: string): string {
  return formatReference(parseReference(input))
}
