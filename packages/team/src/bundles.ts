/**
 * Bundle proposals and manifests.
 *
 * WHY: References a team always pulls together can be fetched as one
 * unit. A proposal is only a suggestion; materializing it writes a
 * manifest that pins every member to its digest. Manifests are
 * serialized canonically and addressed by their own digest, so the same
 * member set always maps to the same bundle reference and a different
 * set can never overwrite it.
 */

import { createHash } from 'node:crypto'
import {
  type ArtifactReference,
  BundleError,
  type BundleManifest,
  type BundleMember,
  type BundleProposal,
  type CoOccurrencePair,
  type Digest,
  type ReferenceString,
  type TeamConfig,
  digestHex,
  validateBundleManifest,
} from '@toolcache/core'
import { canonicalizeReference } from '@toolcache/resolver'

import { comparePairs } from './co-occurrence.js'

/** Ecosystem segment of every bundle reference */
export const BUNDLE_ECOSYSTEM = 'bundles'

/** Name used for the bundle declared in team.toml */
export const CONFIGURED_BUNDLE_NAME = 'team-dependencies'

export interface ProposeBundleOptions {
  /** Pairs must score strictly above this */
  threshold: number
  /** Pairs must have strictly more joint uses than this */
  minUsage: number
  maxBundleSize: number
}

/** `auto-<8 hex>` from the sorted member set */
export function bundleName(members: readonly ReferenceString[]): string {
  const hash = createHash('sha256')
    .update([...members].sort().join('\n'))
    .digest('hex')
  return `auto-${hash.slice(0, 8)}`
}

/**
 * Propose a bundle from scored pairs, or null when no pair qualifies.
 *
 * Members are the best qualifying pair plus whatever else is connected
 * to it through qualifying pairs, strongest link first, up to
 * `maxBundleSize`.
 */
export function proposeBundle(
  team: string,
  pairs: readonly CoOccurrencePair[],
  options: ProposeBundleOptions
): BundleProposal | null {
  const qualifying = pairs
    .filter((pair) => pair.score > options.threshold && pair.usageCount > options.minUsage)
    .sort(comparePairs)
  const best = qualifying[0]
  if (!best) {
    return null
  }

  const members = new Set<ReferenceString>([best.referenceA, best.referenceB])
  while (members.size < options.maxBundleSize) {
    // qualifying is best-first, so the first edge leaving the set is the strongest
    const next = qualifying.find(
      (pair) => members.has(pair.referenceA) !== members.has(pair.referenceB)
    )
    if (!next) break
    members.add(members.has(next.referenceA) ? next.referenceB : next.referenceA)
  }

  const memberReferences = [...members].sort()
  return {
    name: bundleName(memberReferences),
    team,
    memberReferences,
    score: best.score,
    usageCount: best.usageCount,
    description: `${memberReferences.length} references used together (score ${best.score.toFixed(2)}, ${best.usageCount} joint uses)`,
  }
}

/**
 * A proposal for the bundle a team declares in `bundle_dependencies`,
 * or null when it declares none.
 *
 * @throws RefParseError for a malformed dependency
 */
export function configuredBundle(config: TeamConfig): BundleProposal | null {
  const memberReferences = [...new Set(config.bundleDependencies.map(canonicalizeReference))].sort()
  if (memberReferences.length === 0) {
    return null
  }
  return {
    name: CONFIGURED_BUNDLE_NAME,
    team: config.name,
    memberReferences,
    score: 1,
    usageCount: 0,
    description: `Dependencies declared by team ${config.name}`,
  }
}

// ============================================================================
// Manifests
// ============================================================================

export function createManifest(proposal: BundleProposal, members: BundleMember[]): BundleManifest {
  return {
    schemaVersion: 1,
    name: proposal.name,
    team: proposal.team,
    description: proposal.description,
    members: [...members].sort((a, b) =>
      a.reference < b.reference ? -1 : a.reference > b.reference ? 1 : 0
    ),
  }
}

/** Canonical bytes: fixed key order, members sorted, trailing newline */
export function serializeManifest(manifest: BundleManifest): string {
  const canonical = {
    schemaVersion: manifest.schemaVersion,
    name: manifest.name,
    team: manifest.team,
    description: manifest.description,
    members: manifest.members.map((member) => ({
      reference: member.reference,
      digest: member.digest,
    })),
  }
  return `${JSON.stringify(canonical, null, 2)}\n`
}

/**
 * @throws BundleError when the content is not a valid manifest
 */
export function parseManifest(content: string, source: string): BundleManifest {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    throw new BundleError('manifest is not JSON', source, { cause: err })
  }
  const result = validateBundleManifest(parsed)
  if (!result.valid) {
    const details = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ')
    throw new BundleError(`invalid manifest (${details})`, source)
  }
  return result.data
}

/** `bundles/<team>/<name>:<first 12 hex of the manifest digest>` */
export function bundleReference(team: string, name: string, digest: Digest): ArtifactReference {
  return {
    ecosystem: BUNDLE_ECOSYSTEM,
    namespace: team,
    name,
    version: digestHex(digest).slice(0, 12),
  }
}

export function isBundleReference(ref: ArtifactReference): boolean {
  return ref.ecosystem === BUNDLE_ECOSYSTEM
}
