/**
 * Installer tier contract.
 *
 * WHY: Every way of obtaining bytes (a local package manager, a registry,
 * a plain download) answers the same question the same way: here are
 * the bytes, this tier does not apply, or this tier tried and failed.
 * The installer owns ordering, verification and storage.
 */

import type { ArtifactReference, Digest, Logger, TierName, ToolcacheError } from '@toolcache/core'

/** Per-attempt context handed to a tier */
export interface TierContext {
  /** Digest the caller expects, when it knows one */
  expectedDigest?: Digest | undefined
  /** Scratch directory owned by this attempt; removed afterwards */
  workDir: string
  logger: Logger
}

export type TierOutcome =
  | {
      status: 'success'
      content: Uint8Array
      /** Digest the source vouches for; the installer checks the bytes against it */
      digest?: Digest | undefined
      executable?: boolean | undefined
    }
  /** The tier does not apply (not configured, tool missing, wrong platform) */
  | { status: 'skip'; reason: string }
  | { status: 'fail'; error: ToolcacheError }

export interface InstallTier {
  readonly name: TierName
  attempt(ref: ArtifactReference, context: TierContext): Promise<TierOutcome>
}
