/**
 * SHA-256 digests over bytes and files.
 */

import { createHash } from 'node:crypto'
import { createReadStream } from 'node:fs'
import type { Digest } from '@toolcache/core'

/**
 * Compute the digest of in-memory content.
 */
export function computeDigest(content: Uint8Array | string): Digest {
  return `sha256:${createHash('sha256').update(content).digest('hex')}`
}

/**
 * Compute the digest of a file without loading it into memory.
 */
export async function digestFile(filePath: string): Promise<Digest> {
  const hash = createHash('sha256')
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk)
  }
  return `sha256:${hash.digest('hex')}`
}

/**
 * Check content against an expected digest.
 */
export function verifyDigest(digest: Digest, content: Uint8Array | string): boolean {
  return computeDigest(content) === digest
}
