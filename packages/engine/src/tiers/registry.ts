/**
 * Registry tier: pull a prebuilt artifact over the OCI distribution API.
 *
 * The artifact is the first layer of the manifest tagged with the
 * reference's version tag. The layer digest is what the bytes are
 * verified against.
 */

import {
  type ArtifactReference,
  NotFoundError,
  type RegistrySource,
  RegistryError,
  formatReference,
  versionTag,
} from '@toolcache/core'

import { type FetchFn, RegistryClient } from '../registry-client.js'
import type { InstallTier, TierContext, TierOutcome } from './types.js'

/** Layer annotation that marks a blob as non-executable */
export const EXECUTABLE_ANNOTATION = 'dev.toolcache.executable'

export interface RegistryTierOptions {
  registries: RegistrySource[]
  fetch?: FetchFn | undefined
  timeoutMs?: number | undefined
}

export class RegistryTier implements InstallTier {
  readonly name = 'registry' as const
  private readonly clients = new Map<string, RegistryClient>()

  constructor(options: RegistryTierOptions) {
    for (const source of options.registries) {
      // First registry configured for an ecosystem wins
      if (!this.clients.has(source.ecosystem)) {
        this.clients.set(
          source.ecosystem,
          new RegistryClient({
            baseUrl: source.url,
            fetch: options.fetch,
            timeoutMs: options.timeoutMs,
          })
        )
      }
    }
  }

  /** Client for an ecosystem, if a registry serves it */
  clientFor(ecosystem: string): RegistryClient | undefined {
    return this.clients.get(ecosystem)
  }

  async attempt(ref: ArtifactReference, context: TierContext): Promise<TierOutcome> {
    const client = this.clientFor(ref.ecosystem)
    if (!client) {
      return { status: 'skip', reason: `no registry configured for ecosystem "${ref.ecosystem}"` }
    }

    const repository = `${ref.namespace}/${ref.name}`
    const tag = versionTag(ref)
    context.logger.debug('Fetching from registry', { ref: formatReference(ref), registry: client.baseUrl })

    try {
      const manifest = await client.getManifest(repository, tag)
      const layer = manifest.layers[0]
      if (!layer) {
        return {
          status: 'fail',
          error: new RegistryError('manifest has no layers', client.manifestUrl(repository, tag)),
        }
      }
      const content = await client.getBlob(repository, layer.digest)
      return {
        status: 'success',
        content,
        digest: layer.digest,
        executable: layer.annotations?.[EXECUTABLE_ANNOTATION] !== 'false',
      }
    } catch (err) {
      if (err instanceof NotFoundError || err instanceof RegistryError) {
        return { status: 'fail', error: err }
      }
      throw err
    }
  }
}
