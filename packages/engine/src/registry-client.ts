/**
 * Minimal OCI distribution client.
 *
 * WHY: The registry tier and `list --remote` speak the same three calls
 * of the distribution API: fetch a manifest, fetch a blob, list tags.
 * Anything else in the protocol is out of scope.
 */

import { type Digest, NotFoundError, RegistryError, isDigest } from '@toolcache/core'

/** The slice of fetch the engine uses; global fetch satisfies it */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>

export const MANIFEST_MEDIA_TYPES = [
  'application/vnd.oci.image.manifest.v1+json',
  'application/vnd.docker.distribution.manifest.v2+json',
] as const

export interface ManifestLayer {
  mediaType: string
  digest: Digest
  size: number
  annotations?: Record<string, string> | undefined
}

export interface Manifest {
  schemaVersion: number
  layers: ManifestLayer[]
}

export interface RegistryClientOptions {
  /** Registry base URL, without trailing slash */
  baseUrl: string
  fetch?: FetchFn | undefined
  timeoutMs?: number | undefined
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseLayer(value: unknown): ManifestLayer | null {
  if (!isRecord(value)) return null
  const { mediaType, digest, size, annotations } = value
  if (typeof mediaType !== 'string' || typeof digest !== 'string' || !isDigest(digest)) {
    return null
  }
  if (typeof size !== 'number') return null
  const layer: ManifestLayer = { mediaType, digest, size }
  if (isRecord(annotations)) {
    layer.annotations = Object.fromEntries(
      Object.entries(annotations).filter(
        (pair): pair is [string, string] => typeof pair[1] === 'string'
      )
    )
  }
  return layer
}

/** Validate a manifest document, returning null when it is not one */
export function parseManifest(value: unknown): Manifest | null {
  if (!isRecord(value)) return null
  const schemaVersion = value['schemaVersion']
  const rawLayers = value['layers']
  if (typeof schemaVersion !== 'number' || !Array.isArray(rawLayers)) return null

  const layers: ManifestLayer[] = []
  for (const raw of rawLayers) {
    const layer = parseLayer(raw)
    if (!layer) return null
    layers.push(layer)
  }
  return { schemaVersion, layers }
}

function describeFailure(err: unknown, timeoutMs: number): string {
  if (err instanceof Error && err.name === 'TimeoutError') {
    return `timed out after ${timeoutMs}ms`
  }
  return err instanceof Error ? err.message : String(err)
}

export class RegistryClient {
  readonly baseUrl: string
  private readonly fetch: FetchFn
  private readonly timeoutMs: number

  constructor(options: RegistryClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.fetch = options.fetch ?? globalThis.fetch
    this.timeoutMs = options.timeoutMs ?? 30_000
  }

  manifestUrl(repository: string, tag: string): string {
    return `${this.baseUrl}/v2/${repository}/manifests/${encodeURIComponent(tag)}`
  }

  blobUrl(repository: string, digest: Digest): string {
    return `${this.baseUrl}/v2/${repository}/blobs/${digest}`
  }

  tagsUrl(repository: string): string {
    return `${this.baseUrl}/v2/${repository}/tags/list`
  }

  /**
   * @throws NotFoundError on 404
   * @throws RegistryError on any other failure
   */
  private async request(url: string, what: string, accept?: string): Promise<Response> {
    let response: Response
    try {
      response = await this.fetch(url, {
        headers: accept ? { Accept: accept } : {},
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (err) {
      throw new RegistryError(describeFailure(err, this.timeoutMs), url, undefined, { cause: err })
    }

    if (response.status === 404) {
      throw new NotFoundError(what, `registry ${this.baseUrl} returned 404`)
    }
    if (!response.ok) {
      throw new RegistryError(`HTTP ${response.status}`, url, response.status)
    }
    return response
  }

  async getManifest(repository: string, tag: string): Promise<Manifest> {
    const url = this.manifestUrl(repository, tag)
    const response = await this.request(url, `${repository}:${tag}`, MANIFEST_MEDIA_TYPES.join(', '))

    let body: unknown
    try {
      body = await response.json()
    } catch (err) {
      throw new RegistryError('manifest is not JSON', url, response.status, { cause: err })
    }
    const manifest = parseManifest(body)
    if (!manifest) {
      throw new RegistryError('malformed manifest', url, response.status)
    }
    return manifest
  }

  async getBlob(repository: string, digest: Digest): Promise<Uint8Array> {
    const url = this.blobUrl(repository, digest)
    const response = await this.request(url, `${repository}@${digest}`)
    try {
      return new Uint8Array(await response.arrayBuffer())
    } catch (err) {
      throw new RegistryError(describeFailure(err, this.timeoutMs), url, response.status, {
        cause: err,
      })
    }
  }

  /**
   * Tags published for a repository. A repository the registry does not
   * know has no tags.
   */
  async listTags(repository: string): Promise<string[]> {
    const url = this.tagsUrl(repository)
    let response: Response
    try {
      response = await this.request(url, repository)
    } catch (err) {
      if (err instanceof NotFoundError) {
        return []
      }
      throw err
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (err) {
      throw new RegistryError('tag list is not JSON', url, response.status, { cause: err })
    }
    if (!isRecord(body)) {
      throw new RegistryError('malformed tag list', url, response.status)
    }
    const tags = body['tags']
    // Registries answer `"tags": null` for an empty repository
    if (tags === null || tags === undefined) return []
    if (!Array.isArray(tags)) {
      throw new RegistryError('malformed tag list', url, response.status)
    }
    return tags.filter((tag): tag is string => typeof tag === 'string')
  }
}
