/**
 * HTTP tier: direct download from a configured URL template.
 *
 * WHY: Many tools are only published as release assets. A download is
 * trusted only against a checksum obtained independently of the bytes:
 * pinned in settings, fetched from a checksum URL, or supplied by the
 * caller. Without one the tier fails rather than store unverified bytes.
 *
 * Transient failures are retried with exponential backoff (1s, 2s, 4s
 * by default). A 404 is final.
 */

import {
  type ArtifactReference,
  type Digest,
  DownloadError,
  type DownloadSource,
  NotFoundError,
  formatReference,
  isDigest,
  repositoryOf,
  versionTag,
} from '@toolcache/core'

import type { FetchFn } from '../registry-client.js'
import type { InstallTier, TierContext, TierOutcome } from './types.js'

const PLACEHOLDER_PATTERN = /\{(ecosystem|namespace|name|version|platform|tag)\}/g
const HEX_TOKEN_PATTERN = /\b[0-9a-f]{64}\b/i

/**
 * Expand `{ecosystem}`, `{namespace}`, `{name}`, `{version}`, `{platform}`
 * and `{tag}` in a URL template.
 *
 * @throws DownloadError if the template needs a platform the reference lacks
 */
export function expandTemplate(template: string, ref: ArtifactReference): string {
  return template.replace(PLACEHOLDER_PATTERN, (_match, key: string) => {
    switch (key) {
      case 'ecosystem':
        return ref.ecosystem
      case 'namespace':
        return ref.namespace
      case 'name':
        return ref.name
      case 'version':
        return ref.version
      case 'tag':
        return versionTag(ref)
      default:
        if (!ref.platform) {
          throw new DownloadError('reference has no platform', template)
        }
        return ref.platform
    }
  })
}

/**
 * Pull the digest out of a checksum file body.
 *
 * Accepts `sha256:<hex>`, a bare hex digest, or the `<hex>  <filename>`
 * lines sha256sum writes.
 */
export function parseChecksum(body: string): Digest | null {
  const match = body.match(HEX_TOKEN_PATTERN)
  if (!match) return null
  const digest = `sha256:${match[0].toLowerCase()}`
  return isDigest(digest) ? digest : null
}

export interface HttpTierOptions {
  downloads: DownloadSource[]
  fetch?: FetchFn | undefined
  timeoutMs?: number | undefined
  /** Retries after the first attempt (default: 3) */
  retries?: number | undefined
  /** Backoff base in ms; attempt n waits base * 2^n (default: 1000) */
  backoffMs?: number | undefined
  sleep?: ((ms: number) => Promise<void>) | undefined
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export class HttpTier implements InstallTier {
  readonly name = 'http' as const
  private readonly downloads: DownloadSource[]
  private readonly fetch: FetchFn
  private readonly timeoutMs: number
  private readonly retries: number
  private readonly backoffMs: number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: HttpTierOptions) {
    this.downloads = options.downloads
    this.fetch = options.fetch ?? globalThis.fetch
    this.timeoutMs = options.timeoutMs ?? 30_000
    this.retries = options.retries ?? 3
    this.backoffMs = options.backoffMs ?? 1000
    this.sleep = options.sleep ?? defaultSleep
  }

  /** Download source configured for a reference's repository */
  sourceFor(ref: ArtifactReference): DownloadSource | undefined {
    const repository = repositoryOf(ref)
    return this.downloads.find((source) => source.repository === repository)
  }

  async attempt(ref: ArtifactReference, context: TierContext): Promise<TierOutcome> {
    const source = this.sourceFor(ref)
    if (!source) {
      return { status: 'skip', reason: `no download configured for ${repositoryOf(ref)}` }
    }

    try {
      const url = expandTemplate(source.url, ref)
      const expected = await this.expectedDigest(ref, source, context)
      if (!expected) {
        return {
          status: 'fail',
          error: new DownloadError('no checksum available to verify against', url),
        }
      }

      context.logger.debug('Downloading', { ref: formatReference(ref), url })
      const content = await this.download(url, formatReference(ref), context)
      return { status: 'success', content, digest: expected, executable: source.executable }
    } catch (err) {
      if (err instanceof DownloadError || err instanceof NotFoundError) {
        return { status: 'fail', error: err }
      }
      throw err
    }
  }

  /**
   * Pinned checksum first, then the checksum URL, then the caller's digest.
   */
  private async expectedDigest(
    ref: ArtifactReference,
    source: DownloadSource,
    context: TierContext
  ): Promise<Digest | undefined> {
    const pinned = source.checksums[versionTag(ref)]
    if (pinned) return pinned

    if (source.checksumUrl) {
      const url = expandTemplate(source.checksumUrl, ref)
      const body = new TextDecoder().decode(await this.download(url, url, context))
      const digest = parseChecksum(body)
      if (!digest) {
        throw new DownloadError('checksum file holds no sha256 digest', url)
      }
      return digest
    }

    return context.expectedDigest
  }

  /**
   * GET with retries.
   *
   * @throws NotFoundError on 404 (never retried)
   * @throws DownloadError once every attempt has failed
   */
  private async download(url: string, what: string, context: TierContext): Promise<Uint8Array> {
    let lastError: DownloadError | undefined

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      if (attempt > 0) {
        const delay = this.backoffMs * 2 ** (attempt - 1)
        context.logger.debug('Retrying download', { url, attempt, delayMs: delay })
        await this.sleep(delay)
      }

      let response: Response
      try {
        response = await this.fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) })
      } catch (err) {
        const message =
          err instanceof Error && err.name === 'TimeoutError'
            ? `timed out after ${this.timeoutMs}ms`
            : err instanceof Error
              ? err.message
              : String(err)
        lastError = new DownloadError(message, url, undefined, { cause: err })
        continue
      }

      if (response.status === 404) {
        throw new NotFoundError(what, `${url} returned 404`)
      }
      if (!response.ok) {
        lastError = new DownloadError(`HTTP ${response.status}`, url, response.status)
        continue
      }

      try {
        return new Uint8Array(await response.arrayBuffer())
      } catch (err) {
        lastError = new DownloadError('connection lost while reading body', url, response.status, {
          cause: err,
        })
      }
    }

    throw lastError ?? new DownloadError('no attempts made', url)
  }
}
