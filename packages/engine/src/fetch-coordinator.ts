/**
 * Single-flight fetch coordination.
 *
 * WHY: Fifty concurrent requests for the same reference must cost one
 * install. The first caller starts a flight; every caller that arrives
 * while it is in the air waits on the same promise and receives the
 * same result. A waiter that gives up only stops waiting; the flight
 * carries on for the others.
 */

import {
  type ArtifactReference,
  type Digest,
  type InstallResult,
  type Logger,
  ResolutionCancelledError,
  VerificationFailedError,
  createLogger,
  formatReference,
  toToolcacheError,
} from '@toolcache/core'
import type { ReferenceResolver } from '@toolcache/resolver'

import type { TieredInstaller } from './tiered-installer.js'

export interface FetchCoordinatorOptions {
  resolver: ReferenceResolver
  installer: TieredInstaller
  logger?: Logger | undefined
}

export interface AcquireOptions {
  expectedDigest?: Digest | undefined
  /** Abort to stop waiting; the shared flight is not cancelled */
  signal?: AbortSignal | undefined
}

export class FetchCoordinator {
  private readonly resolver: ReferenceResolver
  private readonly installer: TieredInstaller
  private readonly log: Logger
  private readonly flights = new Map<string, Promise<InstallResult>>()

  constructor(options: FetchCoordinatorOptions) {
    this.resolver = options.resolver
    this.installer = options.installer
    this.log = options.logger ?? createLogger('fetch')
  }

  /** Number of flights in the air */
  get inFlight(): number {
    return this.flights.size
  }

  isInFlight(ref: ArtifactReference): boolean {
    return this.flights.has(formatReference(ref))
  }

  /**
   * Resolve a reference from the cache or install it, sharing any
   * flight already in progress for it.
   *
   * Resolves with a failure result rather than rejecting, except for
   * a waiter whose signal aborts, which rejects with
   * ResolutionCancelledError.
   */
  acquire(ref: ArtifactReference, options: AcquireOptions = {}): Promise<InstallResult> {
    const key = formatReference(ref)
    const { signal, expectedDigest } = options

    if (signal?.aborted) {
      return Promise.reject(new ResolutionCancelledError(key))
    }

    let flight = this.flights.get(key)
    if (flight) {
      this.log.debug('Joining flight', { ref: key })
    } else {
      flight = this.fly(ref, expectedDigest).finally(() => {
        this.flights.delete(key)
      })
      this.flights.set(key, flight)
    }

    const checked = flight.then((result) => checkExpected(result, expectedDigest))
    return signal ? abortable(checked, signal, key) : checked
  }

  private async fly(ref: ArtifactReference, expectedDigest: Digest | undefined): Promise<InstallResult> {
    const reference = formatReference(ref)
    try {
      // Another process may have filled the cache since the caller looked
      const resolution = await this.resolver.resolve(ref)
      if (resolution.kind === 'hit') {
        return {
          success: true,
          reference,
          digest: resolution.digest,
          binaryPath: resolution.blobPath,
          sizeBytes: resolution.entry.sizeBytes,
          tierUsed: 'cache',
          durationMs: 0,
          attempts: [],
        }
      }
      return await this.installer.install(ref, { expectedDigest })
    } catch (err) {
      return {
        success: false,
        reference,
        error: toToolcacheError(err),
        tierUsed: null,
        durationMs: 0,
        attempts: [],
      }
    }
  }
}

/** A waiter's own expected digest applies to the shared result */
function checkExpected(result: InstallResult, expected: Digest | undefined): InstallResult {
  if (!result.success || !expected || result.digest === expected) {
    return result
  }
  return {
    success: false,
    reference: result.reference,
    error: new VerificationFailedError(result.reference, expected, result.digest),
    tierUsed: result.tierUsed === 'cache' ? null : result.tierUsed,
    durationMs: result.durationMs,
    attempts: result.attempts,
  }
}

function abortable<T>(promise: Promise<T>, signal: AbortSignal, reference: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new ResolutionCancelledError(reference))
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      }
    )
  })
}
