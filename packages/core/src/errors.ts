/**
 * Typed error classes for toolcache
 *
 * Error hierarchy:
 * - ToolcacheError (base)
 *   - ConfigError (configuration issues)
 *     - ConfigParseError (TOML/JSON parse failures)
 *     - ConfigValidationError (schema validation failures)
 *   - ResolutionError (resolution failures)
 *     - RefParseError (invalid reference syntax)
 *     - NotFoundError (artifact absent everywhere asked)
 *     - VerificationFailedError (digest mismatch, terminal)
 *     - TierUnavailableError (tier skipped, fallthrough)
 *     - AggregateResolutionError (every tier failed)
 *     - ResolutionCancelledError (waiter aborted)
 *   - StoreError (store operations)
 *     - CacheCorruptionError (stored bytes no longer match their digest)
 *   - RegistryError (registry protocol failures)
 *   - DownloadError (HTTP download failures)
 *   - CommandError (subprocess failures)
 *   - BundleError (bundle publication)
 *   - LockError (file locking)
 */

import type { TierName } from './types/cache.js'
import type { ValidationError } from './schemas/index.js'

/** Base error class for all toolcache errors */
export class ToolcacheError extends Error {
  readonly code: string

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ToolcacheError'
    this.code = code
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor)
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

/** Base class for configuration-related errors */
export class ConfigError extends ToolcacheError {
  readonly source: string

  constructor(message: string, code: string, source: string) {
    super(message, code)
    this.name = 'ConfigError'
    this.source = source
  }
}

/** Error thrown when TOML/JSON parsing fails */
export class ConfigParseError extends ConfigError {
  constructor(message: string, source: string) {
    super(message, 'CONFIG_PARSE_ERROR', source)
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when schema validation fails */
export class ConfigValidationError extends ConfigError {
  readonly validationErrors: ValidationError[]

  constructor(message: string, source: string, validationErrors: ValidationError[]) {
    const details = validationErrors.map((e) => `  ${e.path}: ${e.message}`).join('\n')
    super(`${message}:\n${details}`, 'CONFIG_VALIDATION_ERROR', source)
    this.name = 'ConfigValidationError'
    this.validationErrors = validationErrors
  }
}

// ============================================================================
// Resolution errors
// ============================================================================

/** Base class for resolution-related errors */
export class ResolutionError extends ToolcacheError {
  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, code, options)
    this.name = 'ResolutionError'
  }
}

/** Error thrown when a reference string cannot be parsed */
export class RefParseError extends ResolutionError {
  readonly refString: string

  constructor(message: string, refString: string) {
    super(`${message}: "${refString}"`, 'REF_PARSE_ERROR')
    this.name = 'RefParseError'
    this.refString = refString
  }
}

/** The artifact does not exist in the place that was asked */
export class NotFoundError extends ResolutionError {
  readonly reference: string

  constructor(reference: string, detail?: string) {
    super(
      detail ? `Artifact not found: ${reference} (${detail})` : `Artifact not found: ${reference}`,
      'NOT_FOUND'
    )
    this.name = 'NotFoundError'
    this.reference = reference
  }
}

/**
 * Fetched bytes do not hash to the digest they were supposed to have.
 *
 * Terminal: no later tier is tried and the bytes are never stored.
 */
export class VerificationFailedError extends ResolutionError {
  readonly reference: string
  readonly expected: string
  readonly actual: string

  constructor(reference: string, expected: string, actual: string) {
    super(
      `Verification failed for ${reference}: expected ${expected}, got ${actual}`,
      'VERIFICATION_FAILED'
    )
    this.name = 'VerificationFailedError'
    this.reference = reference
    this.expected = expected
    this.actual = actual
  }
}

/** A tier does not apply to this reference on this host */
export class TierUnavailableError extends ResolutionError {
  readonly tier: TierName
  readonly reason: string

  constructor(tier: TierName, reason: string) {
    super(`Tier ${tier} unavailable: ${reason}`, 'TIER_UNAVAILABLE')
    this.name = 'TierUnavailableError'
    this.tier = tier
    this.reason = reason
  }
}

/** One entry per tier in an aggregate failure */
export interface TierFailure {
  tier: TierName
  error: ToolcacheError
}

/** Every tier was skipped or failed */
export class AggregateResolutionError extends ResolutionError {
  readonly reference: string
  readonly failures: TierFailure[]

  constructor(reference: string, failures: TierFailure[]) {
    const details = failures.map((f) => `  ${f.tier}: ${f.error.message}`).join('\n')
    super(`All tiers failed for ${reference}:\n${details}`, 'AGGREGATE_RESOLUTION_FAILED')
    this.name = 'AggregateResolutionError'
    this.reference = reference
    this.failures = failures
  }
}

/** A waiter stopped waiting; the shared attempt carries on */
export class ResolutionCancelledError extends ResolutionError {
  readonly reference: string

  constructor(reference: string) {
    super(`Resolution cancelled: ${reference}`, 'RESOLUTION_CANCELLED')
    this.name = 'ResolutionCancelledError'
    this.reference = reference
  }
}

// ============================================================================
// Store errors
// ============================================================================

/** Base class for store-related errors */
export class StoreError extends ToolcacheError {
  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, code, options)
    this.name = 'StoreError'
  }
}

/** Stored bytes no longer hash to the digest they are filed under */
export class CacheCorruptionError extends StoreError {
  readonly digest: string
  readonly actual: string

  constructor(digest: string, actual: string) {
    super(`Cache corruption: blob ${digest} hashes to ${actual}`, 'CACHE_CORRUPTION')
    this.name = 'CacheCorruptionError'
    this.digest = digest
    this.actual = actual
  }
}

// ============================================================================
// Transport errors
// ============================================================================

/** Registry returned something other than what the protocol promises */
export class RegistryError extends ToolcacheError {
  readonly url: string
  readonly status: number | undefined

  constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
    super(`Registry error for ${url}: ${message}`, 'REGISTRY_ERROR', options)
    this.name = 'RegistryError'
    this.url = url
    this.status = status
  }
}

/** Direct HTTP download failed */
export class DownloadError extends ToolcacheError {
  readonly url: string
  readonly status: number | undefined

  constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
    super(`Download failed for ${url}: ${message}`, 'DOWNLOAD_ERROR', options)
    this.name = 'DownloadError'
    this.url = url
    this.status = status
  }
}

/** A subprocess exited non-zero or could not be started */
export class CommandError extends ToolcacheError {
  readonly command: string
  readonly exitCode: number
  readonly stderr: string

  constructor(command: string, exitCode: number, stderr: string) {
    super(`Command failed (exit ${exitCode}): ${command}\n${stderr}`, 'COMMAND_ERROR')
    this.name = 'CommandError'
    this.command = command
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

// ============================================================================
// Team errors
// ============================================================================

/** Error thrown when a bundle cannot be published or installed */
export class BundleError extends ToolcacheError {
  readonly bundle: string

  constructor(message: string, bundle: string, options?: { cause?: unknown }) {
    super(`Bundle ${bundle}: ${message}`, 'BUNDLE_ERROR', options)
    this.name = 'BundleError'
    this.bundle = bundle
  }
}

// ============================================================================
// Lock errors
// ============================================================================

/** Error thrown during file locking operations */
export class LockError extends ToolcacheError {
  readonly lockPath: string

  constructor(message: string, lockPath: string) {
    super(`Lock error for "${lockPath}": ${message}`, 'LOCK_ERROR')
    this.name = 'LockError'
    this.lockPath = lockPath
  }
}

/** Error thrown when lock acquisition times out */
export class LockTimeoutError extends LockError {
  readonly timeout: number

  constructor(lockPath: string, timeout: number) {
    super(`Timed out after ${timeout}ms`, lockPath)
    this.name = 'LockTimeoutError'
    this.timeout = timeout
  }
}

// ============================================================================
// Type guards
// ============================================================================

export function isToolcacheError(error: unknown): error is ToolcacheError {
  return error instanceof ToolcacheError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError
}

export function isVerificationFailedError(error: unknown): error is VerificationFailedError {
  return error instanceof VerificationFailedError
}

export function isCacheCorruptionError(error: unknown): error is CacheCorruptionError {
  return error instanceof CacheCorruptionError
}

/**
 * Wrap anything thrown into a ToolcacheError, keeping typed errors as-is.
 */
export function toToolcacheError(error: unknown, code = 'UNEXPECTED_ERROR'): ToolcacheError {
  if (error instanceof ToolcacheError) {
    return error
  }
  const message = error instanceof Error ? error.message : String(error)
  return new ToolcacheError(message, code, { cause: error })
}

/** The `code` of a Node system error (`ENOENT`, `EEXIST`, ...), if any */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}
