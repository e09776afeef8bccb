/**
 * JSON Schema validation for toolcache config files and on-disk records
 */

import { createRequire } from 'node:module'
import AjvModule from 'ajv'
import type { ErrorObject } from 'ajv'
import addFormatsModule from 'ajv-formats'

import type { CacheEntry } from '../types/cache.js'
import type { SettingsFile, TeamFile } from '../types/config.js'
import type { BundleManifest, ResolutionRecord, UsageEvent } from '../types/team.js'

const require = createRequire(import.meta.url)
const settingsSchema = require('./settings.schema.json')
const teamSchema = require('./team.schema.json')
const cacheEntrySchema = require('./cache-entry.schema.json')
const usageEventSchema = require('./usage-event.schema.json')
const resolutionRecordSchema = require('./resolution-record.schema.json')
const bundleManifestSchema = require('./bundle-manifest.schema.json')

// ============================================================================
// Ajv instance setup
// ============================================================================

// Both packages are CommonJS with a `default` property on module.exports
const Ajv = AjvModule.default
const addFormats = addFormatsModule.default

const ajv = new Ajv({
  strict: true,
  allErrors: true,
  verbose: true,
})

addFormats(ajv)

// Compile validators
const validateSettingsSchema = ajv.compile<SettingsFile>(settingsSchema)
const validateTeamSchema = ajv.compile<TeamFile>(teamSchema)
const validateCacheEntrySchema = ajv.compile<CacheEntry>(cacheEntrySchema)
const validateUsageEventSchema = ajv.compile<UsageEvent>(usageEventSchema)
const validateResolutionRecordSchema = ajv.compile<ResolutionRecord>(resolutionRecordSchema)
const validateBundleManifestSchema = ajv.compile<BundleManifest>(bundleManifestSchema)

// ============================================================================
// Validation result types
// ============================================================================

export interface ValidationError {
  path: string
  message: string
  keyword: string
  params: Record<string, unknown>
}

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationError[] }

// ============================================================================
// Validation functions
// ============================================================================

/**
 * Provide a more helpful error message for known validation patterns.
 */
function friendlyMessage(err: ErrorObject): string {
  const defaultMsg = err.message || 'Unknown error'

  // Additional properties errors - show which property is invalid
  if (err.keyword === 'additionalProperties') {
    const prop = err.params['additionalProperty']
    return `unknown property "${String(prop)}"`
  }

  if (err.keyword === 'enum') {
    const allowed = err.params['allowedValues']
    if (Array.isArray(allowed)) {
      return `must be one of: ${allowed.join(', ')}`
    }
  }

  return defaultMsg
}

function formatErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  if (!errors) return []

  return errors.map((err) => ({
    path: err.instancePath || '/',
    message: friendlyMessage(err),
    keyword: err.keyword,
    params: { ...err.params },
  }))
}

/**
 * Validate a config.toml document (parsed to object)
 */
export function validateSettingsFile(data: unknown): ValidationResult<SettingsFile> {
  if (validateSettingsSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateSettingsSchema.errors) }
}

/**
 * Validate a team.toml document (parsed to object)
 */
export function validateTeamFile(data: unknown): ValidationResult<TeamFile> {
  if (validateTeamSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateTeamSchema.errors) }
}

/**
 * Validate an index record read from disk
 */
export function validateCacheEntry(data: unknown): ValidationResult<CacheEntry> {
  if (validateCacheEntrySchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateCacheEntrySchema.errors) }
}

/**
 * Validate one usage-log line
 */
export function validateUsageEvent(data: unknown): ValidationResult<UsageEvent> {
  if (validateUsageEventSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateUsageEventSchema.errors) }
}

/**
 * Validate one metrics-log line
 */
export function validateResolutionRecord(data: unknown): ValidationResult<ResolutionRecord> {
  if (validateResolutionRecordSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateResolutionRecordSchema.errors) }
}

export function validateBundleManifest(data: unknown): ValidationResult<BundleManifest> {
  if (validateBundleManifestSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateBundleManifestSchema.errors) }
}

// ============================================================================
// Schema exports for external use
// ============================================================================

export {
  bundleManifestSchema,
  cacheEntrySchema,
  resolutionRecordSchema,
  settingsSchema,
  teamSchema,
  usageEventSchema,
}
