/**
 * @toolcache/engine - Tiered installation and the artifact engine.
 *
 * WHY: Everything that turns a reference into verified bytes on disk:
 * the installer tiers, single-flight coordination and the engine facade
 * the CLI and team coordinator call.
 */

export * from './engine.js'
export * from './exec.js'
export * from './factory.js'
export * from './fetch-coordinator.js'
export * from './registry-client.js'
export * from './tiered-installer.js'
export * from './tiers/http.js'
export * from './tiers/native.js'
export * from './tiers/registry.js'
export * from './tiers/types.js'
