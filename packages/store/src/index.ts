/**
 * @toolcache/store - Content-addressable artifact storage.
 *
 * WHY: Every artifact toolcache serves lives here, keyed by digest,
 * with a per-reference index and LRU eviction on top.
 */

export * from './blob-store.js'
export * from './cache-index.js'
export * from './digest.js'
export * from './eviction.js'
export * from './paths.js'
