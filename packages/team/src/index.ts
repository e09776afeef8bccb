/**
 * @toolcache/team - Team usage analysis, bundles and cache warming.
 */

export * from './bundles.js'
export * from './co-occurrence.js'
export * from './coordinator.js'
export * from './strategy.js'
export * from './usage-log.js'
export * from './warming.js'
