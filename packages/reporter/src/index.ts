/**
 * @toolcache/reporter - Resolution metrics and optimization recommendations.
 */

export * from './collector.js'
export * from './metrics.js'
export * from './recommendations.js'
export * from './reporter.js'
