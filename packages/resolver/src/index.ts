/**
 * @toolcache/resolver - Reference parsing and local resolution.
 */

export * from './ref-parser.js'
export * from './reference-resolver.js'
export * from './versions.js'
