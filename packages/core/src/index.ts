/**
 * @toolcache/core - Shared kernel for toolcache.
 *
 * Types, errors, logging, configuration and the filesystem primitives
 * (atomic writes, file locks) every other package builds on.
 */

export * from './atomic.js'
export * from './config/index.js'
export * from './errors.js'
export * from './locks.js'
export * from './logger.js'
export * from './platform.js'
export * from './schemas/index.js'
export * from './types/index.js'
