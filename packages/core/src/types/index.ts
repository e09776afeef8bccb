export * from './cache.js'
export * from './refs.js'
export * from './team.js'
export * from './config.js'
