export * from './settings.js'
export * from './team-toml.js'
