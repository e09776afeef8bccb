#!/usr/bin/env tsx
/**
 * tcache - Command line interface for toolcache.
 *
 * WHY: Provides a thin argument parsing layer that delegates
 * all core logic to the engine, team and reporter packages.
 */

import { realpathSync } from 'node:fs'
import { fileURLToPath } from 'node:url'

import { formatError } from './helpers.js'
import { createProgram } from './lib.js'

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv)
}

function isMainModule(): boolean {
  const entry = process.argv[1]
  if (!entry) return false
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url)
  } catch {
    return false
  }
}

// Only run if this is the main module (not imported in tests)
if (isMainModule()) {
  main().catch((error: unknown) => {
    console.error(formatError(error))
    process.exit(1)
  })
}
