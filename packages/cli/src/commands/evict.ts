/**
 * Evict command - Shrink the cache, least recently used first.
 *
 * WHY: Unlike clear, eviction keeps recently used artifacts and only
 * removes what the size or age limit requires. With a team.toml the
 * team's cache strategy sets the size limit.
 */

import type { Command } from 'commander'

import type { EvictionPolicy, EvictionResult } from '@toolcache/store'

import {
  type CommonOptions,
  handleCliError,
  loadTeam,
  parseNumber,
  printJson,
  withCommonOptions,
  withContext,
} from '../helpers.js'
import { colors, formatBytes, success, treeItem, warning } from '../ui.js'

const MB = 1024 * 1024
const DAY_MS = 24 * 60 * 60 * 1000

interface EvictCommandOptions extends CommonOptions {
  maxSize?: number | undefined
  maxAge?: number | undefined
  dryRun?: boolean | undefined
  config?: string | undefined
}

function policyFrom(options: EvictCommandOptions): EvictionPolicy | undefined {
  if (options.maxSize !== undefined) {
    return { kind: 'size', maxBytes: options.maxSize * MB }
  }
  if (options.maxAge !== undefined) {
    return { kind: 'age', maxAgeMs: options.maxAge * DAY_MS }
  }
  return undefined
}

export function registerEvictCommand(program: Command): void {
  withCommonOptions(
    program
      .command('evict')
      .description('Evict least recently used artifacts (default: the configured size and retention)')
      .option('--max-size <mb>', 'Evict until the cache is at most this many MB', parseNumber)
      .option('--max-age <days>', 'Evict artifacts not used for this many days', parseNumber)
      .option('-c, --config <path>', "team.toml whose cache strategy sets the size limit")
      .option('--dry-run', 'Show what would be evicted without evicting it')
      .option('--json', 'Output as JSON')
  ).action(async (options: EvictCommandOptions) => {
    try {
      await withContext(options, async (context) => {
        const policy = policyFrom(options)
        let result: EvictionResult
        if (options.config && !policy) {
          const team = await loadTeam(context, options.config)
          result = await context.coordinator.enforceCacheSize(team.name, options.dryRun)
        } else {
          result = await context.engine.evict({ policy, dryRun: options.dryRun })
        }
        if (options.json) {
          printJson(result)
          return
        }

        if (options.dryRun) {
          warning('Dry run - nothing evicted')
        }
        result.evicted.forEach((blob, i) => {
          const refs = blob.references.length > 0 ? blob.references.join(', ') : colors.muted('(unreferenced)')
          treeItem(`${refs} ${colors.muted(formatBytes(blob.sizeBytes))}`, i === result.evicted.length - 1)
        })
        success(
          `Evicted ${result.evicted.length} artifacts, freed ${formatBytes(result.bytesFreed)}, ${formatBytes(result.remainingBytes)} remain`
        )
        if (result.skippedLeased > 0) {
          console.log(colors.muted(`  ${result.skippedLeased} in use and kept`))
        }
      })
    } catch (error) {
      handleCliError(error)
    }
  })
}
