/**
 * Pull command - Resolve a reference to a verified local path.
 *
 * WHY: The path is printed alone on stdout so scripts can use
 * `$(tcache pull <ref>)`. Everything else goes to stderr.
 */

import type { Command } from 'commander'

import { asDigest } from '@toolcache/core'

import {
  type CommonOptions,
  handleCliError,
  printJson,
  withCommonOptions,
  withContext,
} from '../helpers.js'
import { colors, createSpinner, formatBytes, formatDuration } from '../ui.js'

interface PullCommandOptions extends CommonOptions {
  digest?: string | undefined
  team?: string | undefined
  actor?: string | undefined
}

export function registerPullCommand(program: Command): void {
  withCommonOptions(
    program
      .command('pull')
      .description('Resolve an artifact into the cache and print its path')
      .argument('<reference>', 'ecosystem/namespace/name:version[-os-arch]')
      .option('--digest <digest>', 'Fail unless the artifact has this sha256 digest')
      .option('--team <name>', 'Record the pull as usage of this team')
      .option('--actor <name>', 'Who is pulling (default: $USER)')
      .option('--json', 'Output as JSON')
  ).action(async (reference: string, options: PullCommandOptions) => {
    const spinner = createSpinner(`Resolving ${reference}`)
    try {
      await withContext(options, async ({ engine }) => {
        spinner.start()
        const result = await engine.pull(reference, {
          expectedDigest: options.digest === undefined ? undefined : asDigest(options.digest),
          team: options.team,
          actor: options.actor ?? process.env['USER'],
        })
        spinner.stop()

        for (const warning of result.warnings) {
          console.error(colors.warn(warning))
        }
        if (options.json) {
          printJson(result)
          return
        }
        console.error(
          colors.muted(
            `${result.tierUsed} · ${formatBytes(result.sizeBytes)} · ${formatDuration(result.durationMs)}`
          )
        )
        console.log(result.path)
      })
    } catch (error) {
      spinner.stop()
      handleCliError(error)
    }
  })
}
