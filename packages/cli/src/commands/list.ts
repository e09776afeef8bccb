/**
 * List command - Versions of a repository, cached or published.
 */

import type { Command } from 'commander'

import {
  type CommonOptions,
  handleCliError,
  printJson,
  withCommonOptions,
  withContext,
} from '../helpers.js'
import { colors } from '../ui.js'

interface ListCommandOptions extends CommonOptions {
  remote?: boolean | undefined
}

export function registerListCommand(program: Command): void {
  withCommonOptions(
    program
      .command('list')
      .description('List versions of a repository')
      .argument('<repository>', 'ecosystem/namespace/name')
      .option('--remote', 'Ask the registry instead of the local cache')
      .option('--json', 'Output as JSON')
  ).action(async (repository: string, options: ListCommandOptions) => {
    try {
      await withContext(options, async ({ engine }) => {
        const versions = options.remote
          ? await engine.listRemote(repository)
          : await engine.list(repository)

        if (options.json) {
          printJson({ repository, remote: options.remote ?? false, versions })
          return
        }
        if (versions.length === 0) {
          console.error(colors.muted(`No versions of ${repository}`))
          return
        }
        for (const version of versions) {
          console.log(version)
        }
      })
    } catch (error) {
      handleCliError(error)
    }
  })
}
