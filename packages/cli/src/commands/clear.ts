/**
 * Clear command - Remove cache entries by age, or all of them.
 */

import type { Command } from 'commander'

import {
  type CommonOptions,
  handleCliError,
  parseNumber,
  printJson,
  withCommonOptions,
  withContext,
} from '../helpers.js'
import { success } from '../ui.js'

interface ClearCommandOptions extends CommonOptions {
  olderThan?: number | undefined
}

export function registerClearCommand(program: Command): void {
  withCommonOptions(
    program
      .command('clear')
      .description('Remove cache entries (all of them unless --older-than is given)')
      .option('--older-than <days>', 'Only entries created more than this many days ago', parseNumber)
      .option('--json', 'Output as JSON')
  ).action(async (options: ClearCommandOptions) => {
    try {
      await withContext(options, async ({ engine }) => {
        const removed = await engine.clear(options.olderThan)
        if (options.json) {
          printJson({ entriesRemoved: removed })
          return
        }
        success(`Removed ${removed} cache ${removed === 1 ? 'entry' : 'entries'}`)
      })
    } catch (error) {
      handleCliError(error)
    }
  })
}
