/**
 * Info command - Show the cache entry of a reference.
 */

import type { Command } from 'commander'

import { formatReference } from '@toolcache/core'

import {
  type CommonOptions,
  handleCliError,
  printJson,
  withCommonOptions,
  withContext,
} from '../helpers.js'
import { colors, formatBytes, formatPath, header, info } from '../ui.js'

export function registerInfoCommand(program: Command): void {
  withCommonOptions(
    program
      .command('info')
      .description('Show the cache entry of a reference')
      .argument('<reference>', 'ecosystem/namespace/name:version[-os-arch]')
      .option('--json', 'Output as JSON')
  ).action(async (reference: string, options: CommonOptions) => {
    try {
      await withContext(options, async ({ engine }) => {
        const entry = await engine.info(reference)
        if (options.json) {
          printJson(entry)
          return
        }

        header(formatReference(entry.reference))
        info('digest', colors.code(entry.digest))
        info('size', formatBytes(entry.sizeBytes))
        info('source', entry.sourceTier)
        info('created', entry.createdAt)
        info('accessed', entry.lastAccessedAt)
        info('path', formatPath(engine.store.path(entry.digest)))
      })
    } catch (error) {
      handleCliError(error)
    }
  })
}
