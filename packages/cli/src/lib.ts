/**
 * @toolcache/cli - Library exports for the tcache CLI.
 *
 * WHY: Separates program construction from CLI execution to allow
 * testing without running the CLI.
 */

import { Command } from 'commander'

import { registerClearCommand } from './commands/clear.js'
import { registerEvictCommand } from './commands/evict.js'
import { registerInfoCommand } from './commands/info.js'
import { registerListCommand } from './commands/list.js'
import { registerPullCommand } from './commands/pull.js'
import { registerReportCommand } from './commands/report.js'
import { registerTeamCommands } from './commands/team.js'

export { formatError, handleCliError } from './helpers.js'

/**
 * Create the CLI program.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('tcache')
    .description('Resolve, verify and cache build tool artifacts')
    .version('0.1.0')

  registerPullCommand(program)
  registerListCommand(program)
  registerInfoCommand(program)
  registerClearCommand(program)
  registerEvictCommand(program)
  registerTeamCommands(program)
  registerReportCommand(program)

  return program
}
