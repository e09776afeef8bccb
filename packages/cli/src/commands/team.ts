/**
 * Team commands - Usage analysis, bundles and cache warming.
 *
 * WHY: Each subcommand reads the team's team.toml so the configured
 * cache strategy drives its thresholds.
 */

import type { Command } from 'commander'

import type { Bundle, BundleProposal, TeamConfig } from '@toolcache/core'

import {
  type CliContext,
  type CommonOptions,
  handleCliError,
  loadTeam,
  parseNumber,
  printJson,
  withCommonOptions,
  withContext,
} from '../helpers.js'
import {
  blank,
  colors,
  formatPath,
  header,
  info,
  success,
  symbols,
  treeItem,
  warning,
} from '../ui.js'

const DAY_MS = 24 * 60 * 60 * 1000

interface TeamCommandOptions extends CommonOptions {
  config: string
  days?: number | undefined
}

interface BundleCommandOptions extends TeamCommandOptions {
  dryRun?: boolean | undefined
}

interface WarmCommandOptions extends TeamCommandOptions {
  prewarm?: boolean | undefined
}

interface InstallCommandOptions extends CommonOptions {
  team?: string | undefined
  actor?: string | undefined
}

function windowOf(options: TeamCommandOptions): { since?: Date | undefined } {
  return options.days === undefined ? {} : { since: new Date(Date.now() - options.days * DAY_MS) }
}

/** Add --config, --days and the common options to a team subcommand */
function teamCommand(parent: Command, name: string, description: string): Command {
  return withCommonOptions(
    parent
      .command(name)
      .description(description)
      .requiredOption('-c, --config <path>', 'Path to team.toml')
      .option('--days <n>', 'Analyze the last n days (default: strategy window)', parseNumber)
      .option('--json', 'Output as JSON')
  )
}

async function runTeam(
  options: TeamCommandOptions,
  fn: (context: CliContext, team: TeamConfig) => Promise<void>
): Promise<void> {
  try {
    await withContext(options, async (context) => fn(context, await loadTeam(context, options.config)))
  } catch (error) {
    handleCliError(error)
  }
}

function registerAnalyze(team: Command): void {
  teamCommand(team, 'analyze', 'Show references used together and the bundle worth creating').action(
    (options: TeamCommandOptions) =>
      runTeam(options, async ({ coordinator }, config) => {
        const window = windowOf(options)
        const pairs = await coordinator.coOccurrence(config.name, window)
        const proposal = await coordinator.proposeBundle(config.name, window)
        if (options.json) {
          printJson({ team: config.name, pairs, proposal })
          return
        }

        header(`Team ${config.name} (${coordinator.strategyOf(config.name).name})`)
        if (pairs.length === 0) {
          console.log(colors.muted('  No references used together'))
        }
        pairs.slice(0, 10).forEach((pair, i) => {
          treeItem(
            `${pair.referenceA} + ${pair.referenceB} ${colors.muted(`${pair.score.toFixed(2)} · ${pair.usageCount} joint uses`)}`,
            i === Math.min(pairs.length, 10) - 1
          )
        })
        blank()
        if (proposal) {
          success(`Proposed bundle ${colors.code(proposal.name)}: ${proposal.description}`)
          for (const reference of proposal.memberReferences) {
            console.log(`  ${symbols.bullet} ${reference}`)
          }
        } else {
          console.log(colors.muted('No bundle proposed'))
        }
      })
  )
}

function registerBundle(team: Command): void {
  teamCommand(team, 'bundle', 'Publish the declared and proposed bundles')
    .option('--dry-run', 'Show the bundles without publishing them')
    .action((options: BundleCommandOptions) =>
      runTeam(options, async ({ coordinator }, config) => {
        const proposals = [
          coordinator.configuredBundle(config),
          await coordinator.proposeBundle(config.name, windowOf(options)),
        ].filter((proposal): proposal is BundleProposal => proposal !== null)

        if (options.dryRun) {
          if (options.json) {
            printJson({ team: config.name, proposals })
            return
          }
          for (const proposal of proposals) {
            info(proposal.name, proposal.memberReferences.join(', '))
          }
          return
        }

        const bundles: Bundle[] = []
        for (const proposal of proposals) {
          bundles.push(await coordinator.materializeBundle(proposal))
        }
        if (options.json) {
          printJson({ team: config.name, bundles })
          return
        }
        if (bundles.length === 0) {
          warning('Nothing to bundle')
        }
        for (const bundle of bundles) {
          success(`${colors.code(bundle.reference)} ${colors.muted(`(${bundle.memberReferences.length} members)`)}`)
        }
      })
    )
}

function registerBundles(team: Command): void {
  teamCommand(team, 'bundles', 'List the published bundles of a team').action(
    (options: TeamCommandOptions) =>
      runTeam(options, async ({ coordinator }, config) => {
        const bundles = await coordinator.listBundles(config.name)
        if (options.json) {
          printJson(bundles)
          return
        }
        for (const bundle of bundles) {
          header(bundle.reference)
          info('created', bundle.createdAt)
          info('members', bundle.memberReferences.join(', '))
        }
      })
  )
}

function registerInstall(team: Command): void {
  withCommonOptions(
    team
      .command('install')
      .description('Install a bundle and every member at its pinned digest')
      .argument('<reference>', 'bundles/<team>/<name>:<version>')
      .option('--team <name>', 'Record member pulls as usage of this team')
      .option('--actor <name>', 'Who is installing (default: $USER)')
      .option('--json', 'Output as JSON')
  ).action(async (reference: string, options: InstallCommandOptions) => {
    try {
      await withContext(options, async ({ coordinator }) => {
        const result = await coordinator.installBundle(reference, {
          team: options.team,
          actor: options.actor ?? process.env['USER'],
        })
        if (options.json) {
          printJson(result)
          return
        }
        success(`Installed ${result.bundle.reference}`)
        result.members.forEach((member, i) => {
          treeItem(
            `${member.reference} ${colors.muted(`${member.tierUsed} ${formatPath(member.path)}`)}`,
            i === result.members.length - 1
          )
        })
      })
    } catch (error) {
      handleCliError(error)
    }
  })
}

function registerWarm(team: Command): void {
  teamCommand(team, 'warm', 'Show the cache warm schedule')
    .option('--prewarm', 'Pull the references of the first slot now')
    .action((options: WarmCommandOptions) =>
      runTeam(options, async ({ coordinator }, config) => {
        const schedule = await coordinator.warmSchedule(config.name, windowOf(options))
        const first = schedule[0]
        const prewarmed = options.prewarm && first ? await coordinator.prewarm(first) : []
        const nextSync = coordinator.nextSync(config.name).toISOString()
        if (options.json) {
          printJson({ team: config.name, schedule, nextSync, prewarmed })
          return
        }

        if (schedule.length === 0) {
          console.log(colors.muted('No usage to schedule from'))
        }
        for (const slot of schedule) {
          info(`#${slot.rank} ${String(slot.hour).padStart(2, '0')}:00Z`, `${slot.time} · ${slot.requestCount} requests`)
          for (const reference of slot.references) {
            console.log(`    ${symbols.bullet} ${reference}`)
          }
        }
        info('next sync', nextSync)
        for (const result of prewarmed) {
          if (result.ok) {
            success(`${result.reference} ${colors.muted(result.tierUsed)}`)
          } else {
            console.log(`${symbols.error} ${result.reference} ${colors.error(result.error)}`)
          }
        }
      })
    )
}

function registerPrune(team: Command): void {
  withCommonOptions(
    team
      .command('prune')
      .description('Remove usage events past the retention period')
      .requiredOption('-c, --config <path>', 'Path to team.toml')
      .option('--retention <days>', 'Retention in days (default: strategy retention)', parseNumber)
  ).action((options: TeamCommandOptions & { retention?: number | undefined }) =>
    runTeam(options, async ({ coordinator }, config) => {
      const removed = await coordinator.prune(config.name, options.retention)
      success(`Pruned ${removed} usage events of ${config.name}`)
    })
  )
}

export function registerTeamCommands(program: Command): void {
  const team = program.command('team').description('Team usage analysis, bundles and cache warming')

  registerAnalyze(team)
  registerBundle(team)
  registerBundles(team)
  registerInstall(team)
  registerWarm(team)
  registerPrune(team)
}
