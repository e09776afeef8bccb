/**
 * Report command - Resolution metrics and optimization recommendations.
 */

import type { Command } from 'commander'

import type { OptimizationRecommendation, RecommendationPriority } from '@toolcache/core'
import { type PerformanceMetrics, tierEntries } from '@toolcache/reporter'

import {
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
  formatBytes,
  formatDuration,
  formatPercent,
  header,
  info,
  symbols,
} from '../ui.js'

const HOUR_MS = 60 * 60 * 1000

interface ReportCommandOptions extends CommonOptions {
  team?: string | undefined
  config?: string | undefined
  window?: number | undefined
}

const PRIORITY_COLORS: Record<RecommendationPriority, (text: string) => string> = {
  high: colors.error,
  medium: colors.warn,
  low: colors.muted,
}

function printMetrics(metrics: PerformanceMetrics): void {
  info('requests', `${metrics.requests} (${metrics.failures} failed)`)
  info('hit rate', formatPercent(metrics.hitRate))
  info('saved', formatBytes(metrics.bandwidthSavedEstimate))
  info('fetched', formatBytes(metrics.bytesFetched))
  for (const [tier, latency] of tierEntries(metrics.avgLatencyByTier)) {
    const count = metrics.countsByTier[tier] ?? 0
    info(tier, `${count} × avg ${formatDuration(latency)}`)
  }
}

function printRecommendations(recommendations: OptimizationRecommendation[]): void {
  if (recommendations.length === 0) {
    console.log(colors.muted('  No recommendations'))
    return
  }
  for (const rec of recommendations) {
    const color = PRIORITY_COLORS[rec.priority]
    console.log(`  ${color(rec.priority.padEnd(6))} ${colors.emphasis(rec.kind)}`)
    console.log(`         ${rec.rationale}`)
    console.log(`         ${symbols.arrow} ${colors.muted(rec.expectedImpact)}`)
  }
}

export function registerReportCommand(program: Command): void {
  withCommonOptions(
    program
      .command('report')
      .description('Show cache metrics and, for a team, optimization recommendations')
      .option('--team <name>', 'Team to report on')
      .option('-c, --config <path>', 'team.toml of the team (sets --team and its strategy)')
      .option('--window <hours>', 'Only the last n hours', parseNumber)
      .option('--json', 'Output as JSON')
  ).action(async (options: ReportCommandOptions) => {
    try {
      await withContext(options, async (context) => {
        const team = options.config ? (await loadTeam(context, options.config)).name : options.team
        const since =
          options.window === undefined ? undefined : new Date(Date.now() - options.window * HOUR_MS)

        if (team === undefined) {
          const metrics = await context.reporter.metrics({ since })
          if (options.json) {
            printJson({ metrics })
            return
          }
          header('All teams')
          printMetrics(metrics)
          return
        }

        const report = await context.reporter.report(team, { since })
        if (options.json) {
          printJson(report)
          return
        }
        header(`Team ${team} since ${report.since}`)
        printMetrics(report.metrics)
        blank()
        console.log(colors.emphasis('Recommendations'))
        printRecommendations(report.recommendations)
      })
    } catch (error) {
      handleCliError(error)
    }
  })
}
