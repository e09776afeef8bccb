/**
 * Shared CLI helper utilities.
 *
 * WHY: Every command opens the same engine, coordinator and reporter for
 * a home directory and must close them so queued usage events and
 * resolution samples reach disk before the process exits.
 */

import chalk from 'chalk'
import { type Command, InvalidArgumentError } from 'commander'

import {
  type LogEntry,
  LogLevel,
  type TeamConfig,
  isToolcacheError,
  readTeamToml,
  setLogHandler,
  setLogLevel,
} from '@toolcache/core'
import { ArtifactEngine } from '@toolcache/engine'
import { MetricsCollector, PerformanceReporter } from '@toolcache/reporter'
import { TeamCacheCoordinator } from '@toolcache/team'

import { colors } from './ui.js'

/**
 * Common CLI options that most commands accept.
 */
export interface CommonOptions {
  home?: string | undefined
  verbose?: boolean | undefined
  json?: boolean | undefined
}

/**
 * Everything a command needs, opened for one home directory.
 */
export interface CliContext {
  engine: ArtifactEngine
  coordinator: TeamCacheCoordinator
  collector: MetricsCollector
  reporter: PerformanceReporter
}

/** Add --home and --verbose to a command */
export function withCommonOptions(command: Command): Command {
  return command
    .option('--home <path>', 'Cache home (default: TOOLCACHE_HOME or ~/.toolcache)')
    .option('-v, --verbose', 'Show debug logging')
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.Debug]: colors.dim('debug'),
  [LogLevel.Info]: colors.info('info '),
  [LogLevel.Warn]: colors.warn('warn '),
  [LogLevel.Error]: colors.error('error'),
}

export function formatLogEntry(entry: LogEntry): string {
  const { scope, ...rest } = entry.context
  const prefix = typeof scope === 'string' ? `${colors.muted(`[${scope}]`)} ` : ''
  const detail = Object.keys(rest).length > 0 ? ` ${colors.dim(JSON.stringify(rest))}` : ''
  return `${LEVEL_LABELS[entry.level]} ${prefix}${entry.message}${detail}`
}

/**
 * Route library logging to stderr in color.
 */
export function installLogHandler(verbose: boolean): void {
  if (verbose) {
    setLogLevel(LogLevel.Debug)
  }
  setLogHandler((entry) => {
    console.error(formatLogEntry(entry))
  })
}

export async function openContext(options: CommonOptions): Promise<CliContext> {
  installLogHandler(options.verbose ?? false)
  const engine = await ArtifactEngine.open({ home: options.home })
  const collector = new MetricsCollector({ paths: engine.paths })
  engine.addRecorder(collector)
  const coordinator = new TeamCacheCoordinator({ engine })
  coordinator.attach()
  const reporter = new PerformanceReporter({ collector, coordinator })
  return { engine, coordinator, collector, reporter }
}

export async function closeContext(context: CliContext): Promise<void> {
  await context.coordinator.close()
  await context.collector.flush()
}

/**
 * Run a command body with an open context, closing it afterwards.
 */
export async function withContext<T>(
  options: CommonOptions,
  fn: (context: CliContext) => Promise<T>
): Promise<T> {
  const context = await openContext(options)
  try {
    return await fn(context)
  } finally {
    await closeContext(context)
  }
}

/**
 * Read a team.toml and apply its cache strategy to the coordinator.
 */
export async function loadTeam(context: CliContext, configPath: string): Promise<TeamConfig> {
  const config = await readTeamToml(configPath)
  context.coordinator.configure(config)
  return config
}

/**
 * Commander argument parser for non-negative numbers.
 */
export function parseNumber(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.')
  }
  return parsed
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2))
}

/**
 * Format error for display.
 */
export function formatError(error: unknown): string {
  if (isToolcacheError(error)) {
    const lines: string[] = [chalk.red(`Error: ${error.message}`)]
    if (error.cause instanceof Error) {
      lines.push(chalk.gray(`  Cause: ${error.cause.message}`))
    }
    return lines.join('\n')
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`)
  }

  return chalk.red(`Error: ${String(error)}`)
}

/**
 * Handle CLI errors with consistent formatting.
 * Prints error message and exits with code 1.
 */
export function handleCliError(error: unknown): never {
  console.error(formatError(error))
  process.exit(1)
}
