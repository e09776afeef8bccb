/**
 * Append-only team usage log.
 *
 * WHY: Several processes on one machine pull for the same team. Each
 * appends JSON lines to `teams/<team>/usage.jsonl` under the team's file
 * lock, so lines from different writers never interleave. Readers take
 * no lock: a torn last line is skipped like any other malformed line.
 */

import { appendFile, readFile } from 'node:fs/promises'
import {
  type Logger,
  type UsageEvent,
  atomicWrite,
  createLogger,
  errnoCode,
  validateUsageEvent,
  withLock,
} from '@toolcache/core'
import { type PathResolver, ensureDir } from '@toolcache/store'

export interface UsageLogOptions {
  paths: PathResolver
  logger?: Logger | undefined
}

export interface ReadUsageOptions {
  /** Only events at or after this time */
  since?: Date | undefined
  /** Only events before this time */
  until?: Date | undefined
}

function serialize(events: UsageEvent[]): string {
  return events
    .map((event) =>
      JSON.stringify({
        team: event.team,
        reference: event.reference,
        actor: event.actor,
        timestamp: event.timestamp,
      })
    )
    .map((line) => `${line}\n`)
    .join('')
}

export class UsageLog {
  private readonly paths: PathResolver
  private readonly log: Logger

  constructor(options: UsageLogOptions) {
    this.paths = options.paths
    this.log = options.logger ?? createLogger('usage-log')
  }

  /**
   * Append events for one team.
   */
  async append(team: string, events: UsageEvent[]): Promise<void> {
    if (events.length === 0) return
    await ensureDir(this.paths.teamDir(team))
    await withLock(this.paths.usageLock(team), () =>
      appendFile(this.paths.usageLog(team), serialize(events))
    )
  }

  /**
   * Events of one team in timestamp order. Malformed lines are skipped.
   */
  async read(team: string, options: ReadUsageOptions = {}): Promise<UsageEvent[]> {
    const since = options.since?.getTime()
    const until = options.until?.getTime()
    return (await this.readAll(team)).filter((event) => {
      const at = Date.parse(event.timestamp)
      return (since === undefined || at >= since) && (until === undefined || at < until)
    })
  }

  /**
   * Drop events older than `olderThan`. Returns how many were removed.
   */
  async prune(team: string, olderThan: Date): Promise<number> {
    const cutoff = olderThan.getTime()
    await ensureDir(this.paths.teamDir(team))
    return withLock(this.paths.usageLock(team), async () => {
      const events = await this.readAll(team)
      const kept = events.filter((event) => Date.parse(event.timestamp) >= cutoff)
      if (kept.length !== events.length) {
        await atomicWrite(this.paths.usageLog(team), serialize(kept), { tmpDir: this.paths.temp })
      }
      return events.length - kept.length
    })
  }

  private async readAll(team: string): Promise<UsageEvent[]> {
    let content: string
    try {
      content = await readFile(this.paths.usageLog(team), 'utf8')
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return []
      }
      throw err
    }

    const events: UsageEvent[] = []
    let skipped = 0
    for (const line of content.split('\n')) {
      if (line.trim() === '') continue
      let parsed: unknown
      try {
        parsed = JSON.parse(line)
      } catch {
        skipped++
        continue
      }
      const result = validateUsageEvent(parsed)
      if (result.valid && result.data.team === team) {
        events.push(result.data)
      } else {
        skipped++
      }
    }
    if (skipped > 0) {
      this.log.warn('Skipped malformed usage lines', { team, skipped })
    }

    return events.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp))
  }
}
