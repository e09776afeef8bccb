/**
 * Resolution counters.
 *
 * WHY: The engine hands every resolution to its recorders synchronously,
 * so recording only queues. With a home directory, samples are appended
 * to `metrics/resolutions.jsonl` so a later process can report on them;
 * without one they are kept in memory for the running process.
 */

import { appendFile, readFile } from 'node:fs/promises'
import {
  type Logger,
  type ResolutionRecord,
  type ResolutionRecorder,
  createLogger,
  errnoCode,
  toToolcacheError,
  validateResolutionRecord,
} from '@toolcache/core'
import { type PathResolver, ensureDir } from '@toolcache/store'

export interface MetricsCollectorOptions {
  /** Persist samples under this home; in-memory only when absent */
  paths?: PathResolver | undefined
  logger?: Logger | undefined
}

export interface RecordFilter {
  team?: string | undefined
  since?: Date | undefined
  until?: Date | undefined
}

export function matchesFilter(record: ResolutionRecord, filter: RecordFilter): boolean {
  const at = Date.parse(record.timestamp)
  return (
    (filter.team === undefined || record.team === filter.team) &&
    (filter.since === undefined || at >= filter.since.getTime()) &&
    (filter.until === undefined || at < filter.until.getTime())
  )
}

export class MetricsCollector implements ResolutionRecorder {
  private readonly paths: PathResolver | undefined
  private readonly log: Logger
  private readonly recorded: ResolutionRecord[] = []
  private pending: ResolutionRecord[] = []
  private writes: Promise<void> = Promise.resolve()

  constructor(options: MetricsCollectorOptions = {}) {
    this.paths = options.paths
    this.log = options.logger ?? createLogger('metrics')
  }

  recordResolution(record: ResolutionRecord): void {
    if (!this.paths) {
      this.recorded.push(record)
      return
    }

    this.pending.push(record)
    if (this.pending.length === 1) {
      this.writes = this.writes.then(() => this.drain())
    }
  }

  /** Wait until every recorded sample has been written */
  async flush(): Promise<void> {
    await this.writes
  }

  /**
   * Samples matching the filter, oldest first. Reads the persisted log
   * when there is one, so samples of earlier processes are included.
   */
  async records(filter: RecordFilter = {}): Promise<ResolutionRecord[]> {
    const all = this.paths ? await this.readPersisted(this.paths) : [...this.recorded]
    return all
      .filter((record) => matchesFilter(record, filter))
      .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp))
  }

  private async drain(): Promise<void> {
    const batch = this.pending
    this.pending = []
    if (!this.paths || batch.length === 0) return
    try {
      await ensureDir(this.paths.metrics)
      await appendFile(
        this.paths.resolutionLog,
        batch.map((record) => `${JSON.stringify(record)}\n`).join('')
      )
    } catch (err) {
      this.log.warn('Failed to write resolution samples', {
        count: batch.length,
        error: toToolcacheError(err).message,
      })
    }
  }

  private async readPersisted(paths: PathResolver): Promise<ResolutionRecord[]> {
    await this.flush()
    let content: string
    try {
      content = await readFile(paths.resolutionLog, 'utf8')
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return []
      }
      throw err
    }

    const records: ResolutionRecord[] = []
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
      const result = validateResolutionRecord(parsed)
      if (result.valid) {
        records.push(result.data)
      } else {
        skipped++
      }
    }
    if (skipped > 0) {
      this.log.warn('Skipped malformed resolution samples', { skipped })
    }
    return records
  }
}
