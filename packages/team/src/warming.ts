/**
 * Cache warm schedule from hour-of-day usage.
 *
 * Hours are UTC. The busiest hours of the analysis period become slots;
 * each slot fires `leadMinutes` before the next occurrence of its hour
 * and lists the references most requested in that hour.
 */

import type { ReferenceString, UsageEvent } from '@toolcache/core'

const HOUR_MS = 60 * 60 * 1000
const DAY_MS = 24 * HOUR_MS

export interface WarmScheduleOptions {
  /** Number of busiest hours to schedule */
  topHours: number
  leadMinutes: number
  /** References listed per slot */
  referencesPerSlot: number
  now: Date
}

export interface WarmSlot {
  /** When to start warming, ISO-8601 */
  time: string
  /** UTC hour of day the slot prepares for */
  hour: number
  /** 1 for the busiest hour */
  rank: number
  requestCount: number
  references: ReferenceString[]
}

interface HourBucket {
  hour: number
  count: number
  references: Map<ReferenceString, number>
}

/** Next start of `hour` (UTC) strictly after `now` */
export function nextOccurrence(hour: number, now: Date): Date {
  const next = new Date(now.getTime())
  next.setUTCHours(hour, 0, 0, 0)
  if (next.getTime() <= now.getTime()) {
    return new Date(next.getTime() + DAY_MS)
  }
  return next
}

export function warmSchedule(events: readonly UsageEvent[], options: WarmScheduleOptions): WarmSlot[] {
  const buckets = new Map<number, HourBucket>()
  for (const event of events) {
    const hour = new Date(event.timestamp).getUTCHours()
    const bucket = buckets.get(hour) ?? { hour, count: 0, references: new Map() }
    bucket.count++
    bucket.references.set(event.reference, (bucket.references.get(event.reference) ?? 0) + 1)
    buckets.set(hour, bucket)
  }

  const ranked = [...buckets.values()]
    .sort((a, b) => b.count - a.count || a.hour - b.hour)
    .slice(0, options.topHours)

  return ranked.map((bucket, i) => {
    const start = nextOccurrence(bucket.hour, options.now)
    const references = [...bucket.references.entries()]
      .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
      .slice(0, options.referencesPerSlot)
      .map(([reference]) => reference)
    return {
      time: new Date(start.getTime() - options.leadMinutes * 60_000).toISOString(),
      hour: bucket.hour,
      rank: i + 1,
      requestCount: bucket.count,
      references,
    }
  })
}
