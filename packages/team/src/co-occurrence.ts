/**
 * Co-occurrence analysis over usage events.
 *
 * Two uses by the same actor within `pairWindowMs` of each other count as
 * one joint use. Uses are matched one-to-one, so a burst of ten pulls of A
 * next to one pull of B is one joint use, not ten.
 *
 * score(A, B) = joint(A, B) / max(uses(A), uses(B))
 *
 * Symmetric by construction, and never above 1 because the matching can
 * pair each use at most once.
 */

import type { CoOccurrencePair, ReferenceString, UsageEvent } from '@toolcache/core'

export interface CoOccurrenceOptions {
  pairWindowMs: number
}

/**
 * Count one-to-one matches between two ascending timestamp lists where
 * the matched times are at most `windowMs` apart. Greedy two-pointer.
 */
export function countJointUses(a: readonly number[], b: readonly number[], windowMs: number): number {
  let i = 0
  let j = 0
  let joint = 0
  while (i < a.length && j < b.length) {
    const ta = a[i] ?? 0
    const tb = b[j] ?? 0
    if (Math.abs(ta - tb) <= windowMs) {
      joint++
      i++
      j++
    } else if (ta < tb) {
      i++
    } else {
      j++
    }
  }
  return joint
}

function pairKey(a: ReferenceString, b: ReferenceString): string {
  return `${a}\n${b}`
}

/** Uses per reference across all actors */
export function usageCounts(events: readonly UsageEvent[]): Map<ReferenceString, number> {
  const counts = new Map<ReferenceString, number>()
  for (const event of events) {
    counts.set(event.reference, (counts.get(event.reference) ?? 0) + 1)
  }
  return counts
}

/**
 * Scored reference pairs, best first (score, then joint uses, then name).
 * Pairs never used together are omitted.
 */
export function coOccurrence(
  events: readonly UsageEvent[],
  options: CoOccurrenceOptions
): CoOccurrencePair[] {
  const counts = usageCounts(events)

  // actor → reference → ascending timestamps
  const byActor = new Map<string, Map<ReferenceString, number[]>>()
  for (const event of events) {
    const refs = byActor.get(event.actor) ?? new Map<ReferenceString, number[]>()
    const times = refs.get(event.reference) ?? []
    times.push(Date.parse(event.timestamp))
    refs.set(event.reference, times)
    byActor.set(event.actor, refs)
  }

  const joint = new Map<string, number>()
  for (const refs of byActor.values()) {
    const names = [...refs.keys()].sort()
    for (const times of refs.values()) {
      times.sort((x, y) => x - y)
    }
    for (let i = 0; i < names.length; i++) {
      for (let j = i + 1; j < names.length; j++) {
        const a = names[i]
        const b = names[j]
        if (a === undefined || b === undefined) continue
        const matched = countJointUses(refs.get(a) ?? [], refs.get(b) ?? [], options.pairWindowMs)
        if (matched > 0) {
          const key = pairKey(a, b)
          joint.set(key, (joint.get(key) ?? 0) + matched)
        }
      }
    }
  }

  const pairs: CoOccurrencePair[] = []
  for (const [key, usageCount] of joint) {
    const [referenceA = '', referenceB = ''] = key.split('\n')
    const denominator = Math.max(counts.get(referenceA) ?? 0, counts.get(referenceB) ?? 0)
    pairs.push({
      referenceA,
      referenceB,
      score: denominator === 0 ? 0 : usageCount / denominator,
      usageCount,
    })
  }

  return pairs.sort(comparePairs)
}

/** Best pair first */
export function comparePairs(x: CoOccurrencePair, y: CoOccurrencePair): number {
  return (
    y.score - x.score ||
    y.usageCount - x.usageCount ||
    x.referenceA.localeCompare(y.referenceA) ||
    x.referenceB.localeCompare(y.referenceB)
  )
}
