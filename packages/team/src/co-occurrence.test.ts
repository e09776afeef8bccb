/**
 * Tests for co-occurrence scoring.
 */

import type { UsageEvent } from '@toolcache/core'
import { describe, expect, test } from 'vitest'

import { coOccurrence, countJointUses, usageCounts } from './co-occurrence.js'

const HOUR = 60 * 60 * 1000
const MINUTE = 60 * 1000
const DAY = 24 * HOUR
const BASE = Date.parse('2026-03-01T00:00:00.000Z')

const X = 'github/acme/x-tool:1.0.0'
const Y = 'github/acme/y-tool:2.0.0'
const Z = 'github/acme/z-tool:0.3.0'

function use(reference: string, at: number, actor = 'alice'): UsageEvent {
  return { team: 'platform', reference, actor, timestamp: new Date(at).toISOString() }
}

/** 45 joint uses of X and Y, plus 5 solo uses of each far apart */
function platformScenario(): UsageEvent[] {
  const events: UsageEvent[] = []
  for (let k = 0; k < 45; k++) {
    events.push(use(X, BASE + k * 2 * HOUR))
    events.push(use(Y, BASE + k * 2 * HOUR + 5 * MINUTE))
  }
  for (let k = 0; k < 5; k++) {
    events.push(use(X, BASE + 10 * DAY + k * 2 * HOUR))
    events.push(use(Y, BASE + 20 * DAY + k * 2 * HOUR))
  }
  return events
}

describe('countJointUses', () => {
  test('matches each use at most once', () => {
    // Three uses of A next to one use of B is one joint use
    expect(countJointUses([0, 10, 20], [15], 100)).toBe(1)
  })

  test('ignores uses further apart than the window', () => {
    expect(countJointUses([0, 1000], [500, 2000], 100)).toBe(0)
  })

  test('counts uses exactly at the window edge', () => {
    expect(countJointUses([0], [100], 100)).toBe(1)
  })

  test('pairs interleaved uses in order', () => {
    expect(countJointUses([0, 50, 300], [40, 90, 1000], 60)).toBe(2)
  })
})

describe('coOccurrence', () => {
  test('scores the platform scenario at 45/50', () => {
    const events = platformScenario()
    expect(usageCounts(events).get(X)).toBe(50)
    expect(usageCounts(events).get(Y)).toBe(50)

    expect(coOccurrence(events, { pairWindowMs: HOUR })).toEqual([
      { referenceA: X, referenceB: Y, score: 0.9, usageCount: 45 },
    ])
  })

  test('only pairs uses made by the same actor', () => {
    const events = [use(X, BASE, 'alice'), use(Y, BASE + MINUTE, 'bob')]
    expect(coOccurrence(events, { pairWindowMs: HOUR })).toEqual([])
  })

  test('divides by the busier reference across all actors', () => {
    const events = [
      use(X, BASE, 'alice'),
      use(Y, BASE + MINUTE, 'alice'),
      use(X, BASE + 5 * DAY, 'bob'),
      use(X, BASE + 6 * DAY, 'carol'),
    ]
    expect(coOccurrence(events, { pairWindowMs: HOUR })).toEqual([
      { referenceA: X, referenceB: Y, score: 1 / 3, usageCount: 1 },
    ])
  })

  test('is symmetric and bounded whatever the event order', () => {
    const events = [
      use(Z, BASE),
      use(X, BASE + MINUTE),
      use(Y, BASE + 2 * MINUTE),
      use(X, BASE + 3 * MINUTE, 'bob'),
      use(Z, BASE + 4 * MINUTE, 'bob'),
      use(Z, BASE + 5 * MINUTE, 'bob'),
      use(Y, BASE + 3 * HOUR),
    ]

    const forward = coOccurrence(events, { pairWindowMs: 10 * MINUTE })
    const backward = coOccurrence([...events].reverse(), { pairWindowMs: 10 * MINUTE })

    expect(backward).toEqual(forward)
    expect(forward.map((p) => [p.referenceA, p.referenceB])).toEqual([
      [X, Z],
      [X, Y],
      [Y, Z],
    ])
    for (const pair of forward) {
      expect(pair.referenceA < pair.referenceB).toBe(true)
      expect(pair.score).toBeGreaterThan(0)
      expect(pair.score).toBeLessThanOrEqual(1)
    }
  })
})
