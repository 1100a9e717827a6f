/**
 * Recurrence Expansion
 *
 * Pure functions for expanding a recurring interval into its concrete occurrences.
 * Offsets are applied in order, one after another, on every tick; the sequence
 * ends at the first occurrence that would start after the boundary.
 */

import {
  type Instant,
  type Duration,
  bestEffortDuration,
  compareInstants,
  durationOf,
} from './time-date'
import {
  type Interval,
  intervalDuration,
  intervalFromDuration,
  makeInterval,
  shiftInterval,
} from './interval'

// ============================================================================
// Types
// ============================================================================

/** Seconds, or an Instant read through the best-effort duration decoding. */
export type Offset = Duration | Instant

export type RecurringInterval = {
  readonly firstOccurrence: Interval
  readonly lastBoundary: Interval
  readonly offsets: readonly Duration[]
}

interface ExpandOptions {
  limit?: number
}

// ============================================================================
// Errors
// ============================================================================

export { InvalidRecurrenceError } from './errors'
import { InvalidRecurrenceError } from './errors'

// ============================================================================
// Constructors
// ============================================================================

function assertAdvancing(offsets: readonly number[]): void {
  if (offsets.length === 0) throw new InvalidRecurrenceError('A recurring interval needs at least one offset')
  offsets.forEach((seconds, i) => {
    if (!Number.isInteger(seconds) || seconds <= 0) {
      throw new InvalidRecurrenceError(`Offset ${i} must advance time, got ${seconds} seconds`)
    }
  })
}

function toDuration(offset: Offset): Duration {
  return typeof offset === 'number' ? offset : bestEffortDuration(offset)
}

export function makeRecurringInterval(
  firstOccurrence: Interval,
  lastBoundary: Interval,
  offsets: readonly Offset[],
): RecurringInterval {
  const decoded = offsets.map(toDuration)
  assertAdvancing(decoded)
  return Object.freeze({ firstOccurrence, lastBoundary, offsets: Object.freeze(decoded) })
}

export function everyNDaysRecurrence(firstOccurrence: Interval, lastBoundary: Interval, n = 1): RecurringInterval {
  if (!Number.isInteger(n) || n < 1) throw new InvalidRecurrenceError(`everyNDays requires n >= 1, got ${n}`)
  return makeRecurringInterval(firstOccurrence, lastBoundary, [durationOf({ days: n })])
}

export function everyNWeeksRecurrence(firstOccurrence: Interval, lastBoundary: Interval, n = 1): RecurringInterval {
  if (!Number.isInteger(n) || n < 1) throw new InvalidRecurrenceError(`everyNWeeks requires n >= 1, got ${n}`)
  return makeRecurringInterval(firstOccurrence, lastBoundary, [durationOf({ weeks: n })])
}

/**
 * A recurrence with exactly `count` occurrences. The boundary is found by
 * applying the offset count - 1 times and keeps the first occurrence's length.
 */
export function recurrenceFromCount(firstOccurrence: Interval, offset: Offset, count: number): RecurringInterval {
  if (!Number.isInteger(count) || count < 1) {
    throw new InvalidRecurrenceError(`count must be a positive integer, got ${count}`)
  }
  const step = toDuration(offset)
  let lastStart = firstOccurrence.start
  for (let i = 0; i < count - 1; i++) {
    lastStart = intervalFromDuration(lastStart, step).end
  }
  const boundary = intervalFromDuration(lastStart, durationOfInterval(firstOccurrence))
  return makeRecurringInterval(firstOccurrence, boundary, [step])
}

function durationOfInterval(interval: Interval): Duration {
  return durationOf({ seconds: intervalDuration(interval) })
}

// ============================================================================
// Core Expansion
// ============================================================================

export function expandOccurrences(recurrence: RecurringInterval, options?: ExpandOptions): Interval[] {
  const limit = options?.limit
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new InvalidRecurrenceError(`limit must be a positive integer, got ${limit}`)
  }

  const { firstOccurrence, lastBoundary, offsets } = recurrence
  assertAdvancing(offsets)
  const result: Interval[] = [makeInterval(firstOccurrence.start, firstOccurrence.end)]
  if (limit !== undefined && result.length >= limit) return result

  let current = firstOccurrence
  for (;;) {
    for (const offset of offsets) {
      current = shiftInterval(current, offset)
      if (compareInstants(current.start, lastBoundary.start) > 0) return result
      result.push(current)
      if (limit !== undefined && result.length >= limit) return result
    }
  }
}

export function countOccurrences(recurrence: RecurringInterval): number {
  return expandOccurrences(recurrence).length
}
