/**
 * Intervals
 *
 * A pair of Instants delimiting a start and an end. The end may precede the
 * start, in which case the duration is negative. Intervals order by start.
 */

import {
  type Instant,
  type Duration,
  addSeconds,
  bestEffortDuration,
  compareInstants,
  instantEquals,
  secondsBetween,
} from './time-date'
import { DEFAULT_INSTANT_PATTERN, formatInstant } from './time-format'

export type Interval = {
  readonly start: Instant
  readonly end: Instant
}

export function makeInterval(start: Instant, end: Instant): Interval {
  return Object.freeze({ start, end })
}

/**
 * Builds an interval from its start and a length. A numeric length is seconds;
 * an Instant length goes through the best-effort duration decoding.
 */
export function intervalFromDuration(start: Instant, length: Duration | Instant): Interval {
  const seconds = typeof length === 'number' ? length : bestEffortDuration(length)
  return makeInterval(start, addSeconds(start, seconds))
}

/** end - start, in seconds. */
export function intervalDuration(interval: Interval): number {
  return secondsBetween(interval.start, interval.end)
}

export function shiftInterval(interval: Interval, seconds: number): Interval {
  return makeInterval(addSeconds(interval.start, seconds), addSeconds(interval.end, seconds))
}

export function compareIntervals(a: Interval, b: Interval): number {
  return compareInstants(a.start, b.start)
}

export function intervalEquals(a: Interval, b: Interval): boolean {
  return instantEquals(a.start, b.start) && instantEquals(a.end, b.end)
}

export function formatInterval(interval: Interval, pattern = DEFAULT_INSTANT_PATTERN): string {
  return `${formatInstant(interval.start, pattern)} - ${formatInstant(interval.end, pattern)}`
}
