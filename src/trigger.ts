/**
 * Triggers
 *
 * Runtime predicates built from a TriggerSpec. A trigger holds no fire state of
 * its own: the owning task's last run is passed in on every query, along with
 * the instant the owner started watching the trigger.
 *
 * Interval triggers are due once `interval` seconds have passed since the last
 * run (inclusive). Daily and weekday triggers fire at most once per window. A
 * window opens at the configured time (midnight when none is given) on each
 * matching day and stays open until the next one opens, so a late poll still
 * fires it. Windows that opened before the owner started watching are skipped.
 */

import {
  type CalendarDate,
  type Instant,
  type TimeOfDay,
  type Weekday,
  MIDNIGHT,
  addDays,
  addSeconds,
  compareInstants,
  dayOfWeek,
  makeInstant,
  maxInstant,
  secondsBetween,
  weekdayToIndex,
} from './time-date'
import {
  type TriggerSpec,
  formatScheduleSpec,
  intervalSeconds,
  parseScheduleSpec,
} from './schedule-spec'

export interface Trigger {
  readonly spec: TriggerSpec
  /**
   * Whether the trigger fires at `now`, given the owner's last run. Windows
   * opening before `since` count as already consumed.
   */
  isDue(now: Instant, lastRun?: Instant, since?: Instant): boolean
  /** Earliest instant at or after `now` at which isDue would hold. */
  nextFire(now: Instant, lastRun?: Instant, since?: Instant): Instant
  describe(): string
}

// ============================================================================
// Factories
// ============================================================================

export function createTrigger(spec: TriggerSpec): Trigger {
  switch (spec.kind) {
    case 'interval':
      return createIntervalTrigger(spec, intervalSeconds(spec))
    case 'dailyAt':
      return createWindowTrigger(spec, spec.at, 1, () => 0)
    case 'weekdayAt': {
      const weekday = spec.weekday
      return createWindowTrigger(spec, spec.at, 7, (date) => daysUntil(weekday, dayOfWeek(date)))
    }
  }
}

/** Parses the phrase and builds its trigger; throws InvalidScheduleSpecError. */
export function triggerFromPhrase(phrase: string): Trigger {
  return createTrigger(parseScheduleSpec(phrase))
}

function daysUntil(target: Weekday, from: Weekday): number {
  return (weekdayToIndex(target) - weekdayToIndex(from) + 7) % 7
}

// ============================================================================
// Interval Triggers
// ============================================================================

function createIntervalTrigger(spec: TriggerSpec, seconds: number): Trigger {
  return {
    spec,
    isDue(now, lastRun) {
      if (lastRun === undefined) return true
      return secondsBetween(lastRun, now) >= seconds
    },
    nextFire(now, lastRun) {
      if (lastRun === undefined) return now
      return maxInstant(addSeconds(lastRun, seconds), now)
    },
    describe() {
      return formatScheduleSpec(spec)
    },
  }
}

// ============================================================================
// Window Triggers (daily / weekday)
// ============================================================================

function createWindowTrigger(
  spec: TriggerSpec,
  at: TimeOfDay | undefined,
  periodDays: number,
  daysUntilMatch: (date: CalendarDate) => number,
): Trigger {
  const opensAt = at ?? MIDNIGHT

  function openingOn(date: CalendarDate, deltaDays: number): Instant {
    return makeInstant(addDays(date, deltaDays), opensAt)
  }

  /** The most recent window opening at or before `ref`. */
  function latestOpening(ref: Instant): Instant {
    const back = (periodDays - daysUntilMatch(ref.date)) % periodDays
    const start = openingOn(ref.date, -back)
    return compareInstants(start, ref) <= 0 ? start : openingOn(start.date, -periodDays)
  }

  /** The first window opening at or after `ref`. */
  function firstOpening(ref: Instant): Instant {
    const start = openingOn(ref.date, daysUntilMatch(ref.date))
    return compareInstants(start, ref) >= 0 ? start : openingOn(start.date, periodDays)
  }

  function consumed(start: Instant, lastRun: Instant | undefined, since: Instant | undefined): boolean {
    if (lastRun !== undefined && compareInstants(lastRun, start) >= 0) return true
    return since !== undefined && compareInstants(since, start) > 0
  }

  function isDue(now: Instant, lastRun?: Instant, since?: Instant): boolean {
    return !consumed(latestOpening(now), lastRun, since)
  }

  return {
    spec,
    isDue,
    nextFire(now, lastRun, since) {
      if (isDue(now, lastRun, since)) return now
      // Openings before the last run or the watch start are all consumed
      let from = now
      if (lastRun !== undefined) from = maxInstant(from, lastRun)
      if (since !== undefined) from = maxInstant(from, since)
      const start = firstOpening(from)
      return consumed(start, lastRun, since) ? openingOn(start.date, periodDays) : start
    },
    describe() {
      return formatScheduleSpec(spec)
    },
  }
}
