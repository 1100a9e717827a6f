/**
 * Schedule Phrases
 *
 * Parses recurrence phrases such as "every 2 hours" or "every monday at 15:00"
 * into a TriggerSpec, and renders a TriggerSpec back to its canonical phrase.
 *
 *   spec := "every" unit
 *         | "every" INTEGER unit
 *         | "every" DAYNAME ["at" HH:MM[:SS]]
 *         | "every" "day" ["at" HH:MM[:SS]]
 *
 * Matching is case-insensitive and tokens are separated by whitespace.
 * "every day" is a once-a-day trigger; "every 1 day" is a 24 hour interval.
 */

import { type TimeOfDay, type Weekday, isWeekday, checkTime } from './time-date'
import { formatTime } from './time-format'

export { InvalidScheduleSpecError } from './errors'
import { InvalidScheduleSpecError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type IntervalUnit = 'second' | 'minute' | 'hour' | 'day' | 'week'

export type TriggerSpec =
  | { readonly kind: 'interval'; readonly unit: IntervalUnit; readonly n: number }
  | { readonly kind: 'dailyAt'; readonly at?: TimeOfDay }
  | { readonly kind: 'weekdayAt'; readonly weekday: Weekday; readonly at?: TimeOfDay }

export const UNIT_SECONDS: Record<IntervalUnit, number> = {
  second: 1,
  minute: 60,
  hour: 3600,
  day: 86400,
  week: 604800,
}

// ============================================================================
// Parsing
// ============================================================================

const UNITS: Record<string, IntervalUnit> = {
  second: 'second', seconds: 'second',
  minute: 'minute', minutes: 'minute',
  hour: 'hour', hours: 'hour',
  day: 'day', days: 'day',
  week: 'week', weeks: 'week',
}

const TIME_RE = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/

function parseAt(phrase: string, token: string): TimeOfDay {
  const match = TIME_RE.exec(token)
  if (!match) throw new InvalidScheduleSpecError(phrase, `expected HH:MM after 'at', got '${token}'`)
  const time = checkTime(
    parseInt(match[1] ?? '', 10),
    parseInt(match[2] ?? '', 10),
    match[3] === undefined ? 0 : parseInt(match[3], 10),
  )
  if (!time.ok) throw new InvalidScheduleSpecError(phrase, time.error.message)
  return time.value
}

export function parseScheduleSpec(phrase: string): TriggerSpec {
  const tokens = phrase.trim().toLowerCase().split(/\s+/)
  if (tokens[0] !== 'every' || tokens.length < 2) {
    throw new InvalidScheduleSpecError(phrase)
  }

  const [, head = '', second, third, ...rest] = tokens

  // every <n> <unit>
  if (/^\d+$/.test(head)) {
    const unit = second === undefined ? undefined : UNITS[second]
    if (unit === undefined || third !== undefined) throw new InvalidScheduleSpecError(phrase)
    const n = parseInt(head, 10)
    if (n < 1) throw new InvalidScheduleSpecError(phrase, 'interval must be at least 1')
    if (!Number.isSafeInteger(n * UNIT_SECONDS[unit])) throw new InvalidScheduleSpecError(phrase, 'interval is too large')
    return { kind: 'interval', unit, n }
  }

  // every day [at HH:MM] / every <weekday> [at HH:MM]
  if (head === 'day' || isWeekday(head)) {
    let at: TimeOfDay | undefined
    if (second !== undefined) {
      if (second !== 'at' || third === undefined || rest.length > 0) throw new InvalidScheduleSpecError(phrase)
      at = parseAt(phrase, third)
    }
    if (head === 'day') return at ? { kind: 'dailyAt', at } : { kind: 'dailyAt' }
    return at ? { kind: 'weekdayAt', weekday: head, at } : { kind: 'weekdayAt', weekday: head }
  }

  // every <unit>
  const unit = UNITS[head]
  if (unit === undefined || second !== undefined) throw new InvalidScheduleSpecError(phrase)
  return { kind: 'interval', unit, n: 1 }
}

// ============================================================================
// Formatting
// ============================================================================

function formatAt(at: TimeOfDay): string {
  return formatTime(at, at.second === 0 ? '%H:%M' : '%H:%M:%S')
}

/** Canonical phrase; parseScheduleSpec(formatScheduleSpec(s)) is equivalent to s. */
export function formatScheduleSpec(spec: TriggerSpec): string {
  switch (spec.kind) {
    case 'interval':
      return `every ${spec.n} ${spec.unit}${spec.n === 1 ? '' : 's'}`
    case 'dailyAt':
      return spec.at ? `every day at ${formatAt(spec.at)}` : 'every day'
    case 'weekdayAt':
      return spec.at ? `every ${spec.weekday} at ${formatAt(spec.at)}` : `every ${spec.weekday}`
  }
}

export function intervalSeconds(spec: Extract<TriggerSpec, { kind: 'interval' }>): number {
  return spec.n * UNIT_SECONDS[spec.unit]
}
