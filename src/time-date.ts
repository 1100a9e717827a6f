/**
 * Time & Date Utilities
 *
 * Immutable calendar values (CalendarDate, TimeOfDay, Instant) and pure functions
 * for validation, arithmetic and comparison. All values are naive local time.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 */

import { type Result, Ok, Err, unwrap } from './result'

// ============================================================================
// Types
// ============================================================================

export type CalendarDate = {
  readonly year: number
  readonly month: number
  readonly day: number
}

export type TimeOfDay = {
  readonly hour: number
  readonly minute: number
  readonly second: number
}

export type Instant = {
  readonly date: CalendarDate
  readonly time: TimeOfDay
}

export type Weekday = 'monday' | 'tuesday' | 'wednesday' | 'thursday' | 'friday' | 'saturday' | 'sunday'

declare const __duration: unique symbol

/** Whole seconds. */
export type Duration = number & { readonly [__duration]: true }

// ============================================================================
// Errors
// ============================================================================

export { InvalidCalendarValueError } from './errors'
import { InvalidCalendarValueError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

export const SECONDS_PER_MINUTE = 60
export const SECONDS_PER_HOUR = 3600
export const SECONDS_PER_DAY = 86400

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_DAYS[month - 1] ?? 0
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): CalendarDate {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return Object.freeze({ year, month, day })
}

// ============================================================================
// Validation & Construction
// ============================================================================

export function checkDate(year: number, month: number, day: number): Result<CalendarDate, InvalidCalendarValueError> {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day))
    return Err(new InvalidCalendarValueError(`Date fields must be integers: ${year}-${month}-${day}`))
  if (year < 1 || year > 9999)
    return Err(new InvalidCalendarValueError(`Invalid year: ${year}`))
  if (month < 1 || month > 12)
    return Err(new InvalidCalendarValueError(`Invalid month: ${month}`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new InvalidCalendarValueError(`Invalid day ${day} for ${year}-${month}`))
  return Ok(Object.freeze({ year, month, day }))
}

export function checkTime(hour: number, minute: number, second: number): Result<TimeOfDay, InvalidCalendarValueError> {
  if (!Number.isInteger(hour) || !Number.isInteger(minute) || !Number.isInteger(second))
    return Err(new InvalidCalendarValueError(`Time fields must be integers: ${hour}:${minute}:${second}`))
  if (hour < 0 || hour > 23)
    return Err(new InvalidCalendarValueError(`Invalid hour: ${hour}`))
  if (minute < 0 || minute > 59)
    return Err(new InvalidCalendarValueError(`Invalid minute: ${minute}`))
  if (second < 0 || second > 59)
    return Err(new InvalidCalendarValueError(`Invalid second: ${second}`))
  return Ok(Object.freeze({ hour, minute, second }))
}

export function makeDate(year: number, month: number, day: number): CalendarDate {
  return unwrap(checkDate(year, month, day))
}

export function makeTime(hour: number, minute = 0, second = 0): TimeOfDay {
  return unwrap(checkTime(hour, minute, second))
}

export function makeInstant(date: CalendarDate, time: TimeOfDay = MIDNIGHT): Instant {
  return Object.freeze({
    date: makeDate(date.year, date.month, date.day),
    time: makeTime(time.hour, time.minute, time.second),
  })
}

/** Shorthand for makeInstant(makeDate(...), makeTime(...)). */
export function instantOf(
  year: number, month: number, day: number,
  hour = 0, minute = 0, second = 0,
): Instant {
  return Object.freeze({ date: makeDate(year, month, day), time: makeTime(hour, minute, second) })
}

export const MIDNIGHT: TimeOfDay = Object.freeze({ hour: 0, minute: 0, second: 0 })

export function startOfDay(date: CalendarDate): Instant {
  return Object.freeze({ date, time: MIDNIGHT })
}

/** Reads the local wall-clock fields of a JS Date. Milliseconds are dropped. */
export function instantFromJSDate(d: Date): Instant {
  return instantOf(d.getFullYear(), d.getMonth() + 1, d.getDate(), d.getHours(), d.getMinutes(), d.getSeconds())
}

export function nowInstant(): Instant {
  return instantFromJSDate(new Date())
}

// ============================================================================
// Durations
// ============================================================================

export function makeDuration(seconds: number): Duration {
  if (!Number.isInteger(seconds))
    throw new InvalidCalendarValueError(`Duration must be a whole number of seconds, got ${seconds}`)
  return seconds as Duration
}

export function durationOf(parts: {
  weeks?: number
  days?: number
  hours?: number
  minutes?: number
  seconds?: number
}): Duration {
  const days = (parts.weeks ?? 0) * 7 + (parts.days ?? 0)
  return makeDuration(
    days * SECONDS_PER_DAY +
    (parts.hours ?? 0) * SECONDS_PER_HOUR +
    (parts.minutes ?? 0) * SECONDS_PER_MINUTE +
    (parts.seconds ?? 0),
  )
}

/**
 * Decodes an Instant used as a duration container.
 *
 * The decoding is calendar-naive: 365-day years, 30-day months,
 * counted from 1970-01-01 00:00:00. Instant(1970, 1, 3) is two days.
 */
export function bestEffortDuration(instant: Instant): Duration {
  const { date, time } = instant
  const days = (date.year - 1970) * 365 + (date.month - 1) * 30 + (date.day - 1)
  return makeDuration(
    days * SECONDS_PER_DAY +
    time.hour * SECONDS_PER_HOUR +
    time.minute * SECONDS_PER_MINUTE +
    time.second,
  )
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

/** Throws InvalidCalendarValueError when the result leaves years 1..9999. */
export function addDays(date: CalendarDate, n: number): CalendarDate {
  if (!Number.isInteger(n))
    throw new InvalidCalendarValueError(`Can only add whole days, got ${n}`)
  const { year, month, day } = jdnToDate(dateToJDN(date.year, date.month, date.day) + n)
  return unwrap(checkDate(year, month, day))
}

export function daysBetween(a: CalendarDate, b: CalendarDate): number {
  return dateToJDN(b.year, b.month, b.day) - dateToJDN(a.year, a.month, a.day)
}

// ============================================================================
// Instant Arithmetic
// ============================================================================

export function timeToSeconds(time: TimeOfDay): number {
  return time.hour * SECONDS_PER_HOUR + time.minute * SECONDS_PER_MINUTE + time.second
}

function secondsToTime(total: number): TimeOfDay {
  return Object.freeze({
    hour: Math.floor(total / SECONDS_PER_HOUR),
    minute: Math.floor((total % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE),
    second: total % SECONDS_PER_MINUTE,
  })
}

export function addSeconds(instant: Instant, n: number): Instant {
  if (!Number.isInteger(n))
    throw new InvalidCalendarValueError(`Can only add whole seconds, got ${n}`)
  if (n === 0) return instant

  let total = timeToSeconds(instant.time) + n
  // Floor division keeps the remainder positive for negative n
  const dayDelta = Math.floor(total / SECONDS_PER_DAY)
  total -= dayDelta * SECONDS_PER_DAY

  const date = dayDelta === 0 ? instant.date : addDays(instant.date, dayDelta)
  return Object.freeze({ date, time: secondsToTime(total) })
}

/** Adds the best-effort decoding of `duration` to `instant`. */
export function addInstant(instant: Instant, duration: Instant): Instant {
  return addSeconds(instant, bestEffortDuration(duration))
}

/** Signed number of seconds from `a` to `b`. */
export function secondsBetween(a: Instant, b: Instant): number {
  return daysBetween(a.date, b.date) * SECONDS_PER_DAY + timeToSeconds(b.time) - timeToSeconds(a.time)
}

// ============================================================================
// Day-of-Week
// ============================================================================

export const WEEKDAYS: readonly Weekday[] = [
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
]

export function isWeekday(value: string): value is Weekday {
  return WEEKDAYS.some((w) => w === value)
}

export function dayOfWeek(date: CalendarDate): Weekday {
  // JDN 0 falls on a Monday; 1970-01-01 (JDN 2440588) gives index 3, a Thursday
  const jdn = dateToJDN(date.year, date.month, date.day)
  return indexToWeekday(((jdn % 7) + 7) % 7)
}

export function weekdayToIndex(w: Weekday): number {
  return WEEKDAYS.indexOf(w)
}

export function indexToWeekday(i: number): Weekday {
  const w = WEEKDAYS[((i % 7) + 7) % 7]
  if (w === undefined) throw new InvalidCalendarValueError(`Invalid weekday index: ${i}`)
  return w
}

// ============================================================================
// Comparison
// ============================================================================

function sign(n: number): number {
  return n < 0 ? -1 : n > 0 ? 1 : 0
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return sign(a.year - b.year || a.month - b.month || a.day - b.day)
}

export function compareTimes(a: TimeOfDay, b: TimeOfDay): number {
  return sign(a.hour - b.hour || a.minute - b.minute || a.second - b.second)
}

export function compareInstants(a: Instant, b: Instant): number {
  return compareDates(a.date, b.date) || compareTimes(a.time, b.time)
}

export function dateEquals(a: CalendarDate, b: CalendarDate): boolean {
  return compareDates(a, b) === 0
}

export function timeEquals(a: TimeOfDay, b: TimeOfDay): boolean {
  return compareTimes(a, b) === 0
}

export function instantEquals(a: Instant, b: Instant): boolean {
  return compareInstants(a, b) === 0
}

export function instantBefore(a: Instant, b: Instant): boolean {
  return compareInstants(a, b) < 0
}

export function instantAfter(a: Instant, b: Instant): boolean {
  return compareInstants(a, b) > 0
}

export function maxInstant(a: Instant, b: Instant): Instant {
  return compareInstants(a, b) >= 0 ? a : b
}
