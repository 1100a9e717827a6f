/**
 * Time & Date Formatting
 *
 * Pattern-driven parsing and formatting for calendar values. Patterns use the
 * strftime directives %Y %m %d %H %M %S and %% for a literal percent sign.
 */

import {
  type CalendarDate,
  type TimeOfDay,
  type Instant,
  checkDate,
  checkTime,
} from './time-date'
import { type Result, Ok, Err, unwrap } from './result'
import { InvalidCalendarValueError } from './errors'

export { InvalidCalendarValueError } from './errors'

export const DEFAULT_DATE_PATTERN = '%Y-%m-%d'
export const DEFAULT_TIME_PATTERN = '%H:%M:%S'
export const DEFAULT_INSTANT_PATTERN = '%Y-%m-%d %H:%M:%S'

type Field = 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second'

const DIRECTIVES: Record<string, Field> = {
  Y: 'year',
  m: 'month',
  d: 'day',
  H: 'hour',
  M: 'minute',
  S: 'second',
}

type Token = { kind: 'literal'; text: string } | { kind: 'field'; field: Field }

type Fields = Record<Field, number>

// ============================================================================
// Pattern Compilation
// ============================================================================

const tokenCache = new Map<string, Token[]>()

function tokenize(pattern: string): Result<Token[], InvalidCalendarValueError> {
  const cached = tokenCache.get(pattern)
  if (cached) return Ok(cached)

  const tokens: Token[] = []
  let literal = ''
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i)
    if (ch !== '%') {
      literal += ch
      continue
    }
    const directive = pattern[i + 1]
    i++
    if (directive === '%') {
      literal += '%'
      continue
    }
    const field = directive === undefined ? undefined : DIRECTIVES[directive]
    if (field === undefined) {
      return Err(new InvalidCalendarValueError(`Unsupported directive '%${directive ?? ''}' in pattern '${pattern}'`))
    }
    if (literal) tokens.push({ kind: 'literal', text: literal })
    literal = ''
    tokens.push({ kind: 'field', field })
  }
  if (literal) tokens.push({ kind: 'literal', text: literal })

  tokenCache.set(pattern, tokens)
  return Ok(tokens)
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

// ============================================================================
// Formatting
// ============================================================================

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0')
}

function render(fields: Fields, pattern: string): string {
  return unwrap(tokenize(pattern))
    .map((t) => (t.kind === 'literal' ? t.text : pad(fields[t.field], t.field === 'year' ? 4 : 2)))
    .join('')
}

export function formatDate(date: CalendarDate, pattern = DEFAULT_DATE_PATTERN): string {
  return render({ ...date, hour: 0, minute: 0, second: 0 }, pattern)
}

export function formatTime(time: TimeOfDay, pattern = DEFAULT_TIME_PATTERN): string {
  return render({ year: 1970, month: 1, day: 1, ...time }, pattern)
}

export function formatInstant(instant: Instant, pattern = DEFAULT_INSTANT_PATTERN): string {
  return render({ ...instant.date, ...instant.time }, pattern)
}

// ============================================================================
// Parsing
// ============================================================================

/** Fields absent from the pattern default to 1970-01-01 00:00:00. */
function extract(str: string, pattern: string): Result<Fields, InvalidCalendarValueError> {
  const compiled = tokenize(pattern)
  if (!compiled.ok) return compiled
  const tokens = compiled.value
  const source = tokens
    .map((t) => (t.kind === 'literal' ? escapeRegExp(t.text) : t.field === 'year' ? '(\\d{4})' : '(\\d{2})'))
    .join('')
  const match = new RegExp(`^${source}$`).exec(str)
  if (!match) return Err(new InvalidCalendarValueError(`'${str}' does not match pattern '${pattern}'`))

  const fields: Fields = { year: 1970, month: 1, day: 1, hour: 0, minute: 0, second: 0 }
  const seen = new Set<Field>()
  let group = 1
  for (const t of tokens) {
    if (t.kind === 'literal') continue
    const value = parseInt(match[group++] ?? '', 10)
    if (seen.has(t.field) && fields[t.field] !== value) {
      return Err(new InvalidCalendarValueError(`Conflicting ${t.field} values in '${str}'`))
    }
    seen.add(t.field)
    fields[t.field] = value
  }
  return Ok(fields)
}

export function tryParseDate(str: string, pattern = DEFAULT_DATE_PATTERN): Result<CalendarDate, InvalidCalendarValueError> {
  const fields = extract(str, pattern)
  if (!fields.ok) return fields
  return checkDate(fields.value.year, fields.value.month, fields.value.day)
}

export function tryParseTime(str: string, pattern = DEFAULT_TIME_PATTERN): Result<TimeOfDay, InvalidCalendarValueError> {
  const fields = extract(str, pattern)
  if (!fields.ok) return fields
  return checkTime(fields.value.hour, fields.value.minute, fields.value.second)
}

export function tryParseInstant(str: string, pattern = DEFAULT_INSTANT_PATTERN): Result<Instant, InvalidCalendarValueError> {
  const fields = extract(str, pattern)
  if (!fields.ok) return fields
  const { year, month, day, hour, minute, second } = fields.value
  const date = checkDate(year, month, day)
  if (!date.ok) return date
  const time = checkTime(hour, minute, second)
  if (!time.ok) return time
  return Ok(Object.freeze({ date: date.value, time: time.value }))
}

export function parseDate(str: string, pattern = DEFAULT_DATE_PATTERN): CalendarDate {
  return unwrap(tryParseDate(str, pattern))
}

export function parseTime(str: string, pattern = DEFAULT_TIME_PATTERN): TimeOfDay {
  return unwrap(tryParseTime(str, pattern))
}

export function parseInstant(str: string, pattern = DEFAULT_INSTANT_PATTERN): Instant {
  return unwrap(tryParseInstant(str, pattern))
}
