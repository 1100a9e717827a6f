/**
 * Segment 06: Trigger Tests
 *
 * Due checks and next-fire computation for interval, daily and weekday
 * triggers. 2025-06-01 is a Sunday.
 */

import { describe, it, expect } from 'vitest'
import { instantOf } from '../src/time-date'
import { triggerFromPhrase, createTrigger } from '../src/trigger'
import { InvalidScheduleSpecError } from '../src/schedule-spec'

// ============================================================================
// 1. INTERVAL TRIGGERS
// ============================================================================

describe('Interval Triggers', () => {
  const trigger = triggerFromPhrase('every 2 hours')

  it('is due immediately when never run', () => {
    expect(trigger.isDue(instantOf(2025, 6, 1, 10))).toBe(true)
  })

  it('is not due before the interval elapses', () => {
    expect(trigger.isDue(instantOf(2025, 6, 1, 11, 59, 59), instantOf(2025, 6, 1, 10))).toBe(false)
  })

  it('is due exactly when the interval elapses', () => {
    expect(trigger.isDue(instantOf(2025, 6, 1, 12), instantOf(2025, 6, 1, 10))).toBe(true)
  })

  it('is due across midnight', () => {
    expect(trigger.isDue(instantOf(2025, 6, 2, 0, 30), instantOf(2025, 6, 1, 22, 30))).toBe(true)
  })

  it('next fire is now when never run', () => {
    const now = instantOf(2025, 6, 1, 10)
    expect(trigger.nextFire(now)).toEqual(now)
  })

  it('next fire is the last run plus the interval', () => {
    expect(trigger.nextFire(instantOf(2025, 6, 1, 11), instantOf(2025, 6, 1, 10))).toEqual(instantOf(2025, 6, 1, 12))
  })

  it('next fire is now when overdue', () => {
    expect(trigger.nextFire(instantOf(2025, 6, 1, 13), instantOf(2025, 6, 1, 10))).toEqual(instantOf(2025, 6, 1, 13))
  })

  it('describes itself with the canonical phrase', () => {
    expect(triggerFromPhrase('Every 2 Hours').describe()).toBe('every 2 hours')
    expect(createTrigger({ kind: 'interval', unit: 'day', n: 1 }).describe()).toBe('every 1 day')
  })
})

// ============================================================================
// 2. DAILY TRIGGERS
// ============================================================================

describe('Daily Triggers', () => {
  const trigger = triggerFromPhrase('every day at 10:30')
  const since = instantOf(2025, 6, 1, 9)

  it('is due when the window opens', () => {
    expect(trigger.isDue(instantOf(2025, 6, 1, 10, 30, 0), undefined, since)).toBe(true)
  })

  it('is not due before the first window after it started watching', () => {
    expect(trigger.isDue(instantOf(2025, 6, 1, 10, 29, 59), undefined, since)).toBe(false)
  })

  it('skips a window that opened before it started watching', () => {
    expect(trigger.isDue(instantOf(2025, 6, 1, 11), undefined, instantOf(2025, 6, 1, 10, 45))).toBe(false)
  })

  it('a window opening exactly when watching starts still fires', () => {
    expect(trigger.isDue(instantOf(2025, 6, 1, 10, 30), undefined, instantOf(2025, 6, 1, 10, 30))).toBe(true)
  })

  it('stays due after a late poll', () => {
    expect(trigger.isDue(instantOf(2025, 6, 1, 10, 31, 30), undefined, since)).toBe(true)
    expect(trigger.isDue(instantOf(2025, 6, 2, 10, 29, 59), undefined, since)).toBe(true)
  })

  it('fires at most once per window', () => {
    expect(trigger.isDue(instantOf(2025, 6, 1, 10, 30, 30), instantOf(2025, 6, 1, 10, 30, 0))).toBe(false)
    expect(trigger.isDue(instantOf(2025, 6, 2, 10, 29, 59), instantOf(2025, 6, 1, 10, 31, 30))).toBe(false)
  })

  it('a run on the previous day does not consume today', () => {
    expect(trigger.isDue(instantOf(2025, 6, 1, 10, 30, 10), instantOf(2025, 5, 31, 10, 30, 0))).toBe(true)
  })

  it('a window near midnight carries into the next day', () => {
    const late = triggerFromPhrase('every day at 23:59:30')
    expect(late.isDue(instantOf(2025, 6, 2, 0, 0, 15), instantOf(2025, 5, 31, 23, 59, 30))).toBe(true)
    expect(late.isDue(instantOf(2025, 6, 2, 0, 0, 15), instantOf(2025, 6, 1, 23, 59, 30))).toBe(false)
  })

  it('next fire is later today when before the window', () => {
    expect(trigger.nextFire(instantOf(2025, 6, 1, 9, 30), undefined, since)).toEqual(instantOf(2025, 6, 1, 10, 30))
  })

  it('next fire is now while inside an unconsumed window', () => {
    const now = instantOf(2025, 6, 1, 10, 30, 20)
    expect(trigger.nextFire(now, undefined, since)).toEqual(now)
  })

  it('next fire is tomorrow once today has run', () => {
    expect(trigger.nextFire(instantOf(2025, 6, 1, 10, 30, 20), instantOf(2025, 6, 1, 10, 30, 0))).toEqual(
      instantOf(2025, 6, 2, 10, 30),
    )
  })

  it('next fire is tomorrow when watching started after today\'s window', () => {
    expect(trigger.nextFire(instantOf(2025, 6, 1, 11), undefined, instantOf(2025, 6, 1, 10, 45))).toEqual(
      instantOf(2025, 6, 2, 10, 30),
    )
  })

  it('next fire skips windows up to a last run ahead of now', () => {
    expect(trigger.nextFire(instantOf(2025, 6, 1, 12), instantOf(2025, 6, 2, 10, 30, 5))).toEqual(
      instantOf(2025, 6, 3, 10, 30),
    )
  })

  it('every day without a time is due once per day', () => {
    const daily = triggerFromPhrase('every day')
    expect(daily.isDue(instantOf(2025, 6, 1, 0, 0, 0))).toBe(true)
    expect(daily.isDue(instantOf(2025, 6, 1, 23, 59, 59))).toBe(true)
    expect(daily.isDue(instantOf(2025, 6, 1, 18), instantOf(2025, 6, 1, 8))).toBe(false)
    expect(daily.nextFire(instantOf(2025, 6, 1, 18), instantOf(2025, 6, 1, 8))).toEqual(instantOf(2025, 6, 2))
  })
})

// ============================================================================
// 3. WEEKDAY TRIGGERS
// ============================================================================

describe('Weekday Triggers', () => {
  const trigger = triggerFromPhrase('every monday at 15:00')
  const since = instantOf(2025, 6, 1, 9)

  it('is due on the matching weekday', () => {
    expect(trigger.isDue(instantOf(2025, 6, 2, 15, 0, 0), undefined, since)).toBe(true)
  })

  it('is not due before the first matching weekday', () => {
    expect(trigger.isDue(instantOf(2025, 6, 1, 15, 0, 0), undefined, since)).toBe(false)
    expect(trigger.isDue(instantOf(2025, 6, 2, 14, 59, 59), undefined, since)).toBe(false)
  })

  it('stays due after the monday passes until it runs', () => {
    expect(trigger.isDue(instantOf(2025, 6, 3, 15, 0, 0), undefined, since)).toBe(true)
    expect(trigger.isDue(instantOf(2025, 6, 3, 15, 0, 0), instantOf(2025, 6, 2, 15, 0, 10))).toBe(false)
  })

  it('next fire is the coming monday', () => {
    expect(trigger.nextFire(instantOf(2025, 6, 1, 12), undefined, since)).toEqual(instantOf(2025, 6, 2, 15))
  })

  it('next fire is a week later once this monday has run', () => {
    expect(trigger.nextFire(instantOf(2025, 6, 2, 15, 0, 30), instantOf(2025, 6, 2, 15))).toEqual(
      instantOf(2025, 6, 9, 15),
    )
  })

  it('a weekday without a time opens at midnight', () => {
    const sunday = triggerFromPhrase('every sunday')
    expect(sunday.isDue(instantOf(2025, 6, 1, 0, 0, 0), undefined, instantOf(2025, 5, 31, 12))).toBe(true)
    expect(sunday.isDue(instantOf(2025, 5, 31, 23, 59, 59), undefined, instantOf(2025, 5, 31, 12))).toBe(false)
    expect(sunday.isDue(instantOf(2025, 6, 1, 12), instantOf(2025, 6, 1, 0, 0, 5))).toBe(false)
    expect(sunday.nextFire(instantOf(2025, 6, 1, 12), instantOf(2025, 6, 1, 8))).toEqual(instantOf(2025, 6, 8))
  })

  it('rejects a bad phrase', () => {
    expect(() => triggerFromPhrase('every banana')).toThrow(InvalidScheduleSpecError)
  })
})
