/**
 * Property tests for schedule phrases and triggers.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { instantGen, triggerSpecGen } from '../generators/temporal'
import { addSeconds, compareInstants, secondsBetween } from '../../../src/time-date'
import { formatScheduleSpec, parseScheduleSpec, intervalSeconds } from '../../../src/schedule-spec'
import { createTrigger } from '../../../src/trigger'

const instants = instantGen({ minYear: 2020, maxYear: 2030 })

describe('Schedule Phrases', () => {
  it('parseScheduleSpec ∘ formatScheduleSpec = identity', () => {
    fc.assert(
      fc.property(triggerSpecGen(), (spec) => {
        expect(parseScheduleSpec(formatScheduleSpec(spec))).toEqual(spec)
      }),
    )
  })

  it('phrases parse regardless of case', () => {
    fc.assert(
      fc.property(triggerSpecGen(), (spec) => {
        expect(parseScheduleSpec(formatScheduleSpec(spec).toUpperCase())).toEqual(spec)
      }),
    )
  })
})

describe('Triggers', () => {
  it('an interval trigger is due exactly when the interval has elapsed', () => {
    fc.assert(
      fc.property(
        triggerSpecGen().filter((s) => s.kind === 'interval'),
        instants,
        fc.integer({ min: 0, max: 30 * 86400 }),
        (spec, lastRun, elapsed) => {
          if (spec.kind !== 'interval') return
          const trigger = createTrigger(spec)
          expect(trigger.isDue(addSeconds(lastRun, elapsed), lastRun)).toBe(elapsed >= intervalSeconds(spec))
        },
      ),
    )
  })

  it('nextFire is never before now and is due', () => {
    fc.assert(
      fc.property(
        triggerSpecGen(),
        instants,
        fc.option(instants, { nil: undefined }),
        fc.option(instants, { nil: undefined }),
        (spec, now, lastRun, since) => {
          const trigger = createTrigger(spec)
          const next = trigger.nextFire(now, lastRun, since)
          expect(compareInstants(next, now)).toBeGreaterThanOrEqual(0)
          expect(trigger.isDue(next, lastRun, since)).toBe(true)
        },
      ),
    )
  })

  it('a due trigger stays due as later polls come in', () => {
    fc.assert(
      fc.property(triggerSpecGen(), instants, fc.integer({ min: 0, max: 3600 }), (spec, since, delay) => {
        const trigger = createTrigger(spec)
        const opening = trigger.nextFire(since, undefined, since)
        expect(trigger.isDue(addSeconds(opening, delay), undefined, since)).toBe(true)
      }),
    )
  })

  it('a trigger is not due again right after it runs', () => {
    fc.assert(
      fc.property(triggerSpecGen(), instants, (spec, now) => {
        const trigger = createTrigger(spec)
        expect(trigger.isDue(now, now)).toBe(false)
      }),
    )
  })

  it('when due, nextFire is now', () => {
    fc.assert(
      fc.property(triggerSpecGen(), instants, fc.option(instants, { nil: undefined }), (spec, now, lastRun) => {
        const trigger = createTrigger(spec)
        fc.pre(trigger.isDue(now, lastRun))
        expect(secondsBetween(now, trigger.nextFire(now, lastRun))).toBe(0)
      }),
    )
  })
})
