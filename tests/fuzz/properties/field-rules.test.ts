/**
 * Property-based tests for field rules.
 *
 * Values stay inside [min, max], setting a field to its own value keeps the date,
 * and the year floor and ceiling are the first and last days of the year.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import type { CalendarSystem, CopticDate } from '../../../src/calendar-system'
import { CHINESE, CHINESE_RULES } from '../../../src/chinese'
import { COPTIC, COPTIC_RULES } from '../../../src/coptic'
import type { StandardRules } from '../../../src/field-rule'
import { atCeiling, atFloor } from '../../../src/field-rule'
import { createHijriRules } from '../../../src/hijri'
import { createHijriAlgorithm } from '../../../src/hijri-algorithm'
import { createHistoricCalendar, createHistoricRules } from '../../../src/historic'
import { FIRST_REFORM_HISTORY, SWEDEN, historyForRegion } from '../../../src/history'
import { INDIAN, INDIAN_RULES } from '../../../src/indian'
import { createJapaneseRules } from '../../../src/japanese'
import { unwrap } from '../../../src/result'
import { createCalendarRegistry } from '../../../src/variant-registry'
import {
  chineseDateGen,
  copticDateGen,
  hijriDateGen,
  historicDateGen,
  indianDateGen,
  japaneseDateGen,
} from '../generators'
import { standardFieldsConsistent } from '../invariants'

function yearBounds<D>(system: CalendarSystem<D>, rules: StandardRules<D>, date: D): void {
  const first = unwrap(atFloor(rules.year, date))
  const last = unwrap(atCeiling(rules.year, date))
  expect(rules.year.getInt(first)).toBe(rules.year.getInt(date))
  expect(rules.dayOfYear.getInt(first)).toBe(1)
  expect(rules.year.getInt(last)).toBe(rules.year.getInt(date))
  expect(rules.dayOfYear.getInt(last)).toBe(system.lengthOfYear(date))
  expect(system.toEpochDay(last) - system.toEpochDay(first) + 1).toBe(system.lengthOfYear(date))
}

// ============================================================================
// Standard Rules
// ============================================================================

describe('Field rules - consistency', () => {
  it('Coptic', () => {
    fc.assert(fc.property(copticDateGen(), (date) => {
      expect(standardFieldsConsistent(COPTIC, COPTIC_RULES, date).violations).toEqual([])
    }))
  })

  it('Indian', () => {
    fc.assert(fc.property(indianDateGen(), (date) => {
      expect(standardFieldsConsistent(INDIAN, INDIAN_RULES, date).violations).toEqual([])
    }))
  })

  it('Hijri', () => {
    const system = createHijriAlgorithm('islamic-tbla:-1')
    const rules = createHijriRules(system)
    fc.assert(fc.property(hijriDateGen(system), (date) => {
      expect(standardFieldsConsistent(system, rules, date).violations).toEqual([])
    }))
  })

  it('Chinese', () => {
    fc.assert(
      fc.property(chineseDateGen(), (date) => {
        expect(standardFieldsConsistent(CHINESE, CHINESE_RULES, date).violations).toEqual([])
      }),
      { numRuns: 20 }
    )
  })

  it('Japanese', () => {
    const system = createCalendarRegistry().japanese()
    const rules = createJapaneseRules(system)
    fc.assert(fc.property(japaneseDateGen(system), (date) => {
      expect(standardFieldsConsistent(system, rules, date).violations).toEqual([])
    }))
  })

  it.each([FIRST_REFORM_HISTORY, SWEDEN, historyForRegion('gb'), historyForRegion('ru')])(
    'historic $variant',
    (history) => {
      const system = createHistoricCalendar(history)
      const rules = createHistoricRules(system)
      fc.assert(fc.property(historicDateGen(system), (date) => {
        expect(standardFieldsConsistent(system, rules, date).violations).toEqual([])
      }))
    }
  )
})

// ============================================================================
// Floor and Ceiling
// ============================================================================

describe('Field rules - year floor and ceiling', () => {
  it('Coptic', () => {
    fc.assert(fc.property(copticDateGen(), (date) => yearBounds(COPTIC, COPTIC_RULES, date)))
  })

  it('Indian', () => {
    fc.assert(fc.property(indianDateGen(), (date) => yearBounds(INDIAN, INDIAN_RULES, date)))
  })

  it('Hijri', () => {
    const system = createHijriAlgorithm('islamic-civil')
    const rules = createHijriRules(system)
    fc.assert(fc.property(hijriDateGen(system), (date) => yearBounds(system, rules, date)))
  })

  it('Sweden', () => {
    const system = createHistoricCalendar(SWEDEN)
    const rules = createHistoricRules(system)
    fc.assert(fc.property(historicDateGen(system), (date) => yearBounds(system, rules, date)))
  })
})

// ============================================================================
// Lenient Day Setting
// ============================================================================

describe('Field rules - lenient day of month', () => {
  it('moves by whole days from the current date', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 3, max: 9000 }),
        fc.integer({ min: 1, max: 13 }),
        fc.integer({ min: -400, max: 400 }),
        (year, month, value) => {
          const date: CopticDate = { calendar: 'coptic', year, month, day: 1 }
          const moved = unwrap(COPTIC_RULES.dayOfMonth.withInt(date, value, true))
          expect(COPTIC.toEpochDay(moved) - COPTIC.toEpochDay(date)).toBe(value - 1)
        }
      )
    )
  })
})
