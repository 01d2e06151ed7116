/**
 * Segment 11: Chronological History Tests
 *
 * Calendar algorithms, cutover events, region presets and variant strings.
 */

import { describe, it, expect } from 'vitest'
import { gregorianToEpochDay, julianToEpochDay } from '../src/epoch-day'
import { UnsupportedVariantError } from '../src/errors'
import {
  ANCIENT_JULIAN,
  FIRST_GREGORIAN_REFORM,
  FIRST_REFORM_HISTORY,
  GREGORIAN,
  HISTORY_REGIONS,
  JULIAN,
  PROLEPTIC_GREGORIAN,
  SWEDEN,
  SWEDISH,
  algorithmAt,
  baseAlgorithm,
  gregorianCutOver,
  gregorianReform,
  historyForRegion,
  historyOfVariant,
  withAncientJulianLeapYears,
} from '../src/history'
import { formatNewYearStrategy } from '../src/new-year'

// ============================================================================
// 1. ALGORITHMS
// ============================================================================

describe('Swedish algorithm', () => {
  it('runs one day ahead of the Julian calendar', () => {
    expect(SWEDISH.toEpochDay(1705, 6, 1)).toBe(julianToEpochDay(1705, 6, 1) - 1)
  })

  it('has a thirtieth of February in 1712', () => {
    expect(SWEDISH.lengthOfMonth(1712, 2)).toBe(30)
    expect(SWEDISH.isValid(1712, 2, 30)).toBe(true)
    expect(SWEDISH.isValid(1711, 2, 29)).toBe(false)
    expect(SWEDISH.toEpochDay(1712, 2, 30)).toBe(-94163)
    expect(SWEDISH.fromEpochDay(-94163)).toEqual({ year: 1712, month: 2, day: 30 })
    expect(SWEDISH.fromEpochDay(-94164)).toEqual({ year: 1712, month: 2, day: 29 })
  })
})

describe('Ancient Julian algorithm', () => {
  it('follows the Scaliger leap years BC', () => {
    // BC 9 is proleptic year -8
    expect(ANCIENT_JULIAN.lengthOfMonth(-8, 2)).toBe(29)
    // BC 45 and AD 4 had no leap day
    expect(ANCIENT_JULIAN.lengthOfMonth(-44, 2)).toBe(28)
    expect(ANCIENT_JULIAN.lengthOfMonth(4, 2)).toBe(28)
    expect(JULIAN.lengthOfMonth(4, 2)).toBe(29)
  })

  it('equals the Julian calendar from AD 8', () => {
    expect(ANCIENT_JULIAN.toEpochDay(8, 1, 1)).toBe(julianToEpochDay(8, 1, 1))
    expect(ANCIENT_JULIAN.toEpochDay(100, 5, 5)).toBe(julianToEpochDay(100, 5, 5))
  })

  it('starts BC 45 one day after the proleptic Julian count', () => {
    expect(ANCIENT_JULIAN.toEpochDay(-44, 1, 1)).toBe(-735600)
    expect(ANCIENT_JULIAN.fromEpochDay(-735600)).toEqual({ year: -44, month: 1, day: 1 })
  })

  it('converts a leap day BC both ways', () => {
    expect(ANCIENT_JULIAN.toEpochDay(-8, 2, 29)).toBe(-722390)
    expect(ANCIENT_JULIAN.fromEpochDay(-722390)).toEqual({ year: -8, month: 2, day: 29 })
  })

  it('is undefined before the reform', () => {
    expect(ANCIENT_JULIAN.isValid(-45, 12, 31)).toBe(false)
    expect(ANCIENT_JULIAN.isValid(-44, 1, 1)).toBe(true)
  })
})

// ============================================================================
// 2. HISTORIES
// ============================================================================

describe('Cutover histories', () => {
  it('switches on 1582-10-15 by default', () => {
    expect(FIRST_GREGORIAN_REFORM).toBe(-141427)
    expect(algorithmAt(FIRST_REFORM_HISTORY, FIRST_GREGORIAN_REFORM - 1)).toBe(JULIAN)
    expect(algorithmAt(FIRST_REFORM_HISTORY, FIRST_GREGORIAN_REFORM)).toBe(GREGORIAN)
    expect(gregorianCutOver(FIRST_REFORM_HISTORY)).toBe(FIRST_GREGORIAN_REFORM)
  })

  it('proleptic histories have no cutover', () => {
    expect(gregorianCutOver(PROLEPTIC_GREGORIAN)).toBeNull()
    expect(algorithmAt(PROLEPTIC_GREGORIAN, -1_000_000)).toBe(GREGORIAN)
  })

  it('Sweden went Julian, Swedish, Julian, Gregorian', () => {
    expect(algorithmAt(SWEDEN, julianToEpochDay(1700, 2, 28))).toBe(JULIAN)
    expect(algorithmAt(SWEDEN, julianToEpochDay(1700, 2, 29))).toBe(SWEDISH)
    expect(algorithmAt(SWEDEN, julianToEpochDay(1712, 3, 1))).toBe(JULIAN)
    expect(algorithmAt(SWEDEN, gregorianToEpochDay(1753, 3, 1))).toBe(GREGORIAN)
    expect(gregorianCutOver(SWEDEN)).toBe(-79198)
  })

  it('refuses a reform before 1582-10-15', () => {
    expect(() => gregorianReform(FIRST_GREGORIAN_REFORM - 1)).toThrow(UnsupportedVariantError)
    expect(gregorianReform(FIRST_GREGORIAN_REFORM)).toBe(FIRST_REFORM_HISTORY)
  })

  it('names a custom reform by its date', () => {
    expect(gregorianReform(gregorianToEpochDay(1700, 3, 1)).variant).toBe('historic-reform:1700-03-01')
  })

  it('the ancient calculus replaces the base algorithm only', () => {
    const scaliger = withAncientJulianLeapYears(FIRST_REFORM_HISTORY)
    expect(scaliger.variant).toBe('historic-first-gregorian-reform+scaliger')
    expect(baseAlgorithm(scaliger)).toBe(ANCIENT_JULIAN)
    expect(algorithmAt(scaliger, FIRST_GREGORIAN_REFORM)).toBe(GREGORIAN)
    expect(withAncientJulianLeapYears(scaliger)).toBe(scaliger)
    expect(() => withAncientJulianLeapYears(PROLEPTIC_GREGORIAN)).toThrow(UnsupportedVariantError)
  })
})

// ============================================================================
// 3. REGIONS
// ============================================================================

describe('Region presets', () => {
  it('lists the supported regions', () => {
    expect(HISTORY_REGIONS).toEqual(['bg', 'dk', 'fr', 'gb', 'gr', 'no', 'ro', 'ru', 'se', 'us'])
  })

  it('Britain switched in 1752 and began the year on Lady Day before', () => {
    const gb = historyForRegion('GB')
    expect(gb.variant).toBe('historic-gb')
    expect(gregorianCutOver(gb)).toBe(gregorianToEpochDay(1752, 9, 14))
    expect(formatNewYearStrategy(gb.newYearStrategy)).toBe(
      '[BEGIN_OF_JANUARY->567,CHRISTMAS_STYLE->1087,BEGIN_OF_JANUARY->1155,MARIA_ANUNCIATA->1752]'
    )
  })

  it('Russia prefers the Byzantine era until 1699', () => {
    const ru = historyForRegion('ru')
    expect(gregorianCutOver(ru)).toBe(gregorianToEpochDay(1918, 2, 14))
    expect(ru.eraPreference).toEqual({
      era: 'BYZANTINE',
      start: julianToEpochDay(988, 3, 1),
      end: julianToEpochDay(1699, 12, 31),
    })
  })

  it('other regions follow the first reform', () => {
    expect(historyForRegion('it')).toBe(FIRST_REFORM_HISTORY)
  })
})

// ============================================================================
// 4. VARIANT STRINGS
// ============================================================================

describe('historyOfVariant', () => {
  it('resolves named histories', () => {
    expect(historyOfVariant('historic-sweden')).toBe(SWEDEN)
    expect(historyOfVariant('historic-proleptic-gregorian')).toBe(PROLEPTIC_GREGORIAN)
  })

  it('resolves regions and reform dates', () => {
    expect(historyOfVariant('historic-fr').variant).toBe('historic-fr')
    expect(gregorianCutOver(historyOfVariant('historic-reform:1700-03-01'))).toBe(gregorianToEpochDay(1700, 3, 1))
    expect(historyOfVariant('historic-reform:1582-10-15')).toBe(FIRST_REFORM_HISTORY)
  })

  it('appends the ancient calculus', () => {
    const h = historyOfVariant('historic-gb+scaliger')
    expect(h.variant).toBe('historic-gb+scaliger')
    expect(h.ancientJulianLeapYears).toBe(true)
  })

  it('rejects unknown or impossible variants', () => {
    expect(() => historyOfVariant('historic-zz')).toThrow(UnsupportedVariantError)
    expect(() => historyOfVariant('historic-reform:1500-01-01')).toThrow(UnsupportedVariantError)
    expect(() => historyOfVariant('historic-reform:soon')).toThrow(UnsupportedVariantError)
    expect(() => historyOfVariant('historic-proleptic-gregorian+scaliger')).toThrow(UnsupportedVariantError)
  })
})
