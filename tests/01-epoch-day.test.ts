/**
 * Segment 01: Epoch-Day Arithmetic Tests
 *
 * Gregorian and Julian conversions, weekdays, range checks and ISO parsing.
 */

import { describe, it, expect } from 'vitest'
import {
  MAX_EPOCH_DAY,
  MIN_EPOCH_DAY,
  checkEpochDay,
  epochDayToGregorian,
  epochDayToJulian,
  floorDiv,
  floorMod,
  formatIsoDate,
  gregorianDayOfYear,
  gregorianLengthOfMonth,
  gregorianToEpochDay,
  isGregorianLeapYear,
  isJulianLeapYear,
  isoDate,
  isoDayOfWeek,
  julianLengthOfMonth,
  julianToEpochDay,
  parseIsoDate,
  toIsoWeekday,
} from '../src/epoch-day'
import { OutOfRangeError, ParseError } from '../src/errors'

// ============================================================================
// 1. INTEGER HELPERS
// ============================================================================

describe('Integer Helpers', () => {
  it('floorDiv rounds toward negative infinity', () => {
    expect(floorDiv(7, 2)).toBe(3)
    expect(floorDiv(-7, 2)).toBe(-4)
  })

  it('floorMod is never negative for a positive divisor', () => {
    expect(floorMod(-1, 7)).toBe(6)
    expect(floorMod(14, 7)).toBe(0)
  })
})

// ============================================================================
// 2. GREGORIAN
// ============================================================================

describe('Gregorian', () => {
  it('maps the epoch to day 0', () => {
    expect(gregorianToEpochDay(1970, 1, 1)).toBe(0)
    expect(epochDayToGregorian(0)).toEqual({ year: 1970, month: 1, day: 1 })
  })

  it('converts dates on both sides of the epoch', () => {
    expect(gregorianToEpochDay(2000, 1, 1)).toBe(10957)
    expect(gregorianToEpochDay(2024, 2, 29)).toBe(19782)
    expect(epochDayToGregorian(-1)).toEqual({ year: 1969, month: 12, day: 31 })
    expect(gregorianToEpochDay(0, 12, 31)).toBe(-719163)
  })

  it('applies the century rule', () => {
    expect(isGregorianLeapYear(2000)).toBe(true)
    expect(isGregorianLeapYear(1900)).toBe(false)
    expect(isGregorianLeapYear(2024)).toBe(true)
    expect(gregorianLengthOfMonth(1900, 2)).toBe(28)
    expect(gregorianLengthOfMonth(2000, 2)).toBe(29)
  })

  it('counts the day of year', () => {
    expect(gregorianDayOfYear(gregorianToEpochDay(2024, 12, 31))).toBe(366)
    expect(gregorianDayOfYear(gregorianToEpochDay(2023, 3, 1))).toBe(60)
  })

  it('spans years -999999 to 999999', () => {
    expect(MIN_EPOCH_DAY).toBe(-365961662)
    expect(MAX_EPOCH_DAY).toBe(364522971)
    expect(epochDayToGregorian(MAX_EPOCH_DAY)).toEqual({ year: 999999, month: 12, day: 31 })
  })
})

// ============================================================================
// 3. JULIAN
// ============================================================================

describe('Julian', () => {
  it('runs thirteen days behind in the twentieth century', () => {
    expect(epochDayToJulian(0)).toEqual({ year: 1969, month: 12, day: 19 })
  })

  it('ends on 1582-10-04, the day before Gregorian 1582-10-15', () => {
    expect(julianToEpochDay(1582, 10, 4)).toBe(-141428)
    expect(gregorianToEpochDay(1582, 10, 15)).toBe(-141427)
  })

  it('treats every fourth year as leap, including year 0', () => {
    expect(isJulianLeapYear(1900)).toBe(true)
    expect(isJulianLeapYear(0)).toBe(true)
    expect(isJulianLeapYear(-1)).toBe(false)
    expect(julianLengthOfMonth(1700, 2)).toBe(29)
  })

  it('begins AD 1 two days before the Gregorian calendar does', () => {
    expect(julianToEpochDay(1, 1, 1)).toBe(-719164)
    expect(gregorianToEpochDay(1, 1, 1)).toBe(-719162)
  })
})

// ============================================================================
// 4. WEEKDAYS & RANGES
// ============================================================================

describe('Weekdays', () => {
  it('1970-01-01 was a Thursday', () => {
    expect(isoDayOfWeek(0)).toBe(4)
    expect(isoDayOfWeek(-1)).toBe(3)
    expect(isoDayOfWeek(gregorianToEpochDay(2024, 2, 29))).toBe(4)
  })

  it('rejects weekday numbers outside 1..7', () => {
    expect(toIsoWeekday(7)).toBe(7)
    expect(() => toIsoWeekday(0)).toThrow(OutOfRangeError)
  })
})

describe('checkEpochDay', () => {
  it('accepts the bounds and rejects values beyond them', () => {
    expect(() => checkEpochDay(10, 0, 10, 'test')).not.toThrow()
    expect(() => checkEpochDay(11, 0, 10, 'test')).toThrow(OutOfRangeError)
    expect(() => checkEpochDay(1.5, 0, 10, 'test')).toThrow(OutOfRangeError)
  })
})

// ============================================================================
// 5. ISO PARSING & FORMATTING
// ============================================================================

describe('ISO dates', () => {
  it('parses a valid date', () => {
    const result = parseIsoDate('2024-02-29')
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value).toBe(19782)
  })

  it('rejects a day beyond the month', () => {
    const result = parseIsoDate('2023-02-29')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toBeInstanceOf(ParseError)
  })

  it('rejects malformed text', () => {
    expect(parseIsoDate('2024-2-29').ok).toBe(false)
    expect(parseIsoDate('12024-01-01').ok).toBe(false)
  })

  it('signs years outside 0000..9999', () => {
    expect(formatIsoDate(gregorianToEpochDay(-1, 1, 1))).toBe('-0001-01-01')
    expect(formatIsoDate(gregorianToEpochDay(10000, 1, 1))).toBe('+10000-01-01')
    expect(isoDate('+10000-01-01')).toBe(gregorianToEpochDay(10000, 1, 1))
  })

  it('formats and parses back', () => {
    expect(formatIsoDate(19782)).toBe('2024-02-29')
    expect(isoDate('0284-08-29')).toBe(julianToEpochDay(284, 8, 29))
  })

  it('isoDate throws the parse error', () => {
    expect(() => isoDate('not a date')).toThrow(ParseError)
  })
})
