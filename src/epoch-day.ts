/**
 * Epoch-Day Arithmetic
 *
 * The epoch-day is the signed count of days since 1970-01-01 (proleptic Gregorian) and the
 * only value every calendar system converts to and from. Gregorian and Julian conversions
 * run over the Julian Day Number, which keeps month-length edge cases out of the arithmetic.
 */

import type { Result } from './result'
import { Ok, Err } from './result'
import { ParseError, OutOfRangeError } from './errors'

// ============================================================================
// Types
// ============================================================================

/** Days since 1970-01-01, always an integer. */
export type EpochDay = number

/** ISO weekday number, Monday = 1 .. Sunday = 7 */
export type IsoWeekday = 1 | 2 | 3 | 4 | 5 | 6 | 7

export interface YearMonthDay {
  readonly year: number
  readonly month: number
  readonly day: number
}

// ============================================================================
// Constants
// ============================================================================

/** Julian Day Number of 1970-01-01 */
export const JDN_OF_EPOCH = 2440588

export const MIN_GREGORIAN_YEAR = -999_999
export const MAX_GREGORIAN_YEAR = 999_999

// ============================================================================
// Integer Helpers
// ============================================================================

export function floorDiv(a: number, b: number): number {
  return Math.floor(a / b)
}

export function floorMod(a: number, b: number): number {
  return a - b * Math.floor(a / b)
}

// ============================================================================
// Gregorian
// ============================================================================

export function isGregorianLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function gregorianLengthOfMonth(year: number, month: number): number {
  if (month === 2 && isGregorianLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

export function gregorianToEpochDay(year: number, month: number, day: number): EpochDay {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  const jdn =
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  return jdn - JDN_OF_EPOCH
}

export function epochDayToGregorian(epochDay: EpochDay): YearMonthDay {
  const a = epochDay + JDN_OF_EPOCH + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor((146097 * b) / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor((1461 * d) / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

export function gregorianDayOfYear(epochDay: EpochDay): number {
  const { year } = epochDayToGregorian(epochDay)
  return epochDay - gregorianToEpochDay(year, 1, 1) + 1
}

export const MIN_EPOCH_DAY: EpochDay = gregorianToEpochDay(MIN_GREGORIAN_YEAR, 1, 1)
export const MAX_EPOCH_DAY: EpochDay = gregorianToEpochDay(MAX_GREGORIAN_YEAR, 12, 31)

// ============================================================================
// Julian
// ============================================================================

/** Proleptic Julian rule, year 0 = 1 BC. */
export function isJulianLeapYear(year: number): boolean {
  return floorMod(year, 4) === 0
}

export function julianLengthOfMonth(year: number, month: number): number {
  if (month === 2 && isJulianLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

export function julianToEpochDay(year: number, month: number, day: number): EpochDay {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  const jdn = day + Math.floor((153 * m + 2) / 5) + 365 * y + Math.floor(y / 4) - 32083
  return jdn - JDN_OF_EPOCH
}

export function epochDayToJulian(epochDay: EpochDay): YearMonthDay {
  const c = epochDay + JDN_OF_EPOCH + 32082
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor((1461 * d) / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Weekday
// ============================================================================

/** 1970-01-01 was a Thursday. */
export function isoDayOfWeek(epochDay: EpochDay): IsoWeekday {
  return toIsoWeekday(floorMod(epochDay + 3, 7) + 1)
}

export function toIsoWeekday(value: number): IsoWeekday {
  switch (value) {
    case 1: return 1
    case 2: return 2
    case 3: return 3
    case 4: return 4
    case 5: return 5
    case 6: return 6
    case 7: return 7
    default: throw new OutOfRangeError(`Weekday out of range: ${value}`)
  }
}

// ============================================================================
// Range Checks
// ============================================================================

export function checkEpochDay(epochDay: EpochDay, min: EpochDay, max: EpochDay, calendar: string): void {
  if (!Number.isInteger(epochDay)) {
    throw new OutOfRangeError(`Epoch-day must be an integer: ${epochDay}`)
  }
  if (epochDay < min || epochDay > max) {
    throw new OutOfRangeError(`Epoch-day ${epochDay} out of range for ${calendar} [${min}, ${max}]`)
  }
}

// ============================================================================
// ISO Parsing & Formatting
// ============================================================================

/**
 * Parses an ISO-8601 calendar date. Years outside 0000..9999 carry an explicit sign.
 */
export function parseIsoDate(str: string): Result<EpochDay, ParseError> {
  const match = /^([+-]\d{4,6}|\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (year < MIN_GREGORIAN_YEAR || year > MAX_GREGORIAN_YEAR)
    return Err(new ParseError(`Year out of range in date: '${str}'`))
  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > gregorianLengthOfMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(gregorianToEpochDay(year, month, day))
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function padYear(year: number): string {
  if (year >= 0 && year <= 9999) return String(year).padStart(4, '0')
  const sign = year < 0 ? '-' : '+'
  return sign + String(Math.abs(year)).padStart(4, '0')
}

export function formatIsoDate(epochDay: EpochDay): string {
  const { year, month, day } = epochDayToGregorian(epochDay)
  return `${padYear(year)}-${pad2(month)}-${pad2(day)}`
}

/** Shorthand for tests and data tables: epoch-day of an ISO date that is known to be valid. */
export function isoDate(str: string): EpochDay {
  const result = parseIsoDate(str)
  if (!result.ok) throw result.error
  return result.value
}
