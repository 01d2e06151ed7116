/**
 * Indian National Calendar (Saka era)
 *
 * The Saka year begins on Gregorian March 22, or March 21 when the Gregorian year
 * `saka + 78` is a leap year. Chaitra (month 1) then has 31 days instead of 30.
 */

import type { CalendarSystem, IndianDate } from './calendar-system'
import type { EpochDay } from './epoch-day'
import {
  isGregorianLeapYear, gregorianToEpochDay, epochDayToGregorian, checkEpochDay, MAX_GREGORIAN_YEAR,
} from './epoch-day'
import type { Result } from './result'
import { Ok, Err } from './result'
import { InvalidDateError } from './errors'
import type { CalendarAccess, StandardRules } from './field-rule'
import { createStandardRules } from './field-rule'

// ============================================================================
// Constants
// ============================================================================

const SAKA_OFFSET = 78

export const INDIAN_MIN_YEAR = 1
/** Last Saka year that starts inside the supported Gregorian range; it ends after Pausa 10. */
export const INDIAN_MAX_YEAR = MAX_GREGORIAN_YEAR - SAKA_OFFSET

// ============================================================================
// Arithmetic
// ============================================================================

export function isIndianLeapYear(year: number): boolean {
  return isGregorianLeapYear(year + SAKA_OFFSET)
}

export function indianMonthsInYear(year: number): number {
  return year === INDIAN_MAX_YEAR ? 10 : 12
}

export function indianLengthOfMonth(year: number, month: number): number {
  if (year === INDIAN_MAX_YEAR && month === 10) return 10
  if (month === 1) return isIndianLeapYear(year) ? 31 : 30
  if (month <= 6) return 31
  return 30
}

export function indianLengthOfYear(year: number): number {
  if (year === INDIAN_MAX_YEAR) return 285
  return isIndianLeapYear(year) ? 366 : 365
}

function startOfYear(year: number): EpochDay {
  const gregorianYear = year + SAKA_OFFSET
  return gregorianToEpochDay(gregorianYear, 3, isGregorianLeapYear(gregorianYear) ? 21 : 22)
}

function toEpoch(year: number, month: number, day: number): EpochDay {
  let days = startOfYear(year)
  for (let m = 1; m < month; m++) days += indianLengthOfMonth(year, m)
  return days + day - 1
}

function isValidFields(year: number, month: number, day: number): boolean {
  return (
    Number.isInteger(year) && Number.isInteger(month) && Number.isInteger(day) &&
    year >= INDIAN_MIN_YEAR && year <= INDIAN_MAX_YEAR &&
    month >= 1 && month <= indianMonthsInYear(year) &&
    day >= 1 && day <= indianLengthOfMonth(year, month)
  )
}

const MIN_EPOCH_DAY = startOfYear(INDIAN_MIN_YEAR)
const MAX_EPOCH_DAY = toEpoch(INDIAN_MAX_YEAR, 10, 10)

// ============================================================================
// System
// ============================================================================

export const INDIAN: CalendarSystem<IndianDate> = {
  family: 'indian',
  variant: 'indian',

  toEpochDay(date) {
    if (!isValidFields(date.year, date.month, date.day)) {
      throw new InvalidDateError(`Invalid Indian date: ${date.year}-${date.month}-${date.day}`)
    }
    return toEpoch(date.year, date.month, date.day)
  },

  fromEpochDay(epochDay) {
    checkEpochDay(epochDay, MIN_EPOCH_DAY, MAX_EPOCH_DAY, 'indian')
    const gregorianYear = epochDayToGregorian(epochDay).year
    let year = gregorianYear - SAKA_OFFSET
    if (epochDay < startOfYear(year)) year--

    let remaining = epochDay - startOfYear(year)
    let month = 1
    while (remaining >= indianLengthOfMonth(year, month)) {
      remaining -= indianLengthOfMonth(year, month)
      month++
    }
    return { calendar: 'indian', year, month, day: remaining + 1 }
  },

  isValid: (date) => isValidFields(date.year, date.month, date.day),
  lengthOfMonth: (date) => indianLengthOfMonth(date.year, date.month),
  lengthOfYear: (date) => indianLengthOfYear(date.year),
  getMinimumEpochDay: () => MIN_EPOCH_DAY,
  getMaximumEpochDay: () => MAX_EPOCH_DAY,
}

// ============================================================================
// Construction
// ============================================================================

export function indianDate(year: number, month: number, day: number): Result<IndianDate, InvalidDateError> {
  if (!isValidFields(year, month, day)) {
    return Err(new InvalidDateError(`Invalid Indian date: ${year}-${month}-${day}`))
  }
  return Ok({ calendar: 'indian', year, month, day })
}

// ============================================================================
// Field Rules
// ============================================================================

function clampTo(year: number, month: number, day: number): IndianDate {
  const m = Math.min(month, indianMonthsInYear(year))
  return { calendar: 'indian', year, month: m, day: Math.min(day, indianLengthOfMonth(year, m)) }
}

const access: CalendarAccess<IndianDate> = {
  system: INDIAN,
  minYear: INDIAN_MIN_YEAR,
  maxYear: INDIAN_MAX_YEAR,
  yearOf: (date) => date.year,
  withYear: (date, year) => clampTo(year, date.month, date.day),
  monthOf: (date) => date.month,
  monthsInYear: (date) => indianMonthsInYear(date.year),
  withMonth: (date, month) => clampTo(date.year, month, date.day),
  dayOf: (date) => date.day,
  withDay: (date, day) => ({ ...date, day }),
}

export const INDIAN_RULES: StandardRules<IndianDate> = createStandardRules(access)
