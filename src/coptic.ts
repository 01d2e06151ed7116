/**
 * Coptic Calendar
 *
 * Twelve months of 30 days plus a thirteenth month of 5 days (6 in leap years).
 * Years are counted from the era of the martyrs, beginning on Julian AD 284-08-29.
 * Every year whose remainder modulo 4 is 3 is a leap year.
 */

import type { CalendarSystem, CopticDate } from './calendar-system'
import type { EpochDay } from './epoch-day'
import { floorDiv, julianToEpochDay, checkEpochDay } from './epoch-day'
import type { Result } from './result'
import { Ok, Err } from './result'
import { InvalidDateError } from './errors'
import type { CalendarAccess, StandardRules } from './field-rule'
import { createStandardRules } from './field-rule'

// ============================================================================
// Constants
// ============================================================================

/** Epoch-day of Coptic 1-01-01 */
export const DIOCLETIAN_EPOCH: EpochDay = julianToEpochDay(284, 8, 29)

export const COPTIC_MIN_YEAR = 1
export const COPTIC_MAX_YEAR = 9999

// ============================================================================
// Arithmetic
// ============================================================================

export function isCopticLeapYear(year: number): boolean {
  return year % 4 === 3
}

export function copticLengthOfMonth(year: number, month: number): number {
  if (month < 13) return 30
  return isCopticLeapYear(year) ? 6 : 5
}

export function copticLengthOfYear(year: number): number {
  return isCopticLeapYear(year) ? 366 : 365
}

function toEpoch(year: number, month: number, day: number): EpochDay {
  return DIOCLETIAN_EPOCH - 1 + 365 * (year - 1) + floorDiv(year, 4) + 30 * (month - 1) + day
}

function isValidFields(year: number, month: number, day: number): boolean {
  return (
    Number.isInteger(year) && Number.isInteger(month) && Number.isInteger(day) &&
    year >= COPTIC_MIN_YEAR && year <= COPTIC_MAX_YEAR &&
    month >= 1 && month <= 13 &&
    day >= 1 && day <= copticLengthOfMonth(year, month)
  )
}

const MIN_EPOCH_DAY = toEpoch(COPTIC_MIN_YEAR, 1, 1)
const MAX_EPOCH_DAY = toEpoch(COPTIC_MAX_YEAR, 13, copticLengthOfMonth(COPTIC_MAX_YEAR, 13))

// ============================================================================
// System
// ============================================================================

export const COPTIC: CalendarSystem<CopticDate> = {
  family: 'coptic',
  variant: 'coptic',

  toEpochDay(date) {
    if (!isValidFields(date.year, date.month, date.day)) {
      throw new InvalidDateError(`Invalid Coptic date: ${date.year}-${date.month}-${date.day}`)
    }
    return toEpoch(date.year, date.month, date.day)
  },

  fromEpochDay(epochDay) {
    checkEpochDay(epochDay, MIN_EPOCH_DAY, MAX_EPOCH_DAY, 'coptic')
    const year = floorDiv(4 * (epochDay - DIOCLETIAN_EPOCH) + 1463, 1461)
    const month = 1 + floorDiv(epochDay - toEpoch(year, 1, 1), 30)
    const day = 1 + epochDay - toEpoch(year, month, 1)
    return { calendar: 'coptic', year, month, day }
  },

  isValid: (date) => isValidFields(date.year, date.month, date.day),
  lengthOfMonth: (date) => copticLengthOfMonth(date.year, date.month),
  lengthOfYear: (date) => copticLengthOfYear(date.year),
  getMinimumEpochDay: () => MIN_EPOCH_DAY,
  getMaximumEpochDay: () => MAX_EPOCH_DAY,
}

// ============================================================================
// Construction
// ============================================================================

export function copticDate(year: number, month: number, day: number): Result<CopticDate, InvalidDateError> {
  if (!isValidFields(year, month, day)) {
    return Err(new InvalidDateError(`Invalid Coptic date: ${year}-${month}-${day}`))
  }
  return Ok({ calendar: 'coptic', year, month, day })
}

// ============================================================================
// Field Rules
// ============================================================================

const access: CalendarAccess<CopticDate> = {
  system: COPTIC,
  minYear: COPTIC_MIN_YEAR,
  maxYear: COPTIC_MAX_YEAR,
  yearOf: (date) => date.year,
  withYear: (date, year) => ({ ...date, year, day: Math.min(date.day, copticLengthOfMonth(year, date.month)) }),
  monthOf: (date) => date.month,
  monthsInYear: () => 13,
  withMonth: (date, month) => ({ ...date, month, day: Math.min(date.day, copticLengthOfMonth(date.year, month)) }),
  dayOf: (date) => date.day,
  withDay: (date, day) => ({ ...date, day }),
}

export const COPTIC_RULES: StandardRules<CopticDate> = createStandardRules(access)
