/**
 * Tabular Hijri Calendars
 *
 * Thirty-year cycles of 10631 days. Months alternate between 30 and 29 days; month 12
 * gains a day in the eleven leap years of each cycle. The eight variants differ in the
 * leap-year pattern and in the epoch: the astronomical epoch is Julian 622-07-15 (a
 * Thursday), the civil epoch the day after.
 */

import type { HijriDate } from './calendar-system'
import type { EpochDay } from './epoch-day'
import { floorDiv, julianToEpochDay, checkEpochDay } from './epoch-day'
import { InvalidDateError, UnsupportedVariantError } from './errors'
import type { HijriSystem } from './hijri'
import { parseHijriVariant, formatHijriVariant, isValidHijriFields } from './hijri'

// ============================================================================
// Constants
// ============================================================================

const CYCLE_YEARS = 30
const CYCLE_DAYS = 30 * 354 + 11

export const START_622_07_15: EpochDay = julianToEpochDay(622, 7, 15)
export const START_622_07_16: EpochDay = START_622_07_15 + 1

export const HIJRI_ALGO_MIN_YEAR = 1
export const HIJRI_ALGO_MAX_YEAR = 1600

const EAST = [2, 5, 7, 10, 13, 15, 18, 21, 24, 26, 29]
const CIVIL = [2, 5, 7, 10, 13, 16, 18, 21, 24, 26, 29]
const FATIMID = [2, 5, 8, 10, 13, 16, 19, 21, 24, 27, 29]
const HABASH_AL_HASIB = [2, 5, 8, 11, 13, 16, 19, 21, 24, 27, 30]

interface AlgorithmSpec {
  readonly leapYears: readonly number[]
  readonly civil: boolean
}

const ALGORITHMS: Readonly<Record<string, AlgorithmSpec>> = {
  'islamic-eastc': { leapYears: EAST, civil: true },
  'islamic-easta': { leapYears: EAST, civil: false },
  'islamic-civil': { leapYears: CIVIL, civil: true },
  'islamic-tbla': { leapYears: CIVIL, civil: false },
  'islamic-fatimidc': { leapYears: FATIMID, civil: true },
  'islamic-fatimida': { leapYears: FATIMID, civil: false },
  'islamic-habashalhasibc': { leapYears: HABASH_AL_HASIB, civil: true },
  'islamic-habashalhasiba': { leapYears: HABASH_AL_HASIB, civil: false },
}

export const HIJRI_ALGORITHM_VARIANTS: readonly string[] = Object.keys(ALGORITHMS)

export function isHijriAlgorithmVariant(base: string): boolean {
  return Object.hasOwn(ALGORITHMS, base)
}

// ============================================================================
// Leap Pattern
// ============================================================================

function binarySearch(sorted: readonly number[], key: number): boolean {
  let low = 0
  let high = sorted.length - 1
  while (low <= high) {
    const mid = (low + high) >>> 1
    const value = sorted[mid] ?? 0
    if (value < key) low = mid + 1
    else if (value > key) high = mid - 1
    else return true
  }
  return false
}

// ============================================================================
// System
// ============================================================================

export interface HijriAlgorithmSystem extends HijriSystem {
  readonly baseVariant: string
  readonly adjustment: number
  isLeapYear(year: number): boolean
}

/**
 * Creates the system for `islamic-civil`, `islamic-tbla:-1` and so on.
 * Throws UnsupportedVariantError for unknown bases and OutOfRangeError for adjustments beyond ±3.
 */
export function createHijriAlgorithm(variant: string): HijriAlgorithmSystem {
  const { base, adjustment } = parseHijriVariant(variant)
  const spec = ALGORITHMS[base]
  if (!spec) throw new UnsupportedVariantError(variant)

  const canonical = formatHijriVariant(base, adjustment)
  const epoch = spec.civil ? START_622_07_16 : START_622_07_15

  const isLeapYear = (year: number): boolean =>
    binarySearch(spec.leapYears, ((year - 1) % CYCLE_YEARS) + 1)

  const lengthOfYearIn = (year: number): number => (isLeapYear(year) ? 355 : 354)

  const lengthOfMonthIn = (year: number, month: number): number => {
    if (month === 12 && isLeapYear(year)) return 30
    return month % 2 === 1 ? 30 : 29
  }

  // days from the epoch to the first day of the year, unadjusted
  const daysBeforeYear = (year: number): number => {
    const cycles = floorDiv(year - 1, CYCLE_YEARS)
    let days = cycles * CYCLE_DAYS
    for (let y = cycles * CYCLE_YEARS + 1; y < year; y++) days += lengthOfYearIn(y)
    return days
  }

  const daysBeforeMonth = (year: number, month: number): number => {
    let days = 0
    for (let m = 1; m < month; m++) days += lengthOfMonthIn(year, m)
    return days
  }

  const realMax = epoch + daysBeforeYear(HIJRI_ALGO_MAX_YEAR) + lengthOfYearIn(HIJRI_ALGO_MAX_YEAR) - 1
  const minEpochDay = epoch - adjustment
  const maxEpochDay = realMax - adjustment

  const system: HijriAlgorithmSystem = {
    family: 'hijri',
    variant: canonical,
    baseVariant: base,
    adjustment,
    minYear: HIJRI_ALGO_MIN_YEAR,
    maxYear: HIJRI_ALGO_MAX_YEAR,
    isLeapYear,
    lengthOfMonthIn,
    lengthOfYearIn,

    toEpochDay(date) {
      if (!isValidHijriFields(system, date)) {
        throw new InvalidDateError(`Invalid Hijri date (${canonical}): ${date.year}-${date.month}-${date.day}`)
      }
      return epoch + daysBeforeYear(date.year) + daysBeforeMonth(date.year, date.month) + date.day - 1 - adjustment
    },

    fromEpochDay(epochDay): HijriDate {
      checkEpochDay(epochDay, minEpochDay, maxEpochDay, canonical)
      const days = epochDay + adjustment - epoch
      const cycles = floorDiv(days, CYCLE_DAYS)
      let year = cycles * CYCLE_YEARS + 1
      let remaining = days - cycles * CYCLE_DAYS

      for (let i = 0; i < CYCLE_YEARS - 1 && remaining >= lengthOfYearIn(year); i++) {
        remaining -= lengthOfYearIn(year)
        year++
      }

      let month = 1
      for (; month < 12 && remaining >= lengthOfMonthIn(year, month); month++) {
        remaining -= lengthOfMonthIn(year, month)
      }

      return { calendar: 'hijri', variant: canonical, year, month, day: remaining + 1 }
    },

    isValid: (date) => isValidHijriFields(system, date),
    lengthOfMonth: (date) => lengthOfMonthIn(date.year, date.month),
    lengthOfYear: (date) => lengthOfYearIn(date.year),
    getMinimumEpochDay: () => minEpochDay,
    getMaximumEpochDay: () => maxEpochDay,
  }
  return system
}
