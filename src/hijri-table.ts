/**
 * Astronomical Hijri Calendars
 *
 * Month lengths come from a MonthTable (sighting or astronomical data such as
 * Umm al-Qura) instead of a rule. Conversions binary-search the month starts.
 */

import type { HijriDate } from './calendar-system'
import { InvalidDateError, OutOfRangeError } from './errors'
import type { HijriSystem } from './hijri'
import { isValidHijriFields } from './hijri'
import type { MonthTable } from './month-table'
import { searchMonth, yearLength } from './month-table'

export const UMALQURA = 'islamic-umalqura'

export interface HijriTableSystem extends HijriSystem {
  readonly table: MonthTable
}

/**
 * Wraps a parsed table. The table type is the variant name.
 */
export function createHijriTable(table: MonthTable): HijriTableSystem {
  const variant = table.type

  const checkYear = (year: number): void => {
    if (year < table.minYear || year > table.maxYear) {
      throw new OutOfRangeError(`Hijri year out of range for ${variant}: ${year} not in [${table.minYear}, ${table.maxYear}]`)
    }
  }

  const lengthOfMonthIn = (year: number, month: number): number => {
    checkYear(year)
    if (month < 1 || month > 12) throw new InvalidDateError(`Invalid Hijri month: ${month}`)
    return table.lengthOfMonth[(year - table.minYear) * 12 + month - 1] ?? 0
  }

  const lengthOfYearIn = (year: number): number => {
    checkYear(year)
    return yearLength(table, year)
  }

  const system: HijriTableSystem = {
    family: 'hijri',
    variant,
    table,
    minYear: table.minYear,
    maxYear: table.maxYear,
    lengthOfMonthIn,
    lengthOfYearIn,

    toEpochDay(date) {
      checkYear(date.year)
      if (!isValidHijriFields(system, date)) {
        throw new InvalidDateError(`Invalid Hijri date (${variant}): ${date.year}-${date.month}-${date.day}`)
      }
      const index = (date.year - table.minYear) * 12 + date.month - 1
      return (table.firstOfMonth[index] ?? 0) + date.day - 1
    },

    fromEpochDay(epochDay): HijriDate {
      const index = searchMonth(table, epochDay)
      const last = table.firstOfMonth.length - 1
      if (
        !Number.isInteger(epochDay) || index < 0 ||
        (index === last && epochDay > table.maxEpochDay)
      ) {
        throw new OutOfRangeError(`Epoch-day ${epochDay} out of range for ${variant}`)
      }
      const year = Math.floor(index / 12) + table.minYear
      const month = (index % 12) + 1
      const day = epochDay - (table.firstOfMonth[index] ?? 0) + 1
      return { calendar: 'hijri', variant, year, month, day }
    },

    isValid: (date) => isValidHijriFields(system, date),
    lengthOfMonth: (date) => lengthOfMonthIn(date.year, date.month),
    lengthOfYear: (date) => lengthOfYearIn(date.year),
    getMinimumEpochDay: () => table.minEpochDay,
    getMaximumEpochDay: () => table.maxEpochDay,
  }
  return system
}
