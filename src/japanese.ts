/**
 * Japanese Calendar
 *
 * Lunisolar until the end of Meiji 5 (1872-12-31), Gregorian from 1873-01-01.
 * The lunisolar months come from a month table (`data/japanese.data`); years are named
 * by nengo, and the first year of a nengo is the lunisolar year in which it began.
 */

import type { CalendarSystem, EastAsianMonth, JapaneseDate } from './calendar-system'
import { eastAsianMonth } from './calendar-system'
import type { EpochDay } from './epoch-day'
import {
  MAX_EPOCH_DAY, MAX_GREGORIAN_YEAR, checkEpochDay, epochDayToGregorian, gregorianLengthOfMonth,
  gregorianToEpochDay, isGregorianLeapYear, isoDate,
} from './epoch-day'
import type { Result } from './result'
import { Ok, Err } from './result'
import type { CalendarError } from './errors'
import { InvalidDateError, OutOfRangeError } from './errors'
import type { Era, EraResolver, Leniency } from './era-resolver'
import { createEraResolver } from './era-resolver'
import type { MonthTable } from './month-table'
import { searchMonth, yearIndexOfMonth } from './month-table'
import type { CalendarAccess, FieldRule, IntFieldRule, StandardRules } from './field-rule'
import { createIntRule, createStandardRules } from './field-rule'

export const JAPANESE = 'japanese'

/** First day of the Gregorian calendar in Japan, Meiji 6-01-01 */
export const GREGORIAN_SINCE: EpochDay = gregorianToEpochDay(1873, 1, 1)
const FIRST_GREGORIAN_YEAR = 1873

// ============================================================================
// Nengo
// ============================================================================

export interface Nengo extends Era {
  /** romanized name */
  readonly name: string
}

// [id, name, Gregorian start, related year of year 1]
// Starts with the nengo in force on the first day of the lunisolar table (Tenpō 15);
// earlier years of Tenpō are out of range.
const NENGO_TABLE: readonly (readonly [string, string, string, number])[] = [
  ['tenpo', 'Tenpō', '1831-01-23', 1830],
  ['koka', 'Kōka', '1845-01-09', 1844],
  ['kaei', 'Kaei', '1848-04-01', 1848],
  ['ansei', 'Ansei', '1855-01-15', 1854],
  ['manen', "Man'en", '1860-04-08', 1860],
  ['bunkyu', 'Bunkyū', '1861-03-29', 1861],
  ['genji', 'Genji', '1864-03-27', 1864],
  ['keio', 'Keiō', '1865-05-01', 1865],
  ['meiji', 'Meiji', '1868-10-23', 1868],
  ['taisho', 'Taishō', '1912-07-30', 1912],
  ['showa', 'Shōwa', '1926-12-25', 1926],
  ['heisei', 'Heisei', '1989-01-08', 1989],
  ['reiwa', 'Reiwa', '2019-05-01', 2019],
]

export const NENGO: readonly Nengo[] = NENGO_TABLE.map(([id, name, start, firstYear]) => ({
  id,
  name,
  start: isoDate(start),
  firstYear,
}))

// ============================================================================
// System
// ============================================================================

export interface JapaneseSystem extends CalendarSystem<JapaneseDate> {
  readonly table: MonthTable
  readonly eras: EraResolver<Nengo>
  /** lunisolar or Gregorian year the date belongs to */
  relatedYear(date: Pick<JapaneseDate, 'nengo' | 'yearOfNengo'>): number
  /** number of the leap month of a related year, or 0 */
  getLeapMonth(relatedYear: number): number
  monthsInYear(relatedYear: number): number
  monthAsOrdinal(date: JapaneseDate): number
  monthOfOrdinal(relatedYear: number, ordinal: number): EastAsianMonth
  /** first day of a month of a related year; the month must exist */
  startOfMonthIn(relatedYear: number, month: EastAsianMonth): EpochDay
  lengthOfMonthIn(relatedYear: number, month: EastAsianMonth): number
}

interface Position {
  readonly year: number
  readonly ordinal: number
}

/**
 * Builds the calendar on a lunisolar table whose last year ends the day before 1873.
 */
export function createJapaneseCalendar(table: MonthTable): JapaneseSystem {
  if (table.maxEpochDay !== GREGORIAN_SINCE - 1 || table.maxYear !== FIRST_GREGORIAN_YEAR - 1) {
    throw new OutOfRangeError(`Japanese lunisolar table must end on 1872-12-31, not at epoch-day ${table.maxEpochDay}`)
  }

  const getLeapMonth = (year: number): number =>
    year >= FIRST_GREGORIAN_YEAR ? 0 : table.leapMonth[year - table.minYear] ?? 0

  const monthsInYear = (year: number): number => (getLeapMonth(year) === 0 ? 12 : 13)

  const ordinalOf = (year: number, month: EastAsianMonth): number => {
    const leap = getLeapMonth(year)
    return leap !== 0 && (month.number > leap || month.leap) ? month.number + 1 : month.number
  }

  const monthOf = (year: number, ordinal: number): EastAsianMonth => {
    const leap = getLeapMonth(year)
    if (leap === 0 || ordinal <= leap) return eastAsianMonth(ordinal)
    return ordinal === leap + 1 ? eastAsianMonth(leap, true) : eastAsianMonth(ordinal - 1)
  }

  const monthIndex = (position: Position): number =>
    (table.yearStart[position.year - table.minYear] ?? 0) + position.ordinal - 1

  const lengthAt = (position: Position): number =>
    position.year >= FIRST_GREGORIAN_YEAR
      ? gregorianLengthOfMonth(position.year, position.ordinal)
      : table.lengthOfMonth[monthIndex(position)] ?? 0

  const startOf = (position: Position): EpochDay =>
    position.year >= FIRST_GREGORIAN_YEAR
      ? gregorianToEpochDay(position.year, position.ordinal, 1)
      : table.firstOfMonth[monthIndex(position)] ?? 0

  const resolver = createEraResolver(NENGO, (epochDay) => positionOf(epochDay).year)

  function positionOf(epochDay: EpochDay): Position & { readonly day: number } {
    if (epochDay >= GREGORIAN_SINCE) {
      const g = epochDayToGregorian(epochDay)
      return { year: g.year, ordinal: g.month, day: g.day }
    }
    const index = searchMonth(table, epochDay)
    const yearIndex = yearIndexOfMonth(table, index)
    return {
      year: table.minYear + yearIndex,
      ordinal: index - (table.yearStart[yearIndex] ?? 0) + 1,
      day: epochDay - (table.firstOfMonth[index] ?? 0) + 1,
    }
  }

  const relatedYear = (date: Pick<JapaneseDate, 'nengo' | 'yearOfNengo'>): number => {
    const era = resolver.findById(date.nengo)
    if (era === null) throw new InvalidDateError(`Unknown nengo: '${date.nengo}'`)
    return era.firstYear + date.yearOfNengo - 1
  }

  const isValid = (date: JapaneseDate): boolean => {
    const era = resolver.findById(date.nengo)
    if (era === null || !Number.isInteger(date.yearOfNengo) || date.yearOfNengo < 1) return false
    const maxYear = resolver.maxYearOfEra(era)
    if (maxYear !== null && date.yearOfNengo > maxYear) return false
    const year = era.firstYear + date.yearOfNengo - 1
    if (year < table.minYear || year > MAX_GREGORIAN_YEAR) return false
    const { number, leap } = date.month
    if (!Number.isInteger(number) || number < 1 || number > 12) return false
    if (leap && getLeapMonth(year) !== number) return false
    const length = lengthAt({ year, ordinal: ordinalOf(year, date.month) })
    return Number.isInteger(date.day) && date.day >= 1 && date.day <= length
  }

  const describe = (date: JapaneseDate): string =>
    `${date.nengo} ${date.yearOfNengo}-${date.month.number}${date.month.leap ? 'L' : ''}-${date.day}`

  const system: JapaneseSystem = {
    family: 'japanese',
    variant: JAPANESE,
    table,
    eras: resolver,
    relatedYear,
    getLeapMonth,
    monthsInYear,
    monthAsOrdinal: (date) => ordinalOf(relatedYear(date), date.month),
    monthOfOrdinal: monthOf,
    startOfMonthIn: (year, month) => startOf({ year, ordinal: ordinalOf(year, month) }),
    lengthOfMonthIn: (year, month) => lengthAt({ year, ordinal: ordinalOf(year, month) }),

    toEpochDay(date) {
      if (!isValid(date)) throw new InvalidDateError(`Invalid Japanese date: ${describe(date)}`)
      const year = relatedYear(date)
      return startOf({ year, ordinal: ordinalOf(year, date.month) }) + date.day - 1
    },

    fromEpochDay(epochDay) {
      checkEpochDay(epochDay, table.minEpochDay, MAX_EPOCH_DAY, JAPANESE)
      const { year, ordinal, day } = positionOf(epochDay)
      const era = resolver.findByEpochDay(epochDay)
      if (era === null) throw new OutOfRangeError(`No nengo before ${epochDay}`)
      return {
        calendar: 'japanese',
        nengo: era.id,
        yearOfNengo: year - era.firstYear + 1,
        month: monthOf(year, ordinal),
        day,
      }
    },

    isValid,

    lengthOfMonth(date) {
      const year = relatedYear(date)
      return lengthAt({ year, ordinal: ordinalOf(year, date.month) })
    },

    lengthOfYear(date) {
      const year = relatedYear(date)
      if (year >= FIRST_GREGORIAN_YEAR) return isGregorianLeapYear(year) ? 366 : 365
      const next = year + 1 === FIRST_GREGORIAN_YEAR ? GREGORIAN_SINCE : startOf({ year: year + 1, ordinal: 1 })
      return next - startOf({ year, ordinal: 1 })
    },

    getMinimumEpochDay: () => table.minEpochDay,
    getMaximumEpochDay: () => MAX_EPOCH_DAY,
  }
  return system
}

// ============================================================================
// Construction
// ============================================================================

// the twelfth month of 1872 was cut off after 2 of its 30 days
const isCutShortDay = (date: JapaneseDate): boolean =>
  date.month.number === 12 && !date.month.leap && Number.isInteger(date.day) && date.day >= 3 && date.day <= 30

/**
 * Builds a date named by nengo. The leniency decides what happens when the nengo
 * had already ended on that day. Days 3 to 30 of the last lunisolar month roll over
 * into Meiji 6 unless strict.
 */
export function japaneseDate(
  system: JapaneseSystem,
  nengo: string,
  yearOfNengo: number,
  month: EastAsianMonth | number,
  day: number,
  leniency: Leniency = 'smart'
): Result<JapaneseDate, CalendarError> {
  const era = system.eras.findById(nengo)
  if (era === null) return Err(new InvalidDateError(`Unknown nengo: '${nengo}'`))

  const date: JapaneseDate = {
    calendar: 'japanese',
    nengo,
    yearOfNengo,
    month: typeof month === 'number' ? eastAsianMonth(month) : month,
    day,
  }
  const year = era.firstYear + yearOfNengo - 1
  if (year < system.table.minYear || year > MAX_GREGORIAN_YEAR) {
    return Err(new OutOfRangeError(`Japanese year out of range: ${nengo} ${yearOfNengo}`))
  }
  const maxYear = system.eras.maxYearOfEra(era)
  if (year === FIRST_GREGORIAN_YEAR - 1 && (maxYear === null || yearOfNengo <= maxYear) && isCutShortDay(date)) {
    if (leniency === 'strict') {
      return Err(new InvalidDateError(`Last lunisolar month had only 2 days: ${nengo} ${yearOfNengo}-12-${day}`))
    }
    return Ok(system.fromEpochDay(GREGORIAN_SINCE + day - 3))
  }
  if (!system.isValid(date)) {
    return Err(new InvalidDateError(`Invalid Japanese date: ${nengo} ${yearOfNengo}-${date.month.number}-${day}`))
  }

  const epochDay = system.toEpochDay(date)
  const resolved = system.eras.resolve(era, epochDay, leniency)
  if (!resolved.ok) return resolved
  return Ok(resolved.value.id === era.id ? date : system.fromEpochDay(epochDay))
}

// ============================================================================
// Field Rules
// ============================================================================

export interface JapaneseRules extends StandardRules<JapaneseDate> {
  readonly yearOfNengo: IntFieldRule<JapaneseDate>
  readonly monthOfYear: FieldRule<JapaneseDate, EastAsianMonth>
}

/**
 * Field rules over the related year. Every setter returns the date under its
 * proper nengo.
 */
export function createJapaneseRules(system: JapaneseSystem): JapaneseRules {
  const canonical = (year: number, month: EastAsianMonth, day: number): JapaneseDate => {
    if (year < system.table.minYear || year > MAX_GREGORIAN_YEAR) {
      throw new OutOfRangeError(`Japanese year out of range: ${year}`)
    }
    const kept = month.leap && system.getLeapMonth(year) !== month.number ? eastAsianMonth(month.number) : month
    const length = system.lengthOfMonthIn(year, kept)
    return system.fromEpochDay(system.startOfMonthIn(year, kept) + Math.min(day, length) - 1)
  }

  const access: CalendarAccess<JapaneseDate> = {
    system,
    minYear: system.table.minYear,
    maxYear: MAX_GREGORIAN_YEAR,
    yearOf: (date) => system.relatedYear(date),
    withYear: (date, year) => canonical(year, date.month, date.day),
    monthOf: (date) => system.monthAsOrdinal(date),
    monthsInYear: (date) => system.monthsInYear(system.relatedYear(date)),
    withMonth: (date, ordinal) => {
      const year = system.relatedYear(date)
      return canonical(year, system.monthOfOrdinal(year, ordinal), date.day)
    },
    dayOf: (date) => date.day,
    // a nengo may begin mid-month, so valid days are re-read under their own era
    withDay: (date, day) => {
      const inMonth = Number.isInteger(day) && day >= 1 && day <= system.lengthOfMonth(date)
      return inMonth ? canonical(system.relatedYear(date), date.month, day) : { ...date, day }
    },
  }

  const standard = createStandardRules(access)

  const yearOfNengo = createIntRule<JapaneseDate>({
    name: 'YEAR_OF_NENGO',
    get: (date) => date.yearOfNengo,
    min: (date) => {
      const era = system.eras.findById(date.nengo)
      return era === null ? 1 : Math.max(1, system.table.minYear - era.firstYear + 1)
    },
    max: (date) => {
      const era = system.eras.findById(date.nengo)
      if (era === null) return 1
      return system.eras.maxYearOfEra(era) ?? MAX_GREGORIAN_YEAR - era.firstYear + 1
    },
    set: (date, value) => canonical(system.relatedYear({ ...date, yearOfNengo: value }), date.month, date.day),
    childAtFloor: () => standard.month,
    childAtCeiling: () => standard.month,
  })

  const monthOfYear: FieldRule<JapaneseDate, EastAsianMonth> = {
    name: 'MONTH_OF_YEAR',
    get: (date) => date.month,
    getMin: () => eastAsianMonth(1),
    getMax: (date) => eastAsianMonth(12, system.getLeapMonth(system.relatedYear(date)) === 12),
    isValid: (date, month) =>
      Number.isInteger(month.number) && month.number >= 1 && month.number <= 12 &&
      (!month.leap || system.getLeapMonth(system.relatedYear(date)) === month.number),
    withValue: (date, month) => {
      if (!monthOfYear.isValid(date, month)) {
        return Err(new InvalidDateError(`Invalid month for ${date.nengo} ${date.yearOfNengo}: ${month.number}${month.leap ? 'L' : ''}`))
      }
      return Ok(canonical(system.relatedYear(date), month, date.day))
    },
    childAtFloor: () => standard.dayOfMonth,
    childAtCeiling: () => standard.dayOfMonth,
  }

  return { ...standard, yearOfNengo, monthOfYear }
}
