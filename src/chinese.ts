/**
 * Chinese Calendar
 *
 * Sexagesimal lunisolar calendar. Years are counted in cycles of sixty, starting near
 * Gregorian −2636-02-15. Year and month boundaries come from the lunisolar engine;
 * which month of a thirteen-month year is the leap month comes from the published
 * table in `data/chinese-leap-months.json`.
 *
 * Supported from 1645-01-28 (cycle 72, year 22) until 3000-01-27 (cycle 94, year 56).
 */

import type { CalendarSystem, ChineseDate, EastAsianMonth } from './calendar-system'
import { eastAsianMonth, compareEastAsianMonths } from './calendar-system'
import type { EpochDay } from './epoch-day'
import { gregorianToEpochDay, checkEpochDay } from './epoch-day'
import type { Result } from './result'
import { Ok, Err } from './result'
import { CalendarError, InvalidDateError, OutOfRangeError, ResourceFormatError } from './errors'
import { MEAN_SYNODIC_MONTH, MEAN_TROPICAL_YEAR } from './astronomy'
import { createLunisolarEngine, localMeanTimeOffset, lunations } from './east-asian'
import type { CalendarAccess, FieldRule, IntFieldRule, StandardRules } from './field-rule'
import { createIntRule, createStandardRules } from './field-rule'
import leapMonthData from './data/chinese-leap-months.json'

// ============================================================================
// Constants
// ============================================================================

/** Epoch-day of the start of the Yellow Emperor's reign (cycle 1, year 1) */
export const CHINESE_EPOCH: EpochDay = gregorianToEpochDay(-2636, 2, 15)

/** Elapsed years between the epoch and the related Gregorian year */
const GREGORIAN_OFFSET = 2636

const FIRST_ELAPSED = 4281 // cycle 72, year 22
const LAST_ELAPSED = 5635 // cycle 94, year 56

const MIN_EPOCH_DAY = gregorianToEpochDay(1645, 1, 28)
const MAX_EPOCH_DAY = gregorianToEpochDay(3000, 1, 27)

const STANDARD_TIME_SINCE = gregorianToEpochDay(1929, 1, 1)
const BEIJING_MEAN_TIME = localMeanTimeOffset(116, 25)
const CHINA_STANDARD_TIME = 8 * 3600

// announced by the Hong Kong Observatory against the computed instants
const PINNED_NEW_MOONS = [gregorianToEpochDay(2057, 9, 29), gregorianToEpochDay(2097, 8, 8)]

const ENGINE = createLunisolarEngine({
  offsetSeconds: (day) => (day < STANDARD_TIME_SINCE ? BEIJING_MEAN_TIME : CHINA_STANDARD_TIME),
  pinnedNewMoons: PINNED_NEW_MOONS,
})

// ============================================================================
// Leap Months
// ============================================================================

function loadLeapMonths(rows: readonly (readonly number[])[]): ReadonlyMap<number, number> {
  const table = new Map<number, number>()
  for (const row of rows) {
    const [year, month] = row
    if (row.length !== 2 || year === undefined || month === undefined || month < 1 || month > 12) {
      throw new ResourceFormatError(`Invalid Chinese leap month entry: ${JSON.stringify(row)}`)
    }
    table.set(year + GREGORIAN_OFFSET, month)
  }
  return table
}

const LEAP_MONTHS = loadLeapMonths(leapMonthData.leapMonths)

/** Years elapsed since the epoch at the start of the given year, counting from 0. */
export function elapsedYears(cycle: number, yearOfCycle: number): number {
  return (cycle - 1) * 60 + yearOfCycle - 1
}

function leapMonthOfElapsed(elapsed: number): number {
  return LEAP_MONTHS.get(elapsed) ?? 0
}

/**
 * Number of the leap month of the year, or 0 when the year has none.
 */
export function getLeapMonth(cycle: number, yearOfCycle: number): number {
  return leapMonthOfElapsed(elapsedYears(cycle, yearOfCycle))
}

// ============================================================================
// Year and Month Boundaries
// ============================================================================

// at most one entry per year of the supported range, plus the reign starts
const newYears = new Map<number, EpochDay>()

function newYearOfElapsed(elapsed: number): EpochDay {
  let day = newYears.get(elapsed)
  if (day === undefined) {
    day = ENGINE.newYearOnOrBefore(Math.floor(CHINESE_EPOCH + (elapsed + 0.5) * MEAN_TROPICAL_YEAR))
    newYears.set(elapsed, day)
  }
  return day
}

function monthOrdinal(month: EastAsianMonth, leapMonth: number): number {
  if (leapMonth === 0 || month.number < leapMonth || (month.number === leapMonth && !month.leap)) {
    return month.number
  }
  return month.number + 1
}

function monthOfOrdinal(ordinal: number, leapMonth: number): EastAsianMonth {
  if (leapMonth === 0 || ordinal <= leapMonth) return eastAsianMonth(ordinal)
  if (ordinal === leapMonth + 1) return eastAsianMonth(leapMonth, true)
  return eastAsianMonth(ordinal - 1)
}

function monthsInElapsedYear(elapsed: number): number {
  return leapMonthOfElapsed(elapsed) === 0 ? 12 : 13
}

// every lunar month has at least 29 days, so newYear + 29·k never passes the k-th month start
function monthStart(elapsed: number, ordinal: number): EpochDay {
  return ENGINE.newMoonOnOrAfter(newYearOfElapsed(elapsed) + (ordinal - 1) * 29)
}

function monthLength(start: EpochDay): number {
  return ENGINE.newMoonOnOrAfter(start + 1) - start
}

function elapsedOfDay(epochDay: EpochDay): number {
  return Math.round((ENGINE.newYearOnOrBefore(epochDay) - CHINESE_EPOCH) / MEAN_TROPICAL_YEAR)
}

/** Related Gregorian year of the Chinese year containing the day, without range checks. */
export function chineseYearOfDay(epochDay: EpochDay): number {
  return elapsedOfDay(epochDay) - GREGORIAN_OFFSET
}

/** First day of the Chinese year beginning in the given Gregorian year, without range checks. */
export function chineseNewYearIn(gregorianYear: number): EpochDay {
  return newYearOfElapsed(gregorianYear + GREGORIAN_OFFSET)
}

function toFields(elapsed: number): { cycle: number; yearOfCycle: number } {
  return { cycle: Math.floor(elapsed / 60) + 1, yearOfCycle: (elapsed % 60) + 1 }
}

// ============================================================================
// Validation
// ============================================================================

function inRange(cycle: number, yearOfCycle: number): boolean {
  const elapsed = elapsedYears(cycle, yearOfCycle)
  return (
    Number.isInteger(cycle) && Number.isInteger(yearOfCycle) &&
    yearOfCycle >= 1 && yearOfCycle <= 60 &&
    elapsed >= FIRST_ELAPSED && elapsed <= LAST_ELAPSED
  )
}

function isValidFields(cycle: number, yearOfCycle: number, month: EastAsianMonth, day: number): boolean {
  if (!inRange(cycle, yearOfCycle)) return false
  if (!Number.isInteger(month.number) || month.number < 1 || month.number > 12) return false
  const elapsed = elapsedYears(cycle, yearOfCycle)
  if (month.leap && leapMonthOfElapsed(elapsed) !== month.number) return false
  if (!Number.isInteger(day) || day < 1 || day > 30) return false
  return day < 30 || monthLength(monthStart(elapsed, monthOrdinal(month, leapMonthOfElapsed(elapsed)))) === 30
}

function describe(date: ChineseDate): string {
  return `${date.cycle}/${date.yearOfCycle}-${date.month.number}${date.month.leap ? 'L' : ''}-${date.day}`
}

// ============================================================================
// System
// ============================================================================

export interface ChineseSystem extends CalendarSystem<ChineseDate> {
  getLeapMonth(cycle: number, yearOfCycle: number): number
  newYear(cycle: number, yearOfCycle: number): EpochDay
  monthsInYear(cycle: number, yearOfCycle: number): number
  /** position of the month within its year, 1..13 */
  monthAsOrdinal(date: ChineseDate): number
}

export const CHINESE: ChineseSystem = {
  family: 'chinese',
  variant: 'chinese',
  getLeapMonth,

  newYear(cycle, yearOfCycle) {
    if (!inRange(cycle, yearOfCycle)) {
      throw new OutOfRangeError(`Chinese year out of range: cycle ${cycle}, year ${yearOfCycle}`)
    }
    return newYearOfElapsed(elapsedYears(cycle, yearOfCycle))
  },

  monthsInYear: (cycle, yearOfCycle) => monthsInElapsedYear(elapsedYears(cycle, yearOfCycle)),

  monthAsOrdinal: (date) => monthOrdinal(date.month, getLeapMonth(date.cycle, date.yearOfCycle)),

  toEpochDay(date) {
    if (!isValidFields(date.cycle, date.yearOfCycle, date.month, date.day)) {
      throw new InvalidDateError(`Invalid Chinese date: ${describe(date)}`)
    }
    const elapsed = elapsedYears(date.cycle, date.yearOfCycle)
    return monthStart(elapsed, monthOrdinal(date.month, leapMonthOfElapsed(elapsed))) + date.day - 1
  },

  fromEpochDay(epochDay) {
    checkEpochDay(epochDay, MIN_EPOCH_DAY, MAX_EPOCH_DAY, 'chinese')
    const elapsed = elapsedOfDay(epochDay)
    const newYear = newYearOfElapsed(elapsed)
    const start = ENGINE.newMoonBefore(epochDay + 1)
    const month = monthOfOrdinal(lunations(newYear, start) + 1, leapMonthOfElapsed(elapsed))
    return { calendar: 'chinese', ...toFields(elapsed), month, day: epochDay - start + 1 }
  },

  isValid: (date) => isValidFields(date.cycle, date.yearOfCycle, date.month, date.day),

  lengthOfMonth(date) {
    const elapsed = elapsedYears(date.cycle, date.yearOfCycle)
    return monthLength(monthStart(elapsed, monthOrdinal(date.month, leapMonthOfElapsed(elapsed))))
  },

  lengthOfYear(date) {
    const elapsed = elapsedYears(date.cycle, date.yearOfCycle)
    return newYearOfElapsed(elapsed + 1) - newYearOfElapsed(elapsed)
  },

  getMinimumEpochDay: () => MIN_EPOCH_DAY,
  getMaximumEpochDay: () => MAX_EPOCH_DAY,
}

// ============================================================================
// Construction
// ============================================================================

export function chineseDate(
  cycle: number,
  yearOfCycle: number,
  month: EastAsianMonth | number,
  day: number
): Result<ChineseDate, InvalidDateError | OutOfRangeError> {
  const m = typeof month === 'number' ? eastAsianMonth(month) : month
  if (!inRange(cycle, yearOfCycle)) {
    return Err(new OutOfRangeError(`Chinese year out of range: cycle ${cycle}, year ${yearOfCycle}`))
  }
  const date: ChineseDate = { calendar: 'chinese', cycle, yearOfCycle, month: m, day }
  if (!isValidFields(cycle, yearOfCycle, m, day)) {
    return Err(new InvalidDateError(`Invalid Chinese date: ${describe(date)}`))
  }
  return Ok(date)
}

/** Gregorian year in which the Chinese year begins. */
export function relatedGregorianYear(date: Pick<ChineseDate, 'cycle' | 'yearOfCycle'>): number {
  return elapsedYears(date.cycle, date.yearOfCycle) - GREGORIAN_OFFSET
}

export interface CyclicYear {
  /** heavenly stem, 1 (jia) .. 10 (gui) */
  readonly stem: number
  /** earthly branch, 1 (zi) .. 12 (hai) */
  readonly branch: number
}

export function cyclicYear(yearOfCycle: number): CyclicYear {
  if (!Number.isInteger(yearOfCycle) || yearOfCycle < 1 || yearOfCycle > 60) {
    throw new OutOfRangeError(`Year of cycle out of range: ${yearOfCycle}`)
  }
  return { stem: ((yearOfCycle - 1) % 10) + 1, branch: ((yearOfCycle - 1) % 12) + 1 }
}

// ============================================================================
// Arithmetic
// ============================================================================

/**
 * Moves by whole months, leap months included. The day is clamped to the target month.
 */
export function plusMonths(date: ChineseDate, months: number): ChineseDate {
  const start = CHINESE.toEpochDay(date) - date.day + 1
  const approximate = start + Math.round(months * MEAN_SYNODIC_MONTH)
  const target = ENGINE.newMoonBefore(approximate + 16)
  if (target < MIN_EPOCH_DAY || target > MAX_EPOCH_DAY) {
    throw new OutOfRangeError(`Result out of range: ${describe(date)} plus ${months} months`)
  }
  const first = CHINESE.fromEpochDay(target)
  return { ...first, day: Math.min(date.day, monthLength(target)) }
}

/**
 * Moves by whole years keeping the month number. A leap month becomes the regular
 * month of the same number when the target year has no such leap month.
 */
export function plusYears(date: ChineseDate, years: number): ChineseDate {
  const elapsed = elapsedYears(date.cycle, date.yearOfCycle) + years
  if (elapsed < FIRST_ELAPSED || elapsed > LAST_ELAPSED) {
    throw new OutOfRangeError(`Result out of range: ${describe(date)} plus ${years} years`)
  }
  const leap = date.month.leap && leapMonthOfElapsed(elapsed) === date.month.number
  const month = eastAsianMonth(date.month.number, leap)
  const length = monthLength(monthStart(elapsed, monthOrdinal(month, leapMonthOfElapsed(elapsed))))
  return { calendar: 'chinese', ...toFields(elapsed), month, day: Math.min(date.day, length) }
}

/**
 * Whole months from `start` to `end`, not counting a final partial month.
 */
export function monthsBetween(start: ChineseDate, end: ChineseDate): number {
  const from = CHINESE.toEpochDay(start) - start.day + 1
  const to = CHINESE.toEpochDay(end) - end.day + 1
  let delta = lunations(from, to)
  if (delta > 0 && end.day < start.day) delta--
  else if (delta < 0 && end.day > start.day) delta++
  return delta
}

// ============================================================================
// Field Rules
// ============================================================================

function withElapsed(date: ChineseDate, elapsed: number, month: EastAsianMonth): ChineseDate {
  const leapMonth = leapMonthOfElapsed(elapsed)
  const kept = month.leap && leapMonth !== month.number ? eastAsianMonth(month.number) : month
  const length = monthLength(monthStart(elapsed, monthOrdinal(kept, leapMonth)))
  return { ...date, ...toFields(elapsed), month: kept, day: Math.min(date.day, length) }
}

const access: CalendarAccess<ChineseDate> = {
  system: CHINESE,
  minYear: FIRST_ELAPSED - GREGORIAN_OFFSET,
  maxYear: LAST_ELAPSED - GREGORIAN_OFFSET,
  yearOf: (date) => relatedGregorianYear(date),
  withYear: (date, year) => withElapsed(date, year + GREGORIAN_OFFSET, date.month),
  monthOf: (date) => CHINESE.monthAsOrdinal(date),
  monthsInYear: (date) => CHINESE.monthsInYear(date.cycle, date.yearOfCycle),
  withMonth: (date, ordinal) => {
    const elapsed = elapsedYears(date.cycle, date.yearOfCycle)
    return withElapsed(date, elapsed, monthOfOrdinal(ordinal, leapMonthOfElapsed(elapsed)))
  },
  dayOf: (date) => date.day,
  withDay: (date, day) => ({ ...date, day }),
}

const standard = createStandardRules(access)

const yearOfCycle: IntFieldRule<ChineseDate> = createIntRule<ChineseDate>({
  name: 'YEAR_OF_CYCLE',
  get: (date) => date.yearOfCycle,
  min: (date) => (date.cycle === 72 ? 22 : 1),
  max: (date) => (date.cycle === 94 ? 56 : 60),
  set: (date, value) => withElapsed(date, elapsedYears(date.cycle, value), date.month),
  childAtFloor: () => standard.month,
  childAtCeiling: () => standard.month,
})

function monthRuleResult(date: ChineseDate, month: EastAsianMonth): Result<ChineseDate, CalendarError> {
  if (!monthOfYear.isValid(date, month)) {
    return Err(new InvalidDateError(`Invalid month for cycle ${date.cycle}, year ${date.yearOfCycle}: ${month.number}${month.leap ? 'L' : ''}`))
  }
  return Ok(withElapsed(date, elapsedYears(date.cycle, date.yearOfCycle), month))
}

const monthOfYear: FieldRule<ChineseDate, EastAsianMonth> = {
  name: 'MONTH_OF_YEAR',
  get: (date) => date.month,
  getMin: () => eastAsianMonth(1),
  getMax: (date) => eastAsianMonth(12, getLeapMonth(date.cycle, date.yearOfCycle) === 12),
  isValid: (date, month) =>
    Number.isInteger(month.number) && month.number >= 1 && month.number <= 12 &&
    (!month.leap || getLeapMonth(date.cycle, date.yearOfCycle) === month.number),
  withValue: (date, month) => monthRuleResult(date, month),
  childAtFloor: () => standard.dayOfMonth,
  childAtCeiling: () => standard.dayOfMonth,
}

export interface ChineseRules extends StandardRules<ChineseDate> {
  readonly yearOfCycle: IntFieldRule<ChineseDate>
  readonly monthOfYear: FieldRule<ChineseDate, EastAsianMonth>
  /** alias of `month`: the 1..13 position within the year */
  readonly monthAsOrdinal: IntFieldRule<ChineseDate>
}

export const CHINESE_RULES: ChineseRules = {
  ...standard,
  yearOfCycle,
  monthOfYear,
  monthAsOrdinal: standard.month,
}

/** Order of two Chinese dates, by year, month and day. */
export function compareChineseDates(a: ChineseDate, b: ChineseDate): number {
  const years = elapsedYears(a.cycle, a.yearOfCycle) - elapsedYears(b.cycle, b.yearOfCycle)
  if (years !== 0) return years
  const months = compareEastAsianMonths(a.month, b.month)
  return months !== 0 ? months : a.day - b.day
}
