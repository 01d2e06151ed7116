/**
 * Calendar System Contract
 *
 * One CalendarSystem per calendar family (and per variant where a family has several).
 * Every date value is an immutable tagged record; the `calendar` tag selects the family.
 */

import type { EpochDay } from './epoch-day'

// ============================================================================
// Families
// ============================================================================

export type CalendarFamily = 'coptic' | 'indian' | 'hijri' | 'chinese' | 'japanese' | 'historic'

// ============================================================================
// Lunisolar Months
// ============================================================================

/**
 * Month of a lunisolar year. A leap month carries the number of the month it follows.
 */
export interface EastAsianMonth {
  readonly number: number
  readonly leap: boolean
}

export function eastAsianMonth(number: number, leap = false): EastAsianMonth {
  return { number, leap }
}

/** Order: month N < leap month N < month N+1 */
export function compareEastAsianMonths(a: EastAsianMonth, b: EastAsianMonth): number {
  if (a.number !== b.number) return a.number - b.number
  if (a.leap === b.leap) return 0
  return a.leap ? 1 : -1
}

export function sameEastAsianMonth(a: EastAsianMonth, b: EastAsianMonth): boolean {
  return a.number === b.number && a.leap === b.leap
}

export function formatEastAsianMonth(month: EastAsianMonth): string {
  return month.leap ? `${month.number}L` : String(month.number)
}

// ============================================================================
// Dates
// ============================================================================

export interface CopticDate {
  readonly calendar: 'coptic'
  readonly year: number
  readonly month: number
  readonly day: number
}

export interface IndianDate {
  readonly calendar: 'indian'
  readonly year: number
  readonly month: number
  readonly day: number
}

export interface HijriDate {
  readonly calendar: 'hijri'
  /** Variant string including any day adjustment, e.g. `islamic-civil:+1` */
  readonly variant: string
  readonly year: number
  readonly month: number
  readonly day: number
}

export interface ChineseDate {
  readonly calendar: 'chinese'
  readonly cycle: number
  readonly yearOfCycle: number
  readonly month: EastAsianMonth
  readonly day: number
}

export interface JapaneseDate {
  readonly calendar: 'japanese'
  readonly nengo: string
  readonly yearOfNengo: number
  readonly month: EastAsianMonth
  readonly day: number
}

export type HistoricEra = 'BC' | 'AD'

export interface HistoricDate {
  readonly calendar: 'historic'
  readonly variant: string
  readonly era: HistoricEra
  readonly yearOfEra: number
  readonly month: number
  readonly day: number
}

export type CalendarDate =
  | CopticDate
  | IndianDate
  | HijriDate
  | ChineseDate
  | JapaneseDate
  | HistoricDate

// ============================================================================
// System
// ============================================================================

export interface CalendarSystem<D> {
  readonly family: CalendarFamily
  readonly variant: string

  toEpochDay(date: D): EpochDay
  fromEpochDay(epochDay: EpochDay): D
  isValid(date: D): boolean

  /** Length of the month containing the date (the day field is ignored). */
  lengthOfMonth(date: D): number
  /** Length of the year containing the date. */
  lengthOfYear(date: D): number

  getMinimumEpochDay(): EpochDay
  getMaximumEpochDay(): EpochDay
}

/** A system for any family, as handed out by the variant registry. */
export type AnyCalendarSystem =
  | CalendarSystem<CopticDate>
  | CalendarSystem<IndianDate>
  | CalendarSystem<HijriDate>
  | CalendarSystem<ChineseDate>
  | CalendarSystem<JapaneseDate>
  | CalendarSystem<HistoricDate>

/**
 * Same calendar position, used by round-trip checks and tests.
 */
export function sameDate(a: CalendarDate, b: CalendarDate): boolean {
  switch (a.calendar) {
    case 'coptic':
    case 'indian':
      return b.calendar === a.calendar && a.year === b.year && a.month === b.month && a.day === b.day
    case 'hijri':
      return (
        b.calendar === 'hijri' && a.variant === b.variant &&
        a.year === b.year && a.month === b.month && a.day === b.day
      )
    case 'chinese':
      return (
        b.calendar === 'chinese' && a.cycle === b.cycle && a.yearOfCycle === b.yearOfCycle &&
        sameEastAsianMonth(a.month, b.month) && a.day === b.day
      )
    case 'japanese':
      return (
        b.calendar === 'japanese' && a.nengo === b.nengo && a.yearOfNengo === b.yearOfNengo &&
        sameEastAsianMonth(a.month, b.month) && a.day === b.day
      )
    case 'historic':
      return (
        b.calendar === 'historic' && a.variant === b.variant && a.era === b.era &&
        a.yearOfEra === b.yearOfEra && a.month === b.month && a.day === b.day
      )
  }
}
