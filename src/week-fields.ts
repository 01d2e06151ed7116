/**
 * Week Fields
 *
 * Local day-of-week, week-of-year and week-of-month for any calendar with a seven-day
 * week. A WeekModel names the first day of the week and the minimal number of days
 * the first week of a period must hold; days before that week belong to the last week
 * of the previous period, days after the last week to the first week of the next one.
 */

import type { CalendarSystem } from './calendar-system'
import type { EpochDay, IsoWeekday } from './epoch-day'
import { floorMod, isoDayOfWeek, toIsoWeekday } from './epoch-day'
import { OutOfRangeError } from './errors'
import type { IntFieldRule, StandardRules } from './field-rule'
import { atFloor, createIntRule, shiftDays } from './field-rule'
import { unwrap } from './result'

// ============================================================================
// Week Models
// ============================================================================

export interface WeekModel {
  readonly firstDayOfWeek: IsoWeekday
  readonly minimalDaysInFirstWeek: number
}

export function weekModelOf(firstDayOfWeek: number, minimalDaysInFirstWeek: number): WeekModel {
  if (!Number.isInteger(minimalDaysInFirstWeek) || minimalDaysInFirstWeek < 1 || minimalDaysInFirstWeek > 7) {
    throw new OutOfRangeError(`Minimal days in first week out of range: ${minimalDaysInFirstWeek}`)
  }
  return { firstDayOfWeek: toIsoWeekday(firstDayOfWeek), minimalDaysInFirstWeek }
}

export const ISO_WEEK: WeekModel = weekModelOf(1, 4)

const SUNDAY_FIRST: WeekModel = weekModelOf(7, 1)
const SATURDAY_FIRST: WeekModel = weekModelOf(6, 1)
const MONDAY_FIRST: WeekModel = weekModelOf(1, 1)

const REGION_WEEKS: Record<string, WeekModel> = {
  US: SUNDAY_FIRST,
  CA: SUNDAY_FIRST,
  MX: SUNDAY_FIRST,
  BR: SUNDAY_FIRST,
  JP: SUNDAY_FIRST,
  KR: SUNDAY_FIRST,
  TW: SUNDAY_FIRST,
  IL: SUNDAY_FIRST,
  IN: SUNDAY_FIRST,
  EG: SATURDAY_FIRST,
  AE: SATURDAY_FIRST,
  IR: SATURDAY_FIRST,
  CN: MONDAY_FIRST,
  RU: MONDAY_FIRST,
  TR: MONDAY_FIRST,
  GB: ISO_WEEK,
  DE: ISO_WEEK,
  FR: ISO_WEEK,
  IT: ISO_WEEK,
  ES: ISO_WEEK,
  SE: ISO_WEEK,
  NL: ISO_WEEK,
}

/** Week model of an ISO 3166 region; unlisted regions start on Monday with one day. */
export function weekModelForRegion(region: string): WeekModel {
  return REGION_WEEKS[region.toUpperCase()] ?? MONDAY_FIRST
}

/** 1 for the model's first day of the week .. 7 */
export function dayOfWeekLocal(model: WeekModel, epochDay: EpochDay): number {
  return floorMod(isoDayOfWeek(epochDay) - model.firstDayOfWeek, 7) + 1
}

// ============================================================================
// Periods
// ============================================================================

/**
 * How to find the year and month around a date of a calendar.
 */
export interface WeekPeriods<D> {
  readonly system: CalendarSystem<D>
  startOfYear(date: D): EpochDay
  startOfMonth(date: D): EpochDay
}

/**
 * Period access through a calendar's standard rules; months that begin after a cutover
 * gap start at their smallest valid day.
 */
export function weekPeriodsOf<D>(system: CalendarSystem<D>, rules: StandardRules<D>): WeekPeriods<D> {
  return {
    system,
    startOfYear: (date) => system.toEpochDay(date) - rules.dayOfYear.getInt(date) + 1,
    startOfMonth: (date) => system.toEpochDay(unwrap(atFloor(rules.month, date))),
  }
}

interface Period {
  readonly start: EpochDay
  readonly length: number
}

interface WeekPosition {
  readonly week: number
  readonly weeksInPeriod: number
}

// ============================================================================
// Engine
// ============================================================================

export interface WeekFields<D> {
  readonly model: WeekModel
  dayOfWeekLocal(date: D): number
  weekOfYear(date: D): number
  weekOfMonth(date: D): number
  /** week counted inside the year only; days before the first week are week 0 */
  boundedWeekOfYear(date: D): number
  boundedWeekOfMonth(date: D): number
  /** weeks of the week-based year the date's week belongs to */
  weeksInYear(date: D): number
  weeksInMonth(date: D): number
  withWeekOfYear(date: D, week: number): D
  readonly rules: {
    readonly dayOfWeekLocal: IntFieldRule<D>
    readonly weekOfYear: IntFieldRule<D>
    readonly weekOfMonth: IntFieldRule<D>
    readonly boundedWeekOfYear: IntFieldRule<D>
    readonly boundedWeekOfMonth: IntFieldRule<D>
  }
}

export function createWeekFields<D>(model: WeekModel, periods: WeekPeriods<D>): WeekFields<D> {
  const { system } = periods

  const firstWeekStart = (periodStart: EpochDay): EpochDay => {
    const dow = dayOfWeekLocal(model, periodStart)
    const daysInFirstWeek = 8 - dow
    return daysInFirstWeek >= model.minimalDaysInFirstWeek ? periodStart - (dow - 1) : periodStart + daysInFirstWeek
  }

  const inRange = (epochDay: EpochDay): boolean =>
    epochDay >= system.getMinimumEpochDay() && epochDay <= system.getMaximumEpochDay()

  const yearOf = (date: D): Period => ({ start: periods.startOfYear(date), length: system.lengthOfYear(date) })
  const monthOf = (date: D): Period => ({ start: periods.startOfMonth(date), length: system.lengthOfMonth(date) })

  /**
   * Week position of a day; a neighbour outside the calendar's range widens the
   * current period by one week.
   */
  const position = (epochDay: EpochDay, date: D, periodOf: (date: D) => Period): WeekPosition => {
    const current = periodOf(date)
    let first = firstWeekStart(current.start)
    let end = firstWeekStart(current.start + current.length)

    if (epochDay < first) {
      if (inRange(current.start - 1)) {
        const previous = periodOf(system.fromEpochDay(current.start - 1))
        const previousFirst = firstWeekStart(previous.start)
        return { week: Math.floor((epochDay - previousFirst) / 7) + 1, weeksInPeriod: (first - previousFirst) / 7 }
      }
      first -= 7
    }
    if (epochDay >= end) {
      if (inRange(current.start + current.length)) {
        const next = periodOf(system.fromEpochDay(current.start + current.length))
        const nextEnd = firstWeekStart(next.start + next.length)
        return { week: Math.floor((epochDay - end) / 7) + 1, weeksInPeriod: (nextEnd - end) / 7 }
      }
      end += 7
    }
    return { week: Math.floor((epochDay - first) / 7) + 1, weeksInPeriod: (end - first) / 7 }
  }

  const bounded = (epochDay: EpochDay, period: Period): number =>
    Math.floor((epochDay - firstWeekStart(period.start)) / 7) + 1

  const weekOfYear = (date: D): number => position(system.toEpochDay(date), date, yearOf).week
  const weekOfMonth = (date: D): number => position(system.toEpochDay(date), date, monthOf).week
  const weeksInYear = (date: D): number => position(system.toEpochDay(date), date, yearOf).weeksInPeriod
  const weeksInMonth = (date: D): number => position(system.toEpochDay(date), date, monthOf).weeksInPeriod
  const boundedWeekOfYear = (date: D): number => bounded(system.toEpochDay(date), yearOf(date))
  const boundedWeekOfMonth = (date: D): number => bounded(system.toEpochDay(date), monthOf(date))

  const shiftWeeks = (date: D, weeks: number): D => shiftDays(system, date, 7 * weeks)

  const boundedRule = (name: string, periodOf: (date: D) => Period): IntFieldRule<D> =>
    createIntRule<D>({
      name,
      get: (date) => bounded(system.toEpochDay(date), periodOf(date)),
      min: (date) => bounded(periodOf(date).start, periodOf(date)),
      max: (date) => {
        const period = periodOf(date)
        return bounded(period.start + period.length - 1, period)
      },
      // the weekday is kept; the day must stay inside the period
      set: (date, value) => {
        const period = periodOf(date)
        const target = system.toEpochDay(date) + 7 * (value - bounded(system.toEpochDay(date), period))
        if (target < period.start || target >= period.start + period.length) {
          throw new OutOfRangeError(`${name} ${value} leaves the period for this weekday`)
        }
        return shiftDays(system, date, target - system.toEpochDay(date))
      },
    })

  const rules = {
    dayOfWeekLocal: createIntRule<D>({
      name: 'LOCAL_DAY_OF_WEEK',
      get: (date) => dayOfWeekLocal(model, system.toEpochDay(date)),
      min: () => 1,
      max: () => 7,
      set: (date, value) => shiftDays(system, date, value - dayOfWeekLocal(model, system.toEpochDay(date))),
      roll: (date, value) => shiftDays(system, date, value - dayOfWeekLocal(model, system.toEpochDay(date))),
    }),
    weekOfYear: createIntRule<D>({
      name: 'WEEK_OF_YEAR',
      get: weekOfYear,
      min: () => 1,
      max: weeksInYear,
      set: (date, value) => shiftWeeks(date, value - weekOfYear(date)),
      roll: (date, value) => shiftWeeks(date, value - weekOfYear(date)),
    }),
    weekOfMonth: createIntRule<D>({
      name: 'WEEK_OF_MONTH',
      get: weekOfMonth,
      min: () => 1,
      max: weeksInMonth,
      set: (date, value) => shiftWeeks(date, value - weekOfMonth(date)),
      roll: (date, value) => shiftWeeks(date, value - weekOfMonth(date)),
    }),
    boundedWeekOfYear: boundedRule('BOUNDED_WEEK_OF_YEAR', yearOf),
    boundedWeekOfMonth: boundedRule('BOUNDED_WEEK_OF_MONTH', monthOf),
  }

  return {
    model,
    dayOfWeekLocal: (date) => dayOfWeekLocal(model, system.toEpochDay(date)),
    weekOfYear,
    weekOfMonth,
    boundedWeekOfYear,
    boundedWeekOfMonth,
    weeksInYear,
    weeksInMonth,
    withWeekOfYear: (date, week) => unwrap(rules.weekOfYear.withInt(date, week)),
    rules,
  }
}
