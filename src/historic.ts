/**
 * Historic Calendar
 *
 * Julian/Gregorian hybrid driven by a ChronoHistory. A date names its era (BC or AD),
 * a year of era and a January-based month and day; which algorithm counts the day
 * depends on where the date falls relative to the cutover events. Dates inside the gap
 * left by a cutover (1582-10-05 .. 1582-10-14 under the first reform) do not exist.
 */

import type { CalendarSystem, HistoricDate, HistoricEra } from './calendar-system'
import type { EpochDay, YearMonthDay } from './epoch-day'
import { checkEpochDay, isoDayOfWeek } from './epoch-day'
import type { Result } from './result'
import { Ok, Err } from './result'
import type { CalendarError } from './errors'
import { InvalidDateError, OutOfRangeError } from './errors'
import type { IntFieldRule, StandardRules } from './field-rule'
import { createIntRule, shiftDays } from './field-rule'
import type { CalendarAlgorithm, ChronoHistory, PreferredEra } from './history'
import { ERA_OFFSETS, JULIAN_REFORM_BC, algorithmAt, baseAlgorithm } from './history'
import type { HistoricFields } from './new-year'
import { compareHistoricFields, displayedYear, prolepticYear } from './new-year'

// ============================================================================
// Constants
// ============================================================================

export const HISTORIC_MAX_YEAR_OF_ERA = 9999

// ============================================================================
// Types
// ============================================================================

export interface PreferredYear {
  readonly era: HistoricEra | PreferredEra
  readonly yearOfEra: number
}

export interface HistoricSystem extends CalendarSystem<HistoricDate> {
  readonly history: ChronoHistory
  /** Algorithm counting the date, or null inside a cutover gap */
  algorithmOf(date: HistoricFields): CalendarAlgorithm | null
  /** Smallest and largest valid day numbers of a month */
  minDayOfMonth(era: HistoricEra, yearOfEra: number, month: number): number
  maxDayOfMonth(era: HistoricEra, yearOfEra: number, month: number): number
  /** Days from the first to the last valid day of the year, counted across any gap */
  lengthOfYearOf(era: HistoricEra, yearOfEra: number): number
  /** Year as displayed under the history's new-year strategy */
  displayedYear(date: HistoricDate): number
  /** Era and year as shown under the history's era preference */
  preferredYear(date: HistoricDate): PreferredYear
}

interface CutOverBoundary {
  readonly algorithm: CalendarAlgorithm
  readonly atCutOver: HistoricFields
  readonly beforeCutOver: HistoricFields
}

function toFields(ymd: YearMonthDay): HistoricFields {
  return ymd.year <= 0
    ? { era: 'BC', yearOfEra: 1 - ymd.year, month: ymd.month, day: ymd.day }
    : { era: 'AD', yearOfEra: ymd.year, month: ymd.month, day: ymd.day }
}

function describe(date: HistoricFields): string {
  return `${date.era} ${date.yearOfEra}-${date.month}-${date.day}`
}

// ============================================================================
// System
// ============================================================================

export function createHistoricCalendar(history: ChronoHistory): HistoricSystem {
  const base = baseAlgorithm(history)
  const boundaries: CutOverBoundary[] = history.events.map((event, i) => {
    const previous = history.events[i - 1]?.algorithm ?? base
    return {
      algorithm: event.algorithm,
      atCutOver: toFields(event.algorithm.fromEpochDay(event.start)),
      beforeCutOver: toFields(previous.fromEpochDay(event.start - 1)),
    }
  })

  const maxBC = history.ancientJulianLeapYears ? JULIAN_REFORM_BC : HISTORIC_MAX_YEAR_OF_ERA
  const last = history.events[history.events.length - 1]?.algorithm ?? base
  const minEpochDay = base.toEpochDay(1 - maxBC, 1, 1)
  const maxEpochDay = last.toEpochDay(HISTORIC_MAX_YEAR_OF_ERA, 12, 31)

  const algorithmOf = (date: HistoricFields): CalendarAlgorithm | null => {
    for (let i = boundaries.length - 1; i >= 0; i--) {
      const boundary = boundaries[i]
      if (!boundary) continue
      if (compareHistoricFields(date, boundary.atCutOver) >= 0) return boundary.algorithm
      if (compareHistoricFields(date, boundary.beforeCutOver) > 0) return null
    }
    return base
  }

  const isYearInRange = (era: HistoricEra, yearOfEra: number): boolean =>
    Number.isInteger(yearOfEra) && yearOfEra >= 1 &&
    yearOfEra <= (era === 'BC' ? maxBC : HISTORIC_MAX_YEAR_OF_ERA)

  const isValidFields = (date: HistoricFields): boolean => {
    if ((date.era !== 'BC' && date.era !== 'AD') || !isYearInRange(date.era, date.yearOfEra)) return false
    const algorithm = algorithmOf(date)
    return algorithm !== null && algorithm.isValid(prolepticYear(date.era, date.yearOfEra), date.month, date.day)
  }

  const epochDayOf = (date: HistoricFields): EpochDay => {
    const algorithm = algorithmOf(date)
    if (algorithm === null || !isValidFields(date)) {
      throw new InvalidDateError(`Invalid historic date in ${history.variant}: ${describe(date)}`)
    }
    return algorithm.toEpochDay(prolepticYear(date.era, date.yearOfEra), date.month, date.day)
  }

  const minDayOfMonth = (era: HistoricEra, yearOfEra: number, month: number): number => {
    for (let day = 1; day <= 31; day++) {
      if (isValidFields({ era, yearOfEra, month, day })) return day
    }
    throw new OutOfRangeError(`No valid day in ${history.variant}: ${era} ${yearOfEra}-${month}`)
  }

  const maxDayOfMonth = (era: HistoricEra, yearOfEra: number, month: number): number => {
    for (let day = 31; day >= 1; day--) {
      if (isValidFields({ era, yearOfEra, month, day })) return day
    }
    throw new OutOfRangeError(`No valid day in ${history.variant}: ${era} ${yearOfEra}-${month}`)
  }

  const lengthOfYearOf = (era: HistoricEra, yearOfEra: number): number => {
    const first = epochDayOf({ era, yearOfEra, month: 1, day: minDayOfMonth(era, yearOfEra, 1) })
    const lastDay = epochDayOf({ era, yearOfEra, month: 12, day: maxDayOfMonth(era, yearOfEra, 12) })
    return lastDay - first + 1
  }

  const displayed = (date: HistoricDate, byzantine = false): number =>
    displayedYear(history.newYearStrategy, date, byzantine)

  const system: HistoricSystem = {
    family: 'historic',
    variant: history.variant,
    history,
    algorithmOf,
    minDayOfMonth,
    maxDayOfMonth,
    lengthOfYearOf,
    displayedYear: (date) => displayed(date),

    preferredYear(date) {
      const preference = history.eraPreference
      const epochDay = epochDayOf(date)
      if (
        preference === null || epochDay < preference.start || epochDay > preference.end ||
        (preference.era === 'HISPANIC' && prolepticYear(date.era, date.yearOfEra) < 1 - 38)
      ) {
        return { era: date.era, yearOfEra: displayed(date) }
      }
      const year = displayed(date, preference.era === 'BYZANTINE')
      return { era: preference.era, yearOfEra: prolepticYear(date.era, year) + ERA_OFFSETS[preference.era] }
    },

    toEpochDay(date) {
      if (date.variant !== history.variant) {
        throw new InvalidDateError(`Date of ${date.variant} passed to ${history.variant}`)
      }
      return epochDayOf(date)
    },

    fromEpochDay(epochDay) {
      checkEpochDay(epochDay, minEpochDay, maxEpochDay, history.variant)
      const fields = toFields(algorithmAt(history, epochDay).fromEpochDay(epochDay))
      return { calendar: 'historic', variant: history.variant, ...fields }
    },

    isValid: (date) => date.variant === history.variant && isValidFields(date),

    lengthOfMonth(date) {
      const first = epochDayOf({ ...date, day: minDayOfMonth(date.era, date.yearOfEra, date.month) })
      const lastDay = epochDayOf({ ...date, day: maxDayOfMonth(date.era, date.yearOfEra, date.month) })
      return lastDay - first + 1
    },

    lengthOfYear: (date) => lengthOfYearOf(date.era, date.yearOfEra),
    getMinimumEpochDay: () => minEpochDay,
    getMaximumEpochDay: () => maxEpochDay,
  }
  return system
}

// ============================================================================
// Construction
// ============================================================================

export function historicDate(
  system: HistoricSystem,
  era: HistoricEra,
  yearOfEra: number,
  month: number,
  day: number
): Result<HistoricDate, CalendarError> {
  const maxBC = system.history.ancientJulianLeapYears ? JULIAN_REFORM_BC : HISTORIC_MAX_YEAR_OF_ERA
  if (!Number.isInteger(yearOfEra) || yearOfEra < 1 || yearOfEra > (era === 'BC' ? maxBC : HISTORIC_MAX_YEAR_OF_ERA)) {
    return Err(new OutOfRangeError(`Historic year out of range: ${era} ${yearOfEra}`))
  }
  const date: HistoricDate = { calendar: 'historic', variant: system.variant, era, yearOfEra, month, day }
  if (!system.isValid(date)) {
    return Err(new InvalidDateError(`Invalid historic date in ${system.variant}: ${describe(date)}`))
  }
  return Ok(date)
}

// ============================================================================
// Field Rules
// ============================================================================

export interface HistoricRules extends StandardRules<HistoricDate> {
  /** year of era, the era kept */
  readonly yearOfEra: IntFieldRule<HistoricDate>
}

/**
 * `year` is the proleptic year (1 BC = 0). Day numbers skipped by a cutover stay inside
 * [min, max] of the day-of-month field but cannot be set.
 */
export function createHistoricRules(system: HistoricSystem): HistoricRules {
  const maxBC = system.history.ancientJulianLeapYears ? JULIAN_REFORM_BC : HISTORIC_MAX_YEAR_OF_ERA

  const fromProleptic = (year: number): { era: HistoricEra; yearOfEra: number } =>
    year <= 0 ? { era: 'BC', yearOfEra: 1 - year } : { era: 'AD', yearOfEra: year }

  const checked = (date: HistoricDate): HistoricDate => {
    if (!system.isValid(date)) {
      throw new InvalidDateError(`Invalid historic date in ${system.variant}: ${describe(date)}`)
    }
    return date
  }

  const clampDay = (date: HistoricDate): HistoricDate =>
    checked({ ...date, day: Math.min(date.day, system.maxDayOfMonth(date.era, date.yearOfEra, date.month)) })

  const startOfYear = (date: HistoricDate): EpochDay =>
    system.toEpochDay({ ...date, month: 1, day: system.minDayOfMonth(date.era, date.yearOfEra, 1) })

  const dayOfMonth = createIntRule<HistoricDate>({
    name: 'DAY_OF_MONTH',
    get: (date) => date.day,
    min: (date) => system.minDayOfMonth(date.era, date.yearOfEra, date.month),
    max: (date) => system.maxDayOfMonth(date.era, date.yearOfEra, date.month),
    set: (date, value) => checked({ ...date, day: value }),
    roll: (date, value) => shiftDays(system, date, value - date.day),
  })

  const month = createIntRule<HistoricDate>({
    name: 'MONTH',
    get: (date) => date.month,
    min: () => 1,
    max: () => 12,
    set: (date, value) => clampDay({ ...date, month: value }),
    roll: (date, value) => {
      const total = prolepticYear(date.era, date.yearOfEra) * 12 + value - 1
      const { era, yearOfEra } = fromProleptic(Math.floor(total / 12))
      return clampDay({ ...date, era, yearOfEra, month: total - Math.floor(total / 12) * 12 + 1 })
    },
    childAtFloor: () => dayOfMonth,
    childAtCeiling: () => dayOfMonth,
  })

  const year = createIntRule<HistoricDate>({
    name: 'YEAR',
    get: (date) => prolepticYear(date.era, date.yearOfEra),
    min: () => 1 - maxBC,
    max: () => HISTORIC_MAX_YEAR_OF_ERA,
    set: (date, value) => clampDay({ ...date, ...fromProleptic(value) }),
    childAtFloor: () => month,
    childAtCeiling: () => month,
  })

  const yearOfEra = createIntRule<HistoricDate>({
    name: 'YEAR_OF_ERA',
    get: (date) => date.yearOfEra,
    min: () => 1,
    max: (date) => (date.era === 'BC' ? maxBC : HISTORIC_MAX_YEAR_OF_ERA),
    set: (date, value) => clampDay({ ...date, yearOfEra: value }),
    childAtFloor: () => month,
    childAtCeiling: () => month,
  })

  const dayOfYear = createIntRule<HistoricDate>({
    name: 'DAY_OF_YEAR',
    get: (date) => system.toEpochDay(date) - startOfYear(date) + 1,
    min: () => 1,
    max: (date) => system.lengthOfYear(date),
    set: (date, value) => shiftDays(system, date, startOfYear(date) + value - 1 - system.toEpochDay(date)),
    roll: (date, value) => shiftDays(system, date, startOfYear(date) + value - 1 - system.toEpochDay(date)),
  })

  const dayOfWeek = createIntRule<HistoricDate>({
    name: 'DAY_OF_WEEK',
    get: (date) => isoDayOfWeek(system.toEpochDay(date)),
    min: () => 1,
    max: () => 7,
    set: (date, value) => shiftDays(system, date, value - isoDayOfWeek(system.toEpochDay(date))),
    roll: (date, value) => shiftDays(system, date, value - isoDayOfWeek(system.toEpochDay(date))),
  })

  return { year, yearOfEra, month, dayOfMonth, dayOfYear, dayOfWeek }
}
