/**
 * Calendar date generators.
 *
 * Epoch-days inside a system's range and valid field tuples for every family.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import type {
  CalendarSystem,
  ChineseDate,
  CopticDate,
  HistoricDate,
  HistoricEra,
  HijriDate,
  IndianDate,
  JapaneseDate,
} from '../../../src/calendar-system'
import { CHINESE } from '../../../src/chinese'
import { COPTIC_MAX_YEAR, COPTIC_MIN_YEAR, copticLengthOfMonth } from '../../../src/coptic'
import type { EpochDay } from '../../../src/epoch-day'
import { gregorianToEpochDay } from '../../../src/epoch-day'
import type { HijriSystem } from '../../../src/hijri'
import type { HistoricSystem } from '../../../src/historic'
import { HISTORIC_MAX_YEAR_OF_ERA } from '../../../src/historic'
import { JULIAN_REFORM_BC } from '../../../src/history'
import { INDIAN_MAX_YEAR, INDIAN_MIN_YEAR, indianLengthOfMonth, indianMonthsInYear } from '../../../src/indian'
import type { JapaneseSystem } from '../../../src/japanese'
import type { WeekModel } from '../../../src/week-fields'
import { weekModelOf } from '../../../src/week-fields'

// ============================================================================
// Type-Safe Generator Aliases
// ============================================================================

export type GenEpochDay = Arbitrary<EpochDay>

export type GenCopticDate = Arbitrary<CopticDate>

export type GenIndianDate = Arbitrary<IndianDate>

export type GenHijriDate = Arbitrary<HijriDate>

export type GenHistoricDate = Arbitrary<HistoricDate>

// ============================================================================
// Epoch-Days
// ============================================================================

/**
 * Epoch-days inside the system's range, optionally narrowed.
 */
export function epochDayGen<D>(system: CalendarSystem<D>, options?: { min?: EpochDay; max?: EpochDay }): GenEpochDay {
  const min = Math.max(system.getMinimumEpochDay(), options?.min ?? -Infinity)
  const max = Math.min(system.getMaximumEpochDay(), options?.max ?? Infinity)
  return fc.integer({ min, max })
}

/**
 * Epoch-days near the ends of the range and near the day a calendar changes rules.
 */
export function boundaryEpochDayGen<D>(system: CalendarSystem<D>, anchors: readonly EpochDay[] = []): GenEpochDay {
  const min = system.getMinimumEpochDay()
  const max = system.getMaximumEpochDay()
  const points = [min, max, ...anchors]
  return fc
    .tuple(fc.constantFrom(...points), fc.integer({ min: -3, max: 3 }))
    .map(([point, offset]) => Math.min(max, Math.max(min, point + offset)))
}

/**
 * Dates of a system, drawn through its epoch-days.
 */
export function dateGen<D>(system: CalendarSystem<D>, options?: { min?: EpochDay; max?: EpochDay }): Arbitrary<D> {
  return epochDayGen(system, options).map((epochDay) => system.fromEpochDay(epochDay))
}

// ============================================================================
// Field Tuples
// ============================================================================

export function copticDateGen(): GenCopticDate {
  return fc
    .tuple(
      fc.integer({ min: COPTIC_MIN_YEAR, max: COPTIC_MAX_YEAR }),
      fc.integer({ min: 1, max: 13 }),
      fc.integer({ min: 1, max: 30 })
    )
    .map(([year, month, day]): CopticDate => ({
      calendar: 'coptic',
      year,
      month,
      day: Math.min(day, copticLengthOfMonth(year, month)),
    }))
}

export function indianDateGen(): GenIndianDate {
  return fc
    .tuple(
      fc.integer({ min: INDIAN_MIN_YEAR, max: INDIAN_MAX_YEAR }),
      fc.integer({ min: 1, max: 12 }),
      fc.integer({ min: 1, max: 31 })
    )
    .map(([year, m, day]): IndianDate => {
      const month = Math.min(m, indianMonthsInYear(year))
      return { calendar: 'indian', year, month, day: Math.min(day, indianLengthOfMonth(year, month)) }
    })
}

export function hijriDateGen(system: HijriSystem): GenHijriDate {
  return fc
    .tuple(
      fc.integer({ min: system.minYear, max: system.maxYear }),
      fc.integer({ min: 1, max: 12 }),
      fc.integer({ min: 1, max: 30 })
    )
    .map(([year, month, day]): HijriDate => ({
      calendar: 'hijri',
      variant: system.variant,
      year,
      month,
      day: Math.min(day, system.lengthOfMonthIn(year, month)),
    }))
}

/**
 * Historic dates; day numbers inside a cutover gap are dropped.
 */
export function historicDateGen(system: HistoricSystem): GenHistoricDate {
  const maxBC = system.history.ancientJulianLeapYears ? JULIAN_REFORM_BC : HISTORIC_MAX_YEAR_OF_ERA
  const era: Arbitrary<HistoricEra> = fc.constantFrom('BC', 'AD')
  return era
    .chain((e) =>
      fc.tuple(
        fc.constant(e),
        fc.integer({ min: 1, max: e === 'BC' ? maxBC : HISTORIC_MAX_YEAR_OF_ERA }),
        fc.integer({ min: 1, max: 12 }),
        fc.integer({ min: 1, max: 31 })
      )
    )
    .map(([e, yearOfEra, month, day]): HistoricDate => ({
      calendar: 'historic',
      variant: system.variant,
      era: e,
      yearOfEra,
      month,
      day: Math.min(
        Math.max(day, system.minDayOfMonth(e, yearOfEra, month)),
        system.maxDayOfMonth(e, yearOfEra, month)
      ),
    }))
    .filter((date) => system.isValid(date))
}

/** Chinese dates from 1900 to 2100 */
export function chineseDateGen(): Arbitrary<ChineseDate> {
  return dateGen(CHINESE, { min: gregorianToEpochDay(1900, 1, 31), max: gregorianToEpochDay(2100, 12, 31) })
}

/**
 * Japanese dates from the start of the table to the end of the twenty-first century.
 */
export function japaneseDateGen(system: JapaneseSystem): Arbitrary<JapaneseDate> {
  return dateGen(system, { max: gregorianToEpochDay(2100, 12, 31) })
}

// ============================================================================
// Week Models
// ============================================================================

export function weekModelGen(): Arbitrary<WeekModel> {
  return fc
    .tuple(fc.integer({ min: 1, max: 7 }), fc.integer({ min: 1, max: 7 }))
    .map(([firstDay, minimalDays]) => weekModelOf(firstDay, minimalDays))
}
