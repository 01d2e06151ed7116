/**
 * Chronological History
 *
 * Describes which calendar algorithm was in force on which day: a base algorithm
 * (usually Julian) and a chain of cutover events, each switching to another algorithm
 * from a given epoch-day on. A history also carries its new-year strategy, an optional
 * era preference and, optionally, the irregular Julian leap years of the Roman era.
 *
 * Histories are plain values identified by their variant string; `historyOfVariant`
 * parses the strings used by the registry.
 */

import type { EpochDay, YearMonthDay } from './epoch-day'
import {
  epochDayToGregorian,
  epochDayToJulian,
  formatIsoDate,
  gregorianLengthOfMonth,
  gregorianToEpochDay,
  isJulianLeapYear,
  julianLengthOfMonth,
  julianToEpochDay,
  parseIsoDate,
} from './epoch-day'
import { UnsupportedVariantError } from './errors'
import type { NewYearStrategy } from './new-year'
import { DEFAULT_NEW_YEAR_STRATEGY, combineNewYear, newYearUntil } from './new-year'

// ============================================================================
// Algorithms
// ============================================================================

export type AlgorithmName = 'julian' | 'gregorian' | 'swedish' | 'ancient-julian'

/**
 * A solar calendar over proleptic years (year 0 = 1 BC).
 */
export interface CalendarAlgorithm {
  readonly name: AlgorithmName
  toEpochDay(year: number, month: number, day: number): EpochDay
  fromEpochDay(epochDay: EpochDay): YearMonthDay
  lengthOfMonth(year: number, month: number): number
  isValid(year: number, month: number, day: number): boolean
}

function isValidWith(lengthOfMonth: (year: number, month: number) => number) {
  return (year: number, month: number, day: number): boolean =>
    Number.isInteger(year) && Number.isInteger(month) && Number.isInteger(day) &&
    month >= 1 && month <= 12 && day >= 1 && day <= lengthOfMonth(year, month)
}

export const JULIAN: CalendarAlgorithm = {
  name: 'julian',
  toEpochDay: julianToEpochDay,
  fromEpochDay: epochDayToJulian,
  lengthOfMonth: julianLengthOfMonth,
  isValid: isValidWith(julianLengthOfMonth),
}

export const GREGORIAN: CalendarAlgorithm = {
  name: 'gregorian',
  toEpochDay: gregorianToEpochDay,
  fromEpochDay: epochDayToGregorian,
  lengthOfMonth: gregorianLengthOfMonth,
  isValid: isValidWith(gregorianLengthOfMonth),
}

const SWEDISH_LEAP_DAY = 1712

function swedishLengthOfMonth(year: number, month: number): number {
  return year === SWEDISH_LEAP_DAY && month === 2 ? 30 : julianLengthOfMonth(year, month)
}

/**
 * Sweden skipped the leap day of 1700 and ran one day ahead of the Julian calendar
 * until it added February 30 in 1712.
 */
export const SWEDISH: CalendarAlgorithm = {
  name: 'swedish',
  toEpochDay: (year, month, day) => julianToEpochDay(year, month, day) - 1,
  fromEpochDay(epochDay) {
    const julian = epochDayToJulian(epochDay + 1)
    if (julian.year === SWEDISH_LEAP_DAY && julian.month === 3 && julian.day === 1) {
      return { year: SWEDISH_LEAP_DAY, month: 2, day: 30 }
    }
    return julian
  },
  lengthOfMonth: swedishLengthOfMonth,
  isValid: isValidWith(swedishLengthOfMonth),
}

// ============================================================================
// Ancient Julian Leap Years
// ============================================================================

/** Leap years BC between the Julian reform and the pause under Augustus */
export const SCALIGER_LEAP_YEARS_BC: readonly number[] = [42, 39, 36, 33, 30, 27, 24, 21, 18, 15, 12, 9]

/** Year of the Julian reform; earlier years are not defined */
export const JULIAN_REFORM_BC = 45

const AD8 = julianToEpochDay(8, 1, 1)

const SCALIGER_SUFFIX = '+scaliger'

/**
 * Julian calendar with an irregular sequence of leap years BC. From AD 8 on it equals
 * the proleptic Julian calendar; AD 1 to 7 have no leap day.
 */
export function createAncientJulian(leapYearsBC: readonly number[]): CalendarAlgorithm {
  const leapYears = new Set(leapYearsBC.map((bc) => 1 - bc))
  const firstYear = 1 - JULIAN_REFORM_BC

  const isLeap = (year: number): boolean => (year >= 8 ? isJulianLeapYear(year) : leapYears.has(year))
  const lengthOfMonth = (year: number, month: number): number => {
    if (year >= 8) return julianLengthOfMonth(year, month)
    if (month === 2) return isLeap(year) ? 29 : 28
    return julianLengthOfMonth(1, month)
  }
  const lengthOfYear = (year: number): number => (isLeap(year) ? 366 : 365)

  return {
    name: 'ancient-julian',
    toEpochDay(year, month, day) {
      if (year >= 8) return julianToEpochDay(year, month, day)
      let result = AD8
      for (let y = 7; y >= year; y--) result -= lengthOfYear(y)
      for (let m = 1; m < month; m++) result += lengthOfMonth(year, m)
      return result + day - 1
    },
    fromEpochDay(epochDay) {
      if (epochDay >= AD8) return epochDayToJulian(epochDay)
      let year = 7
      let start = AD8 - lengthOfYear(year)
      while (epochDay < start) {
        year--
        start -= lengthOfYear(year)
      }
      let month = 1
      let remaining = epochDay - start
      while (remaining >= lengthOfMonth(year, month)) {
        remaining -= lengthOfMonth(year, month)
        month++
      }
      return { year, month, day: remaining + 1 }
    },
    lengthOfMonth,
    isValid: (year, month, day) => year >= firstYear && isValidWith(lengthOfMonth)(year, month, day),
  }
}

export const ANCIENT_JULIAN: CalendarAlgorithm = createAncientJulian(SCALIGER_LEAP_YEARS_BC)

// ============================================================================
// Era Preference
// ============================================================================

export type PreferredEra = 'HISPANIC' | 'BYZANTINE' | 'AB_URBE_CONDITA'

export interface EraPreference {
  readonly era: PreferredEra
  /** first and last epoch-day of the window */
  readonly start: EpochDay
  readonly end: EpochDay
}

/** Years AD are converted by adding the offset. */
export const ERA_OFFSETS: Record<PreferredEra, number> = {
  HISPANIC: 38,
  BYZANTINE: 5508,
  AB_URBE_CONDITA: 753,
}

export function eraPreference(era: PreferredEra, start: EpochDay, end: EpochDay): EraPreference {
  return { era, start, end }
}

// ============================================================================
// History
// ============================================================================

export interface CutOverEvent {
  readonly start: EpochDay
  readonly algorithm: CalendarAlgorithm
}

export interface ChronoHistory {
  readonly variant: string
  /** algorithm before the first event */
  readonly base: CalendarAlgorithm
  /** ordered by start */
  readonly events: readonly CutOverEvent[]
  readonly ancientJulianLeapYears: boolean
  readonly newYearStrategy: NewYearStrategy
  readonly eraPreference: EraPreference | null
}

/** 1582-10-15, the earliest possible switch to the Gregorian calendar */
export const FIRST_GREGORIAN_REFORM: EpochDay = gregorianToEpochDay(1582, 10, 15)

function history(variant: string, base: CalendarAlgorithm, events: readonly CutOverEvent[]): ChronoHistory {
  return {
    variant,
    base,
    events,
    ancientJulianLeapYears: false,
    newYearStrategy: DEFAULT_NEW_YEAR_STRATEGY,
    eraPreference: null,
  }
}

export const PROLEPTIC_GREGORIAN: ChronoHistory = history('historic-proleptic-gregorian', GREGORIAN, [])

export const PROLEPTIC_JULIAN: ChronoHistory = history('historic-proleptic-julian', JULIAN, [])

export const FIRST_REFORM_HISTORY: ChronoHistory = history('historic-first-gregorian-reform', JULIAN, [
  { start: FIRST_GREGORIAN_REFORM, algorithm: GREGORIAN },
])

export const SWEDEN: ChronoHistory = history('historic-sweden', JULIAN, [
  { start: julianToEpochDay(1700, 2, 29), algorithm: SWEDISH },
  { start: julianToEpochDay(1712, 3, 1), algorithm: JULIAN },
  { start: gregorianToEpochDay(1753, 3, 1), algorithm: GREGORIAN },
])

/**
 * Single switch from Julian to Gregorian on the given epoch-day.
 */
export function gregorianReform(start: EpochDay): ChronoHistory {
  if (!Number.isInteger(start) || start < FIRST_GREGORIAN_REFORM) {
    throw new UnsupportedVariantError(
      `historic-reform:${formatIsoDate(start)}`,
      `The Gregorian calendar did not exist before 1582-10-15: ${formatIsoDate(start)}`
    )
  }
  if (start === FIRST_GREGORIAN_REFORM) return FIRST_REFORM_HISTORY
  return history(`historic-reform:${formatIsoDate(start)}`, JULIAN, [{ start, algorithm: GREGORIAN }])
}

export function withNewYearStrategy(base: ChronoHistory, strategy: NewYearStrategy): ChronoHistory {
  return { ...base, newYearStrategy: strategy }
}

export function withEraPreference(base: ChronoHistory, preference: EraPreference | null): ChronoHistory {
  return { ...base, eraPreference: preference }
}

/**
 * Replaces the Julian rule before AD 8 by the Scaliger sequence and limits the history
 * to dates from BC 45 on. Proleptic Gregorian histories have no Julian part.
 */
export function withAncientJulianLeapYears(base: ChronoHistory): ChronoHistory {
  if (base.base !== JULIAN) {
    throw new UnsupportedVariantError(`${base.variant}+scaliger`, `No Julian period in ${base.variant}`)
  }
  if (base.ancientJulianLeapYears) return base
  return { ...base, variant: `${base.variant}${SCALIGER_SUFFIX}`, ancientJulianLeapYears: true }
}

/** Algorithm that counts days before the first event */
export function baseAlgorithm(h: ChronoHistory): CalendarAlgorithm {
  return h.ancientJulianLeapYears ? ANCIENT_JULIAN : h.base
}

/**
 * Algorithm in force on the day. The ancient calculus equals the Julian one from AD 8
 * on, so only the base algorithm changes with it.
 */
export function algorithmAt(h: ChronoHistory, epochDay: EpochDay): CalendarAlgorithm {
  for (let i = h.events.length - 1; i >= 0; i--) {
    const event = h.events[i]
    if (event && epochDay >= event.start) return event.algorithm
  }
  return baseAlgorithm(h)
}

/** Epoch-day of the final switch to the Gregorian calendar, or null for proleptic histories */
export function gregorianCutOver(h: ChronoHistory): EpochDay | null {
  return h.events[h.events.length - 1]?.start ?? null
}

// ============================================================================
// Region Presets
// ============================================================================

function britishHistory(): ChronoHistory {
  return withNewYearStrategy(
    gregorianReform(gregorianToEpochDay(1752, 9, 14)),
    combineNewYear(
      newYearUntil('CHRISTMAS_STYLE', 1087),
      newYearUntil('BEGIN_OF_JANUARY', 1155),
      newYearUntil('MARIA_ANUNCIATA', 1752)
    )
  )
}

const REGIONS: Record<string, () => ChronoHistory> = {
  fr: () => gregorianReform(gregorianToEpochDay(1582, 12, 20)),
  gb: britishHistory,
  us: britishHistory,
  ru: () =>
    withEraPreference(
      withNewYearStrategy(
        gregorianReform(gregorianToEpochDay(1918, 2, 14)),
        combineNewYear(
          newYearUntil('BEGIN_OF_JANUARY', 988),
          newYearUntil('BEGIN_OF_MARCH', 1493),
          newYearUntil('BEGIN_OF_SEPTEMBER', 1700)
        )
      ),
      eraPreference('BYZANTINE', julianToEpochDay(988, 3, 1), julianToEpochDay(1699, 12, 31))
    ),
  se: () => SWEDEN,
  dk: () => gregorianReform(gregorianToEpochDay(1700, 3, 1)),
  no: () => gregorianReform(gregorianToEpochDay(1700, 3, 1)),
  gr: () => gregorianReform(gregorianToEpochDay(1923, 3, 1)),
  bg: () => gregorianReform(gregorianToEpochDay(1916, 4, 14)),
  ro: () => gregorianReform(gregorianToEpochDay(1919, 4, 14)),
}

export const HISTORY_REGIONS: readonly string[] = Object.keys(REGIONS).sort()

/**
 * Preset for an ISO 3166 region code; other regions follow the first reform.
 */
export function historyForRegion(region: string): ChronoHistory {
  const code = region.toLowerCase()
  const preset = REGIONS[code]
  if (!preset) return FIRST_REFORM_HISTORY
  return { ...preset(), variant: `historic-${code}` }
}

// ============================================================================
// Variant Strings
// ============================================================================

const NAMED: Record<string, ChronoHistory> = {
  'historic-first-gregorian-reform': FIRST_REFORM_HISTORY,
  'historic-proleptic-gregorian': PROLEPTIC_GREGORIAN,
  'historic-proleptic-julian': PROLEPTIC_JULIAN,
  'historic-sweden': SWEDEN,
}

/**
 * Parses `historic-<name>`, `historic-<region>` or `historic-reform:<iso date>`,
 * each optionally followed by `+scaliger`.
 */
export function historyOfVariant(variant: string): ChronoHistory {
  if (variant.endsWith(SCALIGER_SUFFIX)) {
    return withAncientJulianLeapYears(historyOfVariant(variant.slice(0, -SCALIGER_SUFFIX.length)))
  }
  const named = NAMED[variant]
  if (named) return named

  if (variant.startsWith('historic-reform:')) {
    const parsed = parseIsoDate(variant.slice('historic-reform:'.length))
    if (!parsed.ok) throw new UnsupportedVariantError(variant, `Bad reform date in '${variant}': ${parsed.error.message}`)
    const h = gregorianReform(parsed.value)
    return h === FIRST_REFORM_HISTORY ? h : { ...h, variant }
  }

  const region = /^historic-([a-z]{2})$/.exec(variant)?.[1]
  if (region && REGIONS[region]) return historyForRegion(region)
  throw new UnsupportedVariantError(variant)
}
