/**
 * New-Year Rules
 *
 * Historical years did not always begin on January 1. A NewYearRule gives the first
 * day of a year; a NewYearStrategy says which rule was in force up to which year AD.
 * Dates themselves keep the January-based year; the strategy only changes the year
 * that was displayed.
 */

import type { HistoricEra } from './calendar-system'
import { floorMod } from './epoch-day'
import { InvalidDateError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type NewYearRule =
  | 'BEGIN_OF_JANUARY'
  | 'BEGIN_OF_MARCH'
  | 'BEGIN_OF_SEPTEMBER'
  | 'CHRISTMAS_STYLE'
  | 'EASTER_STYLE'
  | 'GOOD_FRIDAY'
  | 'MARIA_ANUNCIATA'
  | 'CALCULUS_PISANUS'
  | 'EPIPHANY'

export const NEW_YEAR_RULES: readonly NewYearRule[] = [
  'BEGIN_OF_JANUARY',
  'BEGIN_OF_MARCH',
  'BEGIN_OF_SEPTEMBER',
  'CHRISTMAS_STYLE',
  'EASTER_STYLE',
  'GOOD_FRIDAY',
  'MARIA_ANUNCIATA',
  'CALCULUS_PISANUS',
  'EPIPHANY',
]

/** Calendar position without a variant; years counted in the given era. */
export interface HistoricFields {
  readonly era: HistoricEra
  readonly yearOfEra: number
  readonly month: number
  readonly day: number
}

export interface NewYearPeriod {
  readonly rule: NewYearRule
  /** first year AD in which the rule no longer applies */
  readonly until: number
}

/**
 * Ordered periods; years from the last `until` on begin on January 1.
 */
export interface NewYearStrategy {
  readonly periods: readonly NewYearPeriod[]
}

export const DEFAULT_NEW_YEAR_STRATEGY: NewYearStrategy = { periods: [] }

const COUNCIL_OF_TOURS = 567

// ============================================================================
// Positions
// ============================================================================

export function prolepticYear(era: HistoricEra, yearOfEra: number): number {
  return era === 'BC' ? 1 - yearOfEra : yearOfEra
}

export function compareHistoricFields(a: HistoricFields, b: HistoricFields): number {
  const years = prolepticYear(a.era, a.yearOfEra) - prolepticYear(b.era, b.yearOfEra)
  if (years !== 0) return years
  return a.month !== b.month ? a.month - b.month : a.day - b.day
}

function fields(era: HistoricEra, yearOfEra: number, month: number, day: number): HistoricFields {
  return { era, yearOfEra, month, day }
}

/**
 * Day of March of Easter Sunday in the Julian computus; values above 31 fall in April.
 */
export function julianEasterMarchDay(year: number): number {
  const d = floorMod(19 * floorMod(year, 19) + 15, 30)
  const e = floorMod(2 * floorMod(year, 4) + 4 * floorMod(year, 7) - d + 34, 7)
  return d + e + 22
}

function inMarchOrApril(era: HistoricEra, yearOfEra: number, marchDay: number): HistoricFields {
  return marchDay > 31 ? fields(era, yearOfEra, 4, marchDay - 31) : fields(era, yearOfEra, 3, marchDay)
}

// ============================================================================
// Rules
// ============================================================================

/**
 * First day of the displayed year `yearOfEra` under the rule.
 */
export function newYearOf(rule: NewYearRule, era: HistoricEra, yearOfEra: number): HistoricFields {
  switch (rule) {
    case 'BEGIN_OF_JANUARY':
      return fields(era, yearOfEra, 1, 1)
    case 'BEGIN_OF_MARCH':
      return fields(era, yearOfEra, 3, 1)
    case 'BEGIN_OF_SEPTEMBER':
      return fields(era, yearOfEra - 1, 9, 1)
    case 'CHRISTMAS_STYLE':
      return fields(era, yearOfEra - 1, 12, 25)
    case 'EASTER_STYLE':
      return inMarchOrApril(era, yearOfEra, julianEasterMarchDay(prolepticYear(era, yearOfEra)) - 1)
    case 'GOOD_FRIDAY':
      return inMarchOrApril(era, yearOfEra, julianEasterMarchDay(prolepticYear(era, yearOfEra)) - 2)
    case 'MARIA_ANUNCIATA':
    case 'CALCULUS_PISANUS':
      return fields(era, yearOfEra, 3, 25)
    case 'EPIPHANY':
      return fields(era, yearOfEra, 1, 6)
  }
}

function displayedYearUnder(
  rule: NewYearRule,
  strategy: NewYearStrategy,
  date: HistoricFields,
  byzantine: boolean
): number {
  const { era, yearOfEra } = date
  switch (rule) {
    case 'BEGIN_OF_JANUARY':
      return yearOfEra
    case 'BEGIN_OF_SEPTEMBER':
    case 'CHRISTMAS_STYLE': {
      // the year starts before January, so the next year's rule decides
      const next = strategyNewYear(strategy, era, yearOfEra + 1, byzantine)
      return compareHistoricFields(date, next) >= 0 ? yearOfEra + 1 : yearOfEra
    }
    case 'CALCULUS_PISANUS': {
      const newYear = newYearOf(rule, era, yearOfEra)
      return compareHistoricFields(date, newYear) < 0 ? yearOfEra - 2 : yearOfEra - 1
    }
    default: {
      const newYear = newYearOf(rule, era, yearOfEra)
      return compareHistoricFields(date, newYear) < 0 ? yearOfEra - 1 : yearOfEra
    }
  }
}

// ============================================================================
// Strategies
// ============================================================================

function normalize(periods: readonly NewYearPeriod[]): NewYearStrategy {
  const sorted = [...periods].sort((a, b) => a.until - b.until)
  const result: NewYearPeriod[] = []
  for (const period of sorted) {
    const previous = result[result.length - 1]
    if (previous && previous.until === period.until) {
      if (previous.rule !== period.rule) {
        throw new InvalidDateError(`Overlapping new-year rules until ${period.until}: ${previous.rule}, ${period.rule}`)
      }
      continue
    }
    result.push(period)
  }
  return { periods: result }
}

/**
 * The rule applies to all years before `annoDomini`, from AD 567 on. Other rules than
 * BEGIN_OF_JANUARY are preceded by BEGIN_OF_JANUARY up to AD 567.
 */
export function newYearUntil(rule: NewYearRule, annoDomini: number): NewYearStrategy {
  if (!Number.isInteger(annoDomini) || annoDomini <= COUNCIL_OF_TOURS) {
    throw new InvalidDateError(`New-year strategies start after the Council of Tours in AD ${COUNCIL_OF_TOURS}: ${annoDomini}`)
  }
  const periods: NewYearPeriod[] = [{ rule, until: annoDomini }]
  if (rule !== 'BEGIN_OF_JANUARY') periods.unshift({ rule: 'BEGIN_OF_JANUARY', until: COUNCIL_OF_TOURS })
  return normalize(periods)
}

/** Concatenates strategies; two rules ending in the same year must agree. */
export function combineNewYear(first: NewYearStrategy, ...rest: NewYearStrategy[]): NewYearStrategy {
  return normalize([first, ...rest].flatMap((strategy) => strategy.periods))
}

/**
 * Rule in force for a displayed year. Russia kept the September new year for the
 * Byzantine year 7208, which straddles the switch in AD 1700.
 */
export function newYearRuleFor(strategy: NewYearStrategy, era: HistoricEra, yearOfEra: number, byzantine = false): NewYearRule {
  const ad = prolepticYear(era, yearOfEra)
  let previous = -Infinity
  let previousRule: NewYearRule | null = null
  for (const period of strategy.periods) {
    if (ad >= previous && ad < period.until) return period.rule
    previous = period.until
    previousRule = period.rule
  }
  if (ad === previous && byzantine && previousRule === 'BEGIN_OF_SEPTEMBER') return previousRule
  return 'BEGIN_OF_JANUARY'
}

export function strategyNewYear(
  strategy: NewYearStrategy,
  era: HistoricEra,
  yearOfEra: number,
  byzantine = false
): HistoricFields {
  return newYearOf(newYearRuleFor(strategy, era, yearOfEra, byzantine), era, yearOfEra)
}

/**
 * Year as written at the time, for a date whose year starts on January 1.
 * `byzantine` is set when the year is shown in the Byzantine era.
 */
export function displayedYear(strategy: NewYearStrategy, date: HistoricFields, byzantine = false): number {
  const rule = newYearRuleFor(strategy, date.era, date.yearOfEra, byzantine)
  return displayedYearUnder(rule, strategy, date, byzantine)
}

export function formatNewYearStrategy(strategy: NewYearStrategy): string {
  if (strategy.periods.length === 0) return '[BEGIN_OF_JANUARY]'
  return `[${strategy.periods.map((p) => `${p.rule}->${p.until}`).join(',')}]`
}
