/**
 * Field Rules
 *
 * A FieldRule reads and writes one field of one calendar type: value, context-dependent
 * minimum and maximum, validity, and a setter that returns a new date. Formatting and
 * parsing layers work against this contract only, so any field of any calendar can be
 * handled the same way.
 *
 * `createStandardRules` builds the year, month, day-of-month, day-of-year and
 * day-of-week rules for a calendar from a small CalendarAccess description.
 */

import type { CalendarSystem } from './calendar-system'
import type { EpochDay } from './epoch-day'
import { isoDayOfWeek } from './epoch-day'
import type { Result } from './result'
import { Ok, Err } from './result'
import { CalendarError, InvalidDateError, OutOfRangeError } from './errors'

// ============================================================================
// Contracts
// ============================================================================

export interface FieldRule<D, V> {
  readonly name: string
  get(date: D): V
  getMin(date: D): V
  getMax(date: D): V
  isValid(date: D, value: V): boolean
  /**
   * Strict mode rejects values outside [min, max]; lenient mode rolls them over into
   * the adjacent unit where the field allows it.
   */
  withValue(date: D, value: V, lenient?: boolean): Result<D, CalendarError>
  /** Finer field to default when only this field is given, or null for the finest. */
  childAtFloor(date: D): FieldRule<D, unknown> | null
  childAtCeiling(date: D): FieldRule<D, unknown> | null
}

/** Numeric fields expose plain-number accessors next to the generic ones. */
export interface IntFieldRule<D> extends FieldRule<D, number> {
  getInt(date: D): number
  isValidInt(date: D, value: number): boolean
  withInt(date: D, value: number, lenient?: boolean): Result<D, CalendarError>
}

/**
 * What the standard rules need to know about a calendar. Month values are ordinals
 * (1 = first month of the year, counting any leap month in place).
 */
export interface CalendarAccess<D> {
  readonly system: CalendarSystem<D>
  readonly minYear: number
  readonly maxYear: number
  yearOf(date: D): number
  /** Keeps the month (or its nearest equivalent) and clamps the day. */
  withYear(date: D, year: number): D
  monthOf(date: D): number
  monthsInYear(date: D): number
  /** Clamps the day to the new month's length. */
  withMonth(date: D, month: number): D
  dayOf(date: D): number
  /** No validation; the caller checks the result. */
  withDay(date: D, day: number): D
}

export interface StandardRules<D> {
  readonly year: IntFieldRule<D>
  readonly month: IntFieldRule<D>
  readonly dayOfMonth: IntFieldRule<D>
  readonly dayOfYear: IntFieldRule<D>
  readonly dayOfWeek: IntFieldRule<D>
}

// ============================================================================
// Building Blocks
// ============================================================================

export interface IntRuleSpec<D> {
  name: string
  get(date: D): number
  min(date: D): number
  max(date: D): number
  /** Called only with values inside [min, max]; may still throw a CalendarError. */
  set(date: D, value: number): D
  /** Lenient setter for values outside [min, max]; omitted when the field cannot roll over. */
  roll?(date: D, value: number): D
  childAtFloor?(date: D): FieldRule<D, unknown> | null
  childAtCeiling?(date: D): FieldRule<D, unknown> | null
}

function attempt<D>(fn: () => D): Result<D, CalendarError> {
  try {
    return Ok(fn())
  } catch (e) {
    if (e instanceof CalendarError) return Err(e)
    throw e
  }
}

export function createIntRule<D>(spec: IntRuleSpec<D>): IntFieldRule<D> {
  const isValidInt = (date: D, value: number): boolean =>
    Number.isInteger(value) && value >= spec.min(date) && value <= spec.max(date)

  const withInt = (date: D, value: number, lenient = false): Result<D, CalendarError> => {
    if (!Number.isInteger(value)) {
      return Err(new InvalidDateError(`${spec.name} must be an integer: ${value}`))
    }
    if (isValidInt(date, value)) return attempt(() => spec.set(date, value))
    const roll = spec.roll
    if (lenient && roll) return attempt(() => roll(date, value))
    return Err(new InvalidDateError(
      `${spec.name} out of range: ${value} not in [${spec.min(date)}, ${spec.max(date)}]`
    ))
  }

  return {
    name: spec.name,
    get: spec.get,
    getInt: spec.get,
    getMin: spec.min,
    getMax: spec.max,
    isValid: isValidInt,
    isValidInt,
    withValue: withInt,
    withInt,
    childAtFloor: (date) => spec.childAtFloor?.(date) ?? null,
    childAtCeiling: (date) => spec.childAtCeiling?.(date) ?? null,
  }
}

/**
 * Sets every finer field to its minimum, e.g. year → first day of its first month.
 */
export function atFloor<D>(rule: FieldRule<D, unknown>, date: D): Result<D, CalendarError> {
  let current = date
  let child = rule.childAtFloor(current)
  while (child) {
    const result = child.withValue(current, child.getMin(current))
    if (!result.ok) return result
    current = result.value
    child = child.childAtFloor(current)
  }
  return Ok(current)
}

/**
 * Sets every finer field to its maximum, e.g. year → last day of its last month.
 */
export function atCeiling<D>(rule: FieldRule<D, unknown>, date: D): Result<D, CalendarError> {
  let current = date
  let child = rule.childAtCeiling(current)
  while (child) {
    const result = child.withValue(current, child.getMax(current))
    if (!result.ok) return result
    current = result.value
    child = child.childAtCeiling(current)
  }
  return Ok(current)
}

// ============================================================================
// Epoch Helpers
// ============================================================================

/** Moves a date by whole days, failing outside the system's range. */
export function shiftDays<D>(system: CalendarSystem<D>, date: D, days: number): D {
  const target: EpochDay = system.toEpochDay(date) + days
  if (target < system.getMinimumEpochDay() || target > system.getMaximumEpochDay()) {
    throw new OutOfRangeError(`Result out of range for ${system.variant}: epoch-day ${target}`)
  }
  return system.fromEpochDay(target)
}

function checked<D>(system: CalendarSystem<D>, date: D): D {
  if (!system.isValid(date)) {
    throw new InvalidDateError(`Invalid ${system.variant} date: ${JSON.stringify(date)}`)
  }
  const epochDay = system.toEpochDay(date)
  if (epochDay < system.getMinimumEpochDay() || epochDay > system.getMaximumEpochDay()) {
    throw new OutOfRangeError(`Date out of range for ${system.variant}: ${JSON.stringify(date)}`)
  }
  return date
}

// ============================================================================
// Standard Rules
// ============================================================================

export function createStandardRules<D>(access: CalendarAccess<D>): StandardRules<D> {
  const system = access.system

  const startOfYear = (date: D): EpochDay =>
    system.toEpochDay(access.withDay(access.withMonth(date, 1), 1))

  const dayOfMonth: IntFieldRule<D> = createIntRule<D>({
    name: 'DAY_OF_MONTH',
    get: (date) => access.dayOf(date),
    min: () => 1,
    max: (date) => system.lengthOfMonth(date),
    set: (date, value) => checked(system, access.withDay(date, value)),
    roll: (date, value) => shiftDays(system, date, value - access.dayOf(date)),
  })

  const month: IntFieldRule<D> = createIntRule<D>({
    name: 'MONTH',
    get: (date) => access.monthOf(date),
    min: () => 1,
    max: (date) => access.monthsInYear(date),
    set: (date, value) => checked(system, access.withMonth(date, value)),
    roll: (date, value) => {
      let current = access.withMonth(date, 1)
      let index = value
      while (index > access.monthsInYear(current)) {
        index -= access.monthsInYear(current)
        current = nextYear(current, 1)
      }
      while (index < 1) {
        current = nextYear(current, -1)
        index += access.monthsInYear(current)
      }
      const target = access.withMonth(current, index)
      return checked(system, access.withDay(target, Math.min(access.dayOf(date), system.lengthOfMonth(target))))
    },
    childAtFloor: () => dayOfMonth,
    childAtCeiling: () => dayOfMonth,
  })

  function nextYear(date: D, delta: number): D {
    const year = access.yearOf(date) + delta
    if (year < access.minYear || year > access.maxYear) {
      throw new OutOfRangeError(`Year out of range: ${year}`)
    }
    return access.withYear(date, year)
  }

  const year: IntFieldRule<D> = createIntRule<D>({
    name: 'YEAR',
    get: (date) => access.yearOf(date),
    min: () => access.minYear,
    max: () => access.maxYear,
    set: (date, value) => checked(system, access.withYear(date, value)),
    childAtFloor: () => month,
    childAtCeiling: () => month,
  })

  const dayOfYear: IntFieldRule<D> = createIntRule<D>({
    name: 'DAY_OF_YEAR',
    get: (date) => system.toEpochDay(date) - startOfYear(date) + 1,
    min: () => 1,
    max: (date) => system.lengthOfYear(date),
    set: (date, value) => shiftDays(system, date, startOfYear(date) + value - 1 - system.toEpochDay(date)),
    roll: (date, value) => shiftDays(system, date, startOfYear(date) + value - 1 - system.toEpochDay(date)),
  })

  const dayOfWeek: IntFieldRule<D> = createIntRule<D>({
    name: 'DAY_OF_WEEK',
    get: (date) => isoDayOfWeek(system.toEpochDay(date)),
    min: () => 1,
    max: () => 7,
    set: (date, value) => shiftDays(system, date, value - isoDayOfWeek(system.toEpochDay(date))),
    roll: (date, value) => shiftDays(system, date, value - isoDayOfWeek(system.toEpochDay(date))),
  })

  return { year, month, dayOfMonth, dayOfYear, dayOfWeek }
}
