/**
 * Hijri Calendar: shared contract
 *
 * Both the algorithmic (30-year cycle) and the table-driven (astronomical) variants
 * implement HijriSystem, so construction and field rules are written once.
 */

import type { CalendarSystem, HijriDate } from './calendar-system'
import type { Result } from './result'
import { Ok, Err } from './result'
import { InvalidDateError, UnsupportedVariantError, OutOfRangeError } from './errors'
import type { CalendarAccess, StandardRules } from './field-rule'
import { createStandardRules } from './field-rule'

export interface HijriSystem extends CalendarSystem<HijriDate> {
  readonly minYear: number
  readonly maxYear: number
  lengthOfMonthIn(year: number, month: number): number
  lengthOfYearIn(year: number): number
}

// ============================================================================
// Variant Strings
// ============================================================================

export interface HijriVariant {
  readonly base: string
  readonly adjustment: number
}

export const MAX_ADJUSTMENT = 3

/**
 * Splits `<base>` or `<base>:<signed adjustment>`. Adjustments outside −3..+3 fail.
 */
export function parseHijriVariant(variant: string): HijriVariant {
  const colon = variant.indexOf(':')
  if (colon === -1) return { base: variant, adjustment: 0 }

  const base = variant.slice(0, colon)
  const text = variant.slice(colon + 1)
  if (!/^[+-]?\d+$/.test(text)) {
    throw new UnsupportedVariantError(variant, `Malformed day adjustment in variant: '${variant}'`)
  }
  const adjustment = parseInt(text, 10)
  if (Math.abs(adjustment) > MAX_ADJUSTMENT) {
    throw new OutOfRangeError(`Day adjustment out of range [-3, +3]: ${adjustment}`)
  }
  return { base, adjustment }
}

export function formatHijriVariant(base: string, adjustment: number): string {
  if (adjustment === 0) return base
  return adjustment > 0 ? `${base}:+${adjustment}` : `${base}:${adjustment}`
}

// ============================================================================
// Construction
// ============================================================================

export function hijriDate(
  system: HijriSystem,
  year: number,
  month: number,
  day: number
): Result<HijriDate, InvalidDateError | OutOfRangeError> {
  const date: HijriDate = { calendar: 'hijri', variant: system.variant, year, month, day }
  if (year < system.minYear || year > system.maxYear) {
    return Err(new OutOfRangeError(`Hijri year out of range for ${system.variant}: ${year} not in [${system.minYear}, ${system.maxYear}]`))
  }
  if (!system.isValid(date)) {
    return Err(new InvalidDateError(`Invalid Hijri date (${system.variant}): ${year}-${month}-${day}`))
  }
  return Ok(date)
}

export function isValidHijriFields(system: HijriSystem, date: HijriDate): boolean {
  return (
    date.variant === system.variant &&
    Number.isInteger(date.year) && Number.isInteger(date.month) && Number.isInteger(date.day) &&
    date.year >= system.minYear && date.year <= system.maxYear &&
    date.month >= 1 && date.month <= 12 &&
    date.day >= 1 && date.day <= system.lengthOfMonthIn(date.year, date.month)
  )
}

// ============================================================================
// Field Rules
// ============================================================================

export function createHijriRules(system: HijriSystem): StandardRules<HijriDate> {
  const clampTo = (date: HijriDate, year: number, month: number): HijriDate => ({
    ...date,
    year,
    month,
    day: Math.min(date.day, system.lengthOfMonthIn(year, month)),
  })

  const access: CalendarAccess<HijriDate> = {
    system,
    minYear: system.minYear,
    maxYear: system.maxYear,
    yearOf: (date) => date.year,
    withYear: (date, year) => clampTo(date, year, date.month),
    monthOf: (date) => date.month,
    monthsInYear: () => 12,
    withMonth: (date, month) => clampTo(date, date.year, month),
    dayOf: (date) => date.day,
    withDay: (date, day) => ({ ...date, day }),
  }
  return createStandardRules(access)
}
