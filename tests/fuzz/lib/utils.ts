/**
 * Shared utility functions for the calendar property tests.
 */
import type { CalendarDate } from '../../../src/calendar-system'
import type { JapaneseSystem } from '../../../src/japanese'
import { prolepticYear } from '../../../src/new-year'

// ============================================================================
// Calendar Order
// ============================================================================

/**
 * Sort key of a date inside its own calendar: year, month position, day.
 * A leap month sorts after the regular month of the same number.
 */
export function orderKey(date: CalendarDate, japanese?: JapaneseSystem): number[] {
  switch (date.calendar) {
    case 'coptic':
    case 'indian':
    case 'hijri':
      return [date.year, date.month, date.day]
    case 'chinese':
      return [date.cycle, date.yearOfCycle, date.month.number, date.month.leap ? 1 : 0, date.day]
    case 'japanese':
      if (!japanese) throw new Error('Japanese dates need the system to be ordered')
      return [japanese.relatedYear(date), japanese.monthAsOrdinal(date), date.day]
    case 'historic':
      return [prolepticYear(date.era, date.yearOfEra), date.month, date.day]
  }
}

/**
 * Lexicographic comparison of two keys of equal length.
 */
export function compareKeys(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0)
    if (diff !== 0) return diff
  }
  return a.length - b.length
}

/**
 * Short text form of a date for violation messages.
 */
export function describeDate(date: CalendarDate): string {
  return JSON.stringify(date)
}
