/**
 * Month-Length Tables
 *
 * Parses the key/value resource format used by table-driven calendars and builds the
 * parallel month arrays searched by their conversions.
 *
 *   type = islamic-umalqura
 *   version = 1.0
 *   iso-start = 1882-11-12
 *   min = 1300
 *   max = 1600
 *   1300 = 30 29 30 29 30 29 30 29 30 29 30 29
 *
 * Lunisolar tables may carry a thirteenth entry; the leap month is prefixed with `L`
 * and takes the number of the month before it.
 */

import type { EpochDay } from './epoch-day'
import { parseIsoDate } from './epoch-day'
import type { Result } from './result'
import { Ok, Err } from './result'
import { ResourceFormatError } from './errors'

// ============================================================================
// Types
// ============================================================================

export interface MonthTable {
  readonly type: string
  readonly version: string
  readonly minYear: number
  readonly maxYear: number
  /** first epoch-day of each month, flattened over all years */
  readonly firstOfMonth: readonly EpochDay[]
  readonly lengthOfMonth: readonly number[]
  /** index into the month arrays of each year's first month */
  readonly yearStart: readonly number[]
  /** number of the month a year's leap month follows, 0 for none */
  readonly leapMonth: readonly number[]
  readonly minEpochDay: EpochDay
  readonly maxEpochDay: EpochDay
}

export interface MonthTableOptions {
  /** accept 13-entry rows with one `L`-marked leap month */
  readonly allowLeapMonths?: boolean
}

// ============================================================================
// Key/Value Parsing
// ============================================================================

export function parseProperties(text: string): Map<string, string> {
  const entries = new Map<string, string>()
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim()
    if (line === '' || line.startsWith('#') || line.startsWith('!')) continue
    const separator = line.indexOf('=')
    if (separator === -1) continue
    entries.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim())
  }
  return entries
}

function parseIntStrict(text: string): number | null {
  return /^[+-]?\d+$/.test(text) ? parseInt(text, 10) : null
}

// ============================================================================
// Table Construction
// ============================================================================

/**
 * Builds the month arrays of one resource. Every year in [min, max] must be present.
 */
export function parseMonthTable(
  text: string,
  expectedType: string,
  options: MonthTableOptions = {}
): Result<MonthTable, ResourceFormatError> {
  const props = parseProperties(text)

  const type = props.get('type')
  if (type !== expectedType) {
    return Err(new ResourceFormatError(`Wrong calendar variant: ${type ?? '(missing)'}, expected ${expectedType}`))
  }

  const isoStart = props.get('iso-start')
  if (isoStart === undefined) return Err(new ResourceFormatError(`Missing iso-start in ${expectedType}`))
  const start = parseIsoDate(isoStart)
  if (!start.ok) return Err(new ResourceFormatError(`Invalid iso-start in ${expectedType}: '${isoStart}'`))

  const minYear = parseIntStrict(props.get('min') ?? '')
  const maxYear = parseIntStrict(props.get('max') ?? '')
  if (minYear === null || maxYear === null || maxYear < minYear) {
    return Err(new ResourceFormatError(`Invalid year bounds in ${expectedType}: min=${props.get('min')}, max=${props.get('max')}`))
  }

  const firstOfMonth: EpochDay[] = []
  const lengthOfMonth: number[] = []
  const yearStart: number[] = []
  const leapMonth: number[] = []
  let current = start.value

  for (let year = minYear; year <= maxYear; year++) {
    const row = props.get(String(year))
    if (row === undefined) return Err(new ResourceFormatError(`missing year=${year}`))

    const tokens = row.split(/\s+/)
    const leapIndex = tokens.findIndex((token) => token.startsWith('L'))
    const expected = leapIndex === -1 ? 12 : 13
    if (tokens.length !== expected) return Err(new ResourceFormatError(`incomplete year=${year}`))
    if (leapIndex !== -1) {
      if (!options.allowLeapMonths) {
        return Err(new ResourceFormatError(`leap month not allowed in ${expectedType}, year=${year}`))
      }
      if (leapIndex === 0 || tokens.findIndex((t, i) => i > leapIndex && t.startsWith('L')) !== -1) {
        return Err(new ResourceFormatError(`misplaced leap month in year=${year}`))
      }
    }

    yearStart.push(firstOfMonth.length)
    leapMonth.push(leapIndex === -1 ? 0 : leapIndex)

    for (const token of tokens) {
      const length = parseIntStrict(token.startsWith('L') ? token.slice(1) : token)
      if (length === null || length < 1) {
        return Err(new ResourceFormatError(`Invalid month length '${token}' in year=${year}`))
      }
      firstOfMonth.push(current)
      lengthOfMonth.push(length)
      current += length
    }
  }

  return Ok({
    type: expectedType,
    version: props.get('version') ?? '',
    minYear,
    maxYear,
    firstOfMonth,
    lengthOfMonth,
    yearStart,
    leapMonth,
    minEpochDay: start.value,
    maxEpochDay: current - 1,
  })
}

// ============================================================================
// Lookup
// ============================================================================

/**
 * Largest index whose start is on or before the target, or -1 before the first month.
 */
export function searchMonth(table: MonthTable, epochDay: EpochDay): number {
  const starts = table.firstOfMonth
  let low = 0
  let high = starts.length - 1
  while (low <= high) {
    const mid = (low + high) >>> 1
    if ((starts[mid] ?? 0) <= epochDay) low = mid + 1
    else high = mid - 1
  }
  return low - 1
}

/** Position of the year containing month index `index`. */
export function yearIndexOfMonth(table: MonthTable, index: number): number {
  let low = 0
  let high = table.yearStart.length - 1
  while (low < high) {
    const mid = (low + high + 1) >>> 1
    if ((table.yearStart[mid] ?? 0) <= index) low = mid
    else high = mid - 1
  }
  return low
}

export function monthsInTableYear(table: MonthTable, year: number): number {
  return table.leapMonth[year - table.minYear] === 0 ? 12 : 13
}

export function yearLength(table: MonthTable, year: number): number {
  const y = year - table.minYear
  const from = table.yearStart[y] ?? 0
  const to = table.yearStart[y + 1] ?? table.lengthOfMonth.length
  let sum = 0
  for (let i = from; i < to; i++) sum += table.lengthOfMonth[i] ?? 0
  return sum
}
