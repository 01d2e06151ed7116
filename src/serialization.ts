/**
 * Date Serialization
 *
 * Stable external form of a calendar date: a numeric type tag plus the minimal fields
 * that identify the date. The plain-object form suits JSON; the compact string form
 * `t|v|y|m[L]|d` suits keys and logs, with the era written before the year as `e:y`.
 * Decoding validates every field and rebuilds the date through the registry.
 */

import type { CalendarDate, EastAsianMonth, HistoricEra } from './calendar-system'
import { eastAsianMonth } from './calendar-system'
import { chineseDate } from './chinese'
import { copticDate } from './coptic'
import { CalendarError, ParseError } from './errors'
import { hijriDate } from './hijri'
import { historicDate } from './historic'
import { indianDate } from './indian'
import { japaneseDate } from './japanese'
import type { Result } from './result'
import { Err } from './result'
import type { CalendarRegistry } from './variant-registry'
import { getDefaultRegistry } from './variant-registry'

// ============================================================================
// Types
// ============================================================================

export const TYPE_TAGS = {
  coptic: 1,
  indian: 2,
  hijri: 3,
  chinese: 4,
  japanese: 5,
  historic: 6,
} as const

export type TypeTag = (typeof TYPE_TAGS)[keyof typeof TYPE_TAGS]

export interface EncodedDate {
  readonly t: TypeTag
  /** variant string of Hijri and historic dates */
  readonly v?: string
  /** cycle, nengo id or historic era */
  readonly e?: number | string
  readonly y: number
  readonly m: number
  /** set on leap months */
  readonly l?: true
  readonly d: number
}

// ============================================================================
// Encoding
// ============================================================================

function monthFields(month: EastAsianMonth): { m: number; l?: true } {
  return month.leap ? { m: month.number, l: true } : { m: month.number }
}

export function encodeDate(date: CalendarDate): EncodedDate {
  switch (date.calendar) {
    case 'coptic':
    case 'indian':
      return { t: TYPE_TAGS[date.calendar], y: date.year, m: date.month, d: date.day }
    case 'hijri':
      return { t: TYPE_TAGS.hijri, v: date.variant, y: date.year, m: date.month, d: date.day }
    case 'chinese':
      return { t: TYPE_TAGS.chinese, e: date.cycle, y: date.yearOfCycle, ...monthFields(date.month), d: date.day }
    case 'japanese':
      return { t: TYPE_TAGS.japanese, e: date.nengo, y: date.yearOfNengo, ...monthFields(date.month), d: date.day }
    case 'historic':
      return { t: TYPE_TAGS.historic, v: date.variant, e: date.era, y: date.yearOfEra, m: date.month, d: date.day }
  }
}

export function formatDate(date: CalendarDate): string {
  const encoded = encodeDate(date)
  const year = encoded.e === undefined ? `${encoded.y}` : `${encoded.e}:${encoded.y}`
  return [encoded.t, encoded.v ?? '', year, `${encoded.m}${encoded.l ? 'L' : ''}`, encoded.d].join('|')
}

// ============================================================================
// Decoding
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function integer(record: Record<string, unknown>, key: string): number {
  const value = record[key]
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ParseError(`Field '${key}' must be an integer: ${JSON.stringify(value)}`)
  }
  return value
}

function text(record: Record<string, unknown>, key: string): string {
  const value = record[key]
  if (typeof value !== 'string' || value === '') {
    throw new ParseError(`Field '${key}' must be a non-empty string: ${JSON.stringify(value)}`)
  }
  return value
}

function historicEra(value: string): HistoricEra {
  if (value === 'BC' || value === 'AD') return value
  throw new ParseError(`Unknown historic era: '${value}'`)
}

function leapFlag(record: Record<string, unknown>): boolean {
  const value = record['l']
  if (value === undefined || value === false) return false
  if (value === true) return true
  throw new ParseError(`Field 'l' must be a boolean: ${JSON.stringify(value)}`)
}

function rebuild(record: Record<string, unknown>, registry: CalendarRegistry): Result<CalendarDate, CalendarError> {
  const t = integer(record, 't')
  const y = integer(record, 'y')
  const m = integer(record, 'm')
  const d = integer(record, 'd')
  switch (t) {
    case TYPE_TAGS.coptic:
      return copticDate(y, m, d)
    case TYPE_TAGS.indian:
      return indianDate(y, m, d)
    case TYPE_TAGS.hijri:
      return hijriDate(registry.hijri(text(record, 'v')), y, m, d)
    case TYPE_TAGS.chinese:
      return chineseDate(integer(record, 'e'), y, eastAsianMonth(m, leapFlag(record)), d)
    case TYPE_TAGS.japanese:
      // stored dates keep their nengo as written
      return japaneseDate(registry.japanese(), text(record, 'e'), y, eastAsianMonth(m, leapFlag(record)), d, 'lax')
    case TYPE_TAGS.historic:
      return historicDate(registry.historic(text(record, 'v')), historicEra(text(record, 'e')), y, m, d)
    default:
      throw new ParseError(`Unknown calendar type tag: ${t}`)
  }
}

/**
 * Rebuilds a date from its plain-object form.
 */
export function decodeDate(value: unknown, registry: CalendarRegistry = getDefaultRegistry()): Result<CalendarDate, CalendarError> {
  if (!isRecord(value)) return Err(new ParseError(`Encoded date must be an object: ${JSON.stringify(value)}`))
  try {
    return rebuild(value, registry)
  } catch (e) {
    if (e instanceof CalendarError) return Err(e)
    throw e
  }
}

/**
 * Rebuilds a date from its compact string form.
 */
export function parseDate(str: string, registry: CalendarRegistry = getDefaultRegistry()): Result<CalendarDate, CalendarError> {
  const parts = str.split('|')
  const match = /^(?:([^:]+):)?(-?\d+)$/.exec(parts[2] ?? '')
  const month = /^(\d+)(L?)$/.exec(parts[3] ?? '')
  if (parts.length !== 5 || !match || !month || !/^\d+$/.test(parts[0] ?? '') || !/^-?\d+$/.test(parts[4] ?? '')) {
    return Err(new ParseError(`Malformed serialized date: '${str}'`))
  }

  const record: Record<string, unknown> = {
    t: Number(parts[0]),
    y: Number(match[2]),
    m: Number(month[1]),
    d: Number(parts[4]),
  }
  if (parts[1]) record['v'] = parts[1]
  const era = match[1]
  if (era !== undefined) record['e'] = /^-?\d+$/.test(era) ? Number(era) : era
  if (month[2] === 'L') record['l'] = true
  return decodeDate(record, registry)
}
