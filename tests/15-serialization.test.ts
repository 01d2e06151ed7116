/**
 * Segment 15: Serialization Tests
 *
 * Plain-object and compact string forms of dates of every family.
 */

import { describe, it, expect } from 'vitest'
import type { CalendarDate } from '../src/calendar-system'
import { eastAsianMonth } from '../src/calendar-system'
import { InvalidDateError, OutOfRangeError, ParseError, UnsupportedVariantError } from '../src/errors'
import { unwrap } from '../src/result'
import { decodeDate, encodeDate, formatDate, parseDate } from '../src/serialization'
import { createCalendarRegistry } from '../src/variant-registry'

const registry = createCalendarRegistry()

const SAMPLES: readonly [CalendarDate, string][] = [
  [{ calendar: 'coptic', year: 1741, month: 1, day: 1 }, '1||1741|1|1'],
  [{ calendar: 'indian', year: 1946, month: 10, day: 4 }, '2||1946|10|4'],
  [{ calendar: 'hijri', variant: 'islamic-civil:+1', year: 1445, month: 9, day: 1 }, '3|islamic-civil:+1|1445|9|1'],
  [{ calendar: 'chinese', cycle: 78, yearOfCycle: 37, month: eastAsianMonth(4, true), day: 1 }, '4||78:37|4L|1'],
  [{ calendar: 'japanese', nengo: 'reiwa', yearOfNengo: 1, month: eastAsianMonth(5), day: 1 }, '5||reiwa:1|5|1'],
  [{ calendar: 'historic', variant: 'historic-gb', era: 'AD', yearOfEra: 1751, month: 3, day: 24 }, '6|historic-gb|AD:1751|3|24'],
]

function expectError(result: { ok: boolean; error?: unknown }, type: new (...args: never[]) => Error): void {
  expect(result.ok).toBe(false)
  expect(result.error).toBeInstanceOf(type)
}

// ============================================================================
// 1. ENCODING
// ============================================================================

describe('encodeDate', () => {
  it('keeps the minimal fields', () => {
    expect(encodeDate({ calendar: 'coptic', year: 1741, month: 1, day: 1 })).toEqual({ t: 1, y: 1741, m: 1, d: 1 })
  })

  it('flags leap months', () => {
    const chinese = SAMPLES[3]?.[0]
    if (!chinese) throw new Error('missing sample')
    expect(encodeDate(chinese)).toEqual({ t: 4, e: 78, y: 37, m: 4, l: true, d: 1 })
  })

  it('carries the variant and era of historic dates', () => {
    const historic = SAMPLES[5]?.[0]
    if (!historic) throw new Error('missing sample')
    expect(encodeDate(historic)).toEqual({ t: 6, v: 'historic-gb', e: 'AD', y: 1751, m: 3, d: 24 })
  })
})

// ============================================================================
// 2. ROUND TRIPS
// ============================================================================

describe('Round trips', () => {
  it.each(SAMPLES)('formats and parses %o', (date, text) => {
    expect(formatDate(date)).toBe(text)
    expect(unwrap(parseDate(text, registry))).toEqual(date)
    expect(unwrap(decodeDate(JSON.parse(JSON.stringify(encodeDate(date))), registry))).toEqual(date)
  })

  it('keeps a nengo as written', () => {
    expect(unwrap(parseDate('5||heisei:31|5|1', registry))).toEqual({
      calendar: 'japanese',
      nengo: 'heisei',
      yearOfNengo: 31,
      month: eastAsianMonth(5),
      day: 1,
    })
  })

  it('reads years BC', () => {
    expect(unwrap(parseDate('6|historic-proleptic-julian|BC:44|3|15', registry))).toEqual({
      calendar: 'historic',
      variant: 'historic-proleptic-julian',
      era: 'BC',
      yearOfEra: 44,
      month: 3,
      day: 15,
    })
  })
})

// ============================================================================
// 3. MALFORMED INPUT
// ============================================================================

describe('Decoding failures', () => {
  it('rejects malformed strings', () => {
    expectError(parseDate('1|1741|1|1', registry), ParseError)
    expectError(parseDate('1||1741|x|1', registry), ParseError)
    expectError(parseDate('', registry), ParseError)
  })

  it('rejects bad field types', () => {
    expectError(decodeDate(null, registry), ParseError)
    expectError(decodeDate([1, 1741, 1, 1], registry), ParseError)
    expectError(decodeDate({ t: 1, y: '1741', m: 1, d: 1 }, registry), ParseError)
    expectError(decodeDate({ t: 4, e: 78, y: 37, m: 4, l: 'yes', d: 1 }, registry), ParseError)
    expectError(decodeDate({ t: 6, v: 'historic-gb', e: 'CE', y: 1751, m: 3, d: 24 }, registry), ParseError)
  })

  it('rejects unknown type tags', () => {
    const result = decodeDate({ t: 9, y: 1, m: 1, d: 1 }, registry)
    expectError(result, ParseError)
    if (!result.ok) expect(result.error.message).toBe('Unknown calendar type tag: 9')
  })

  it('validates the date itself', () => {
    expectError(parseDate('1||1740|13|6', registry), InvalidDateError)
    expectError(parseDate('6|historic-first-gregorian-reform|AD:1582|10|10', registry), InvalidDateError)
    expectError(parseDate('4||72:21|1|1', registry), OutOfRangeError)
  })

  it('reports unknown variants', () => {
    expectError(parseDate('3|islamic-zz|1445|1|1', registry), UnsupportedVariantError)
    expectError(parseDate('6|historic-zz|AD:1700|1|1', registry), UnsupportedVariantError)
  })
})
