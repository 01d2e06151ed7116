/**
 * Segment 05: Month Tables & Resource Sources Tests
 *
 * Parsing the key/value table format and reading resources from files, memory and Intl.
 */

import { describe, it, expect } from 'vitest'
import { fileURLToPath } from 'node:url'
import { ResourceFormatError } from '../src/errors'
import {
  monthsInTableYear,
  parseMonthTable,
  parseProperties,
  searchMonth,
  yearIndexOfMonth,
  yearLength,
} from '../src/month-table'
import { fileSource, intlUmalquraSource, textSource } from '../src/resource-loader'
import { unwrap } from '../src/result'

const FIXTURES = fileURLToPath(new URL('./fixtures/', import.meta.url))

function table(rows: string[], header: Record<string, string> = {}): string {
  const base: Record<string, string> = {
    type: 'islamic-sighting',
    version: '1',
    'iso-start': '2023-07-19',
    min: '1445',
    max: '1446',
    ...header,
  }
  return [...Object.entries(base).map(([k, v]) => `${k}=${v}`), ...rows].join('\n')
}

const ROWS = [
  '1445=29 30 29 30 30 29 30 29 30 29 30 29',
  '1446=30 29 30 29 30 29 30 29 30 29 30 30',
]

// ============================================================================
// 1. KEY/VALUE FORMAT
// ============================================================================

describe('parseProperties', () => {
  it('skips comments and blank lines and trims keys and values', () => {
    const props = parseProperties('# comment\n! also comment\n\n key = value \nno separator\na=b=c')
    expect([...props.entries()]).toEqual([['key', 'value'], ['a', 'b=c']])
  })
})

// ============================================================================
// 2. TABLE PARSING
// ============================================================================

describe('parseMonthTable', () => {
  it('builds flattened month arrays', () => {
    const parsed = unwrap(parseMonthTable(table(ROWS), 'islamic-sighting'))
    expect(parsed.version).toBe('1')
    expect(parsed.firstOfMonth).toHaveLength(24)
    expect(parsed.firstOfMonth[0]).toBe(19557)
    expect(parsed.firstOfMonth[12]).toBe(19911)
    expect(parsed.yearStart).toEqual([0, 12])
    expect(parsed.leapMonth).toEqual([0, 0])
    expect(parsed.minEpochDay).toBe(19557)
    expect(parsed.maxEpochDay).toBe(20265)
  })

  it('rejects a table of another variant', () => {
    const result = parseMonthTable(table(ROWS), 'islamic-umalqura')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ResourceFormatError)
      expect(result.error.message).toBe('Wrong calendar variant: islamic-sighting, expected islamic-umalqura')
    }
  })

  it('reports a missing year', () => {
    const result = parseMonthTable(table(ROWS.slice(0, 1)), 'islamic-sighting')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('missing year=1446')
  })

  it('reports an incomplete year', () => {
    const result = parseMonthTable(table(['1445=29 30 29', ROWS[1] ?? '']), 'islamic-sighting')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('incomplete year=1445')
  })

  it('rejects bad headers', () => {
    expect(parseMonthTable(table(ROWS, { 'iso-start': '2023-13-01' }), 'islamic-sighting').ok).toBe(false)
    expect(parseMonthTable(table(ROWS, { min: '1447' }), 'islamic-sighting').ok).toBe(false)
    expect(parseMonthTable(table(ROWS, { max: 'x' }), 'islamic-sighting').ok).toBe(false)
  })

  it('rejects non-positive month lengths', () => {
    const result = parseMonthTable(table([ROWS[0] ?? '', '1446=30 29 30 29 30 29 30 29 30 29 30 0']), 'islamic-sighting')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe("Invalid month length '0' in year=1446")
  })
})

describe('Leap-month tables', () => {
  const LEAP_ROWS = ['1=30 29 L30 29 30 29 30 29 30 29 30 29 30', '2=29 30 29 30 29 30 29 30 29 30 29 30']
  const text = table(LEAP_ROWS, { type: 'lunisolar', min: '1', max: '2', 'iso-start': '2000-02-05' })

  it('refuses leap months unless allowed', () => {
    const result = parseMonthTable(text, 'lunisolar')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('leap month not allowed in lunisolar, year=1')
  })

  it('records which month the leap month follows', () => {
    const parsed = unwrap(parseMonthTable(text, 'lunisolar', { allowLeapMonths: true }))
    expect(parsed.leapMonth).toEqual([2, 0])
    expect(parsed.yearStart).toEqual([0, 13])
    expect(monthsInTableYear(parsed, 1)).toBe(13)
    expect(monthsInTableYear(parsed, 2)).toBe(12)
    expect(yearLength(parsed, 1)).toBe(384)
    expect(yearLength(parsed, 2)).toBe(354)
  })

  it('refuses a leading or second leap month', () => {
    const leading = table(['1=L30 29 30 29 30 29 30 29 30 29 30 29 30', LEAP_ROWS[1] ?? ''], {
      type: 'lunisolar', min: '1', max: '2',
    })
    expect(parseMonthTable(leading, 'lunisolar', { allowLeapMonths: true }).ok).toBe(false)
  })

  it('finds months and their years', () => {
    const parsed = unwrap(parseMonthTable(text, 'lunisolar', { allowLeapMonths: true }))
    const start = parsed.minEpochDay
    expect(searchMonth(parsed, start - 1)).toBe(-1)
    expect(searchMonth(parsed, start)).toBe(0)
    expect(searchMonth(parsed, start + 59)).toBe(2)
    expect(yearIndexOfMonth(parsed, 12)).toBe(0)
    expect(yearIndexOfMonth(parsed, 13)).toBe(1)
  })
})

// ============================================================================
// 3. SOURCES
// ============================================================================

describe('Resource sources', () => {
  it('fileSource reads <variant>.data from its directory', () => {
    const source = fileSource(FIXTURES)
    const text = source.load('islamic-sighting')
    expect(text).not.toBeNull()
    expect(unwrap(parseMonthTable(text ?? '', 'islamic-sighting')).version).toBe('test-2')
  })

  it('fileSource returns null for absent variants', () => {
    expect(fileSource(FIXTURES).load('islamic-absent')).toBeNull()
  })

  it('fileSource ignores variants that look like paths', () => {
    expect(fileSource(FIXTURES).load('../fixtures/islamic-sighting')).toBeNull()
  })

  it('textSource serves in-memory resources', () => {
    const source = textSource({ 'islamic-sighting': table(ROWS) })
    expect(source.name).toBe('text')
    expect(source.load('islamic-sighting')).toBe(table(ROWS))
    expect(source.load('islamic-umalqura')).toBeNull()
  })

  it('the Intl source only serves Umm al-Qura', () => {
    expect(intlUmalquraSource().load('islamic-sighting')).toBeNull()
  })

  it('the Intl source builds a parseable Umm al-Qura table', () => {
    const text = intlUmalquraSource({ minYear: 1445, maxYear: 1445 }).load('islamic-umalqura')
    const parsed = unwrap(parseMonthTable(text ?? '', 'islamic-umalqura'))
    expect(parsed.minYear).toBe(1445)
    expect(parsed.maxYear).toBe(1445)
    expect(parsed.firstOfMonth).toHaveLength(12)
    expect(parsed.minEpochDay).toBe(19557)
  })
})
