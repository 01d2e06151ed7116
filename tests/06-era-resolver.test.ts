/**
 * Segment 06: Era Resolution Tests
 *
 * Ordered era lookup, neighbour navigation and leniency when a named era disagrees.
 */

import { describe, it, expect } from 'vitest'
import type { Era } from '../src/era-resolver'
import { createEraResolver } from '../src/era-resolver'
import { EraMismatchError, ResourceFormatError } from '../src/errors'

// three eras over a "calendar" whose related year is epoch-day / 100
const ERAS: Era[] = [
  { id: 'first', start: 0, firstYear: 0 },
  { id: 'second', start: 250, firstYear: 2 },
  { id: 'third', start: 1000, firstYear: 10 },
]

const resolver = createEraResolver(ERAS, (epochDay) => Math.floor(epochDay / 100))

function era(id: string): Era {
  const found = resolver.findById(id)
  if (found === null) throw new Error(`missing era ${id}`)
  return found
}

describe('Era lookup', () => {
  it('finds eras by id', () => {
    expect(era('second').start).toBe(250)
    expect(resolver.findById('fourth')).toBeNull()
  })

  it('finds the era in force on a day', () => {
    expect(resolver.findByEpochDay(-1)).toBeNull()
    expect(resolver.findByEpochDay(0)?.id).toBe('first')
    expect(resolver.findByEpochDay(249)?.id).toBe('first')
    expect(resolver.findByEpochDay(250)?.id).toBe('second')
    expect(resolver.findByEpochDay(5000)?.id).toBe('third')
  })

  it('navigates to neighbours', () => {
    expect(resolver.findNext(era('first'))?.id).toBe('second')
    expect(resolver.findNext(era('third'))).toBeNull()
    expect(resolver.findPrevious(era('second'))?.id).toBe('first')
    expect(resolver.findPrevious(era('first'))).toBeNull()
  })

  it('bounds the year range by the next era', () => {
    // the day before 'second' falls in year 2, which is year 3 of 'first'
    expect(resolver.maxYearOfEra(era('first'))).toBe(3)
    expect(resolver.maxYearOfEra(era('second'))).toBe(8)
    expect(resolver.maxYearOfEra(era('third'))).toBeNull()
  })

  it('closes the last era at its end', () => {
    const closed = createEraResolver([...ERAS.slice(0, 2), { id: 'third', start: 1000, firstYear: 10, end: 1500 }], (epochDay) =>
      Math.floor(epochDay / 100)
    )
    expect(closed.findByEpochDay(1499)?.id).toBe('third')
    expect(closed.findByEpochDay(1500)).toBeNull()
    const third = closed.findById('third')
    if (third) expect(closed.maxYearOfEra(third)).toBe(5)
  })

  it('refuses eras out of order', () => {
    expect(() =>
      createEraResolver([{ id: 'a', start: 10, firstYear: 1 }, { id: 'b', start: 10, firstYear: 2 }], () => 0)
    ).toThrow(ResourceFormatError)
  })
})

describe('Leniency', () => {
  it('accepts the matching era at every leniency', () => {
    for (const leniency of ['strict', 'smart', 'lax'] as const) {
      const result = resolver.resolve(era('second'), 300, leniency)
      expect(result.ok && result.value.id).toBe('second')
    }
  })

  it('strict fails on a mismatch', () => {
    const result = resolver.resolve(era('first'), 300, 'strict')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(EraMismatchError)
      expect(result.error.requested).toBe('first')
      expect(result.error.resolved).toBe('second')
    }
  })

  it('smart substitutes the computed era', () => {
    const result = resolver.resolve(era('first'), 300, 'smart')
    expect(result.ok && result.value.id).toBe('second')
  })

  it('lax keeps the requested era', () => {
    const result = resolver.resolve(era('first'), 300, 'lax')
    expect(result.ok && result.value.id).toBe('first')
  })

  it('keeps the requested era before the first era', () => {
    const result = resolver.resolve(era('first'), -5, 'strict')
    expect(result.ok && result.value.id).toBe('first')
  })
})
