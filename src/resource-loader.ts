/**
 * Resource Sources
 *
 * Table-driven calendars read their month-length resources through a chain of sources.
 * A source returns the resource text, or null when it has nothing for that variant.
 * Loading happens once, when the registry first builds the calendar.
 */

import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { EpochDay } from './epoch-day'
import { formatIsoDate } from './epoch-day'
import { ResourceFormatError } from './errors'
import { createHijriAlgorithm } from './hijri-algorithm'
import { UMALQURA } from './hijri-table'

export interface ResourceSource {
  readonly name: string
  load(variant: string): string | null
}

/** Directory of the resources shipped with the package. */
export const DEFAULT_DATA_DIRECTORY: string = fileURLToPath(new URL('./data/', import.meta.url))

// ============================================================================
// Files
// ============================================================================

const VARIANT_FILE_NAME = /^[a-z0-9-]+$/

/**
 * Reads `<directory>/<variant>.data`. Variants outside `[a-z0-9-]` never name a file.
 */
export function fileSource(directory: string = DEFAULT_DATA_DIRECTORY): ResourceSource {
  return {
    name: `file:${directory}`,
    load(variant) {
      if (!VARIANT_FILE_NAME.test(variant)) return null
      const path = join(directory, `${variant}.data`)
      if (!existsSync(path)) return null
      return readFileSync(path, 'utf8')
    },
  }
}

/** In-memory resources, keyed by variant. */
export function textSource(resources: Readonly<Record<string, string>>): ResourceSource {
  return {
    name: 'text',
    load: (variant) => resources[variant] ?? null,
  }
}

// ============================================================================
// Intl
// ============================================================================

export interface IntlSourceOptions {
  readonly minYear?: number
  readonly maxYear?: number
}

const MS_PER_DAY = 86_400_000

/**
 * Builds the Umm al-Qura resource from the platform's ICU calendar data.
 * ICU publishes that table for the years 1300..1600 AH.
 */
export function intlUmalquraSource(options: IntlSourceOptions = {}): ResourceSource {
  const minYear = options.minYear ?? 1300
  const maxYear = options.maxYear ?? 1600

  return {
    name: 'intl',
    load(variant) {
      if (variant !== UMALQURA) return null
      return buildUmalquraResource(minYear, maxYear)
    },
  }
}

interface HijriParts {
  readonly year: number
  readonly month: number
  readonly day: number
}

function createPartsReader(): (epochDay: EpochDay) => HijriParts {
  const format = new Intl.DateTimeFormat(`en-u-ca-${UMALQURA}-nu-latn`, {
    timeZone: 'UTC',
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
  })
  return (epochDay) => {
    let year = NaN
    let month = NaN
    let day = NaN
    for (const part of format.formatToParts(new Date(epochDay * MS_PER_DAY))) {
      const value = parseInt(part.value.replace(/\D/g, ''), 10)
      if (part.type === 'year') year = value
      else if (part.type === 'month') month = value
      else if (part.type === 'day') day = value
    }
    if (Number.isNaN(year) || Number.isNaN(month) || Number.isNaN(day)) {
      throw new ResourceFormatError(`Platform Intl has no ${UMALQURA} calendar`)
    }
    return { year, month, day }
  }
}

function buildUmalquraResource(minYear: number, maxYear: number): string {
  const read = createPartsReader()

  // the tabular civil calendar stays within a few days of Umm al-Qura
  const civil = createHijriAlgorithm('islamic-civil')
  let guess = civil.toEpochDay({ calendar: 'hijri', variant: civil.variant, year: minYear, month: 1, day: 1 })
  let start: EpochDay | null = null
  for (let i = 0; i < 10 && start === null; i++, guess++) {
    const parts = read(guess)
    if (parts.year === minYear && parts.month === 1) start = guess - (parts.day - 1)
  }
  if (start === null) {
    throw new ResourceFormatError(`Cannot locate ${UMALQURA} year ${minYear} in platform Intl data`)
  }

  const lines = [
    `type=${UMALQURA}`,
    `version=intl-icu-${process.versions.icu ?? 'unknown'}`,
    `iso-start=${formatIsoDate(start)}`,
    `min=${minYear}`,
    `max=${maxYear}`,
  ]

  let monthStart = start
  for (let year = minYear; year <= maxYear; year++) {
    const lengths: number[] = []
    for (let month = 1; month <= 12; month++) {
      const length = read(monthStart + 29).day === 1 ? 29 : 30
      const next = read(monthStart + length)
      if (next.day !== 1) {
        throw new ResourceFormatError(`Irregular ${UMALQURA} month ${year}-${month} in platform Intl data`)
      }
      lengths.push(length)
      monthStart += length
    }
    lines.push(`${year}=${lengths.join(' ')}`)
  }
  return lines.join('\n')
}
