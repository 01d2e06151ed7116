/**
 * Variant Registry
 *
 * Maps variant strings to calendar systems and builds each system once. Table-driven
 * variants load their resources through the configured sources on first request;
 * the registry reports what it builds and loads through synchronous events.
 */

import type {
  AnyCalendarSystem,
  CalendarFamily,
  CalendarSystem,
  CopticDate,
  IndianDate,
} from './calendar-system'
import { COPTIC } from './coptic'
import { INDIAN } from './indian'
import type { ChineseSystem } from './chinese'
import { CHINESE } from './chinese'
import { CalendarError, UnsupportedVariantError } from './errors'
import type { HijriSystem } from './hijri'
import { parseHijriVariant } from './hijri'
import { createHijriAlgorithm, isHijriAlgorithmVariant } from './hijri-algorithm'
import { createHijriTable } from './hijri-table'
import type { HistoricSystem } from './historic'
import { createHistoricCalendar } from './historic'
import { historyOfVariant } from './history'
import type { JapaneseSystem } from './japanese'
import { JAPANESE, createJapaneseCalendar } from './japanese'
import type { MonthTable, MonthTableOptions } from './month-table'
import { parseMonthTable } from './month-table'
import type { ResourceSource } from './resource-loader'
import { DEFAULT_DATA_DIRECTORY, fileSource, intlUmalquraSource } from './resource-loader'

// ============================================================================
// Configuration
// ============================================================================

export interface CalendarLogger {
  debug(message: string): void
  warn(message: string): void
}

export type HijriSourceKind = 'file' | 'intl'

export interface CalendarRegistryConfig {
  /** directory holding `<variant>.data` resources */
  readonly dataDirectory?: string
  /** loaders tried in order for astronomical Hijri tables */
  readonly hijriSources?: readonly HijriSourceKind[]
  /** Hijri years built by the Intl loader */
  readonly intlYears?: { readonly min: number; readonly max: number }
  /** tried before the configured loaders, for every table-driven variant */
  readonly sources?: readonly ResourceSource[]
  readonly logger?: CalendarLogger
}

const NOOP_LOGGER: CalendarLogger = {
  debug: () => {},
  warn: () => {},
}

// ============================================================================
// Events
// ============================================================================

export interface RegistryEvents {
  systemCreated: { readonly variant: string; readonly family: CalendarFamily }
  resourceLoaded: { readonly variant: string; readonly source: string; readonly version: string }
  resourceFailed: { readonly variant: string; readonly source: string; readonly error: CalendarError }
}

export type RegistryEvent = keyof RegistryEvents

type Handlers = { [K in RegistryEvent]: ((payload: RegistryEvents[K]) => void)[] }

/** Built system tagged with its family */
type Entry =
  | { readonly family: 'coptic'; readonly system: CalendarSystem<CopticDate> }
  | { readonly family: 'indian'; readonly system: CalendarSystem<IndianDate> }
  | { readonly family: 'hijri'; readonly system: HijriSystem }
  | { readonly family: 'chinese'; readonly system: ChineseSystem }
  | { readonly family: 'japanese'; readonly system: JapaneseSystem }
  | { readonly family: 'historic'; readonly system: HistoricSystem }

// ============================================================================
// Registry
// ============================================================================

export interface CalendarRegistry {
  /** Throws UnsupportedVariantError, OutOfRangeError or ResourceFormatError. */
  get(variant: string): AnyCalendarSystem
  hijri(variant: string): HijriSystem
  japanese(): JapaneseSystem
  historic(variant: string): HistoricSystem
  /** whether the variant has been built */
  has(variant: string): boolean
  /** built variants in order of construction */
  variants(): string[]
  on<K extends RegistryEvent>(event: K, handler: (payload: RegistryEvents[K]) => void): void
  /** forgets built systems; handlers stay registered */
  clear(): void
}

export function createCalendarRegistry(config: CalendarRegistryConfig = {}): CalendarRegistry {
  const logger = config.logger ?? NOOP_LOGGER
  const dataDirectory = config.dataDirectory ?? DEFAULT_DATA_DIRECTORY
  const cache = new Map<string, Entry>()
  const handlers: Handlers = { systemCreated: [], resourceLoaded: [], resourceFailed: [] }

  function emit<K extends RegistryEvent>(event: K, payload: RegistryEvents[K]): boolean {
    let hadErrors = false
    for (const handler of handlers[event]) {
      try { handler(payload) } catch (e) { hadErrors = true; console.error(`Event handler error on '${event}':`, e) }
    }
    return !hadErrors
  }

  function sourcesFor(family: 'hijri' | 'japanese'): ResourceSource[] {
    const sources = [...(config.sources ?? [])]
    if (family === 'japanese') return [...sources, fileSource(dataDirectory)]
    for (const kind of config.hijriSources ?? ['file', 'intl']) {
      sources.push(
        kind === 'file'
          ? fileSource(dataDirectory)
          : intlUmalquraSource({ minYear: config.intlYears?.min, maxYear: config.intlYears?.max })
      )
    }
    return sources
  }

  function loadTable(variant: string, family: 'hijri' | 'japanese', options: MonthTableOptions): MonthTable {
    for (const source of sourcesFor(family)) {
      let text: string | null
      try {
        text = source.load(variant)
      } catch (e) {
        if (!(e instanceof CalendarError)) throw e
        logger.warn(`Resource source ${source.name} failed for ${variant}: ${e.message}`)
        emit('resourceFailed', { variant, source: source.name, error: e })
        continue
      }
      if (text === null) {
        logger.debug(`No ${variant} resource in ${source.name}`)
        continue
      }
      const parsed = parseMonthTable(text, variant, options)
      if (!parsed.ok) {
        logger.warn(`Malformed ${variant} resource in ${source.name}: ${parsed.error.message}`)
        emit('resourceFailed', { variant, source: source.name, error: parsed.error })
        throw parsed.error
      }
      logger.debug(`Loaded ${variant} ${parsed.value.version} from ${source.name}`)
      emit('resourceLoaded', { variant, source: source.name, version: parsed.value.version })
      return parsed.value
    }
    throw new UnsupportedVariantError(variant, `No resource found for calendar variant '${variant}'`)
  }

  function build(variant: string): Entry {
    switch (variant) {
      case 'coptic':
        return { family: 'coptic', system: COPTIC }
      case 'indian':
        return { family: 'indian', system: INDIAN }
      case 'chinese':
        return { family: 'chinese', system: CHINESE }
      case JAPANESE:
        return {
          family: 'japanese',
          system: createJapaneseCalendar(loadTable(JAPANESE, 'japanese', { allowLeapMonths: true })),
        }
    }
    if (variant.startsWith('historic-')) {
      return { family: 'historic', system: createHistoricCalendar(historyOfVariant(variant)) }
    }
    if (variant.startsWith('islamic')) {
      const { base, adjustment } = parseHijriVariant(variant)
      if (isHijriAlgorithmVariant(base)) return { family: 'hijri', system: createHijriAlgorithm(variant) }
      if (adjustment !== 0) {
        throw new UnsupportedVariantError(variant, `Day adjustments apply to tabular Hijri variants only: '${variant}'`)
      }
      return { family: 'hijri', system: createHijriTable(loadTable(base, 'hijri', {})) }
    }
    throw new UnsupportedVariantError(variant)
  }

  function entry(variant: string): Entry {
    const cached = cache.get(variant)
    if (cached) return cached

    const built = build(variant)
    // an equivalent spelling may already be registered under the canonical name
    const existing = cache.get(built.system.variant) ?? built
    if (!cache.has(existing.system.variant)) cache.set(existing.system.variant, existing)
    cache.set(variant, existing)
    if (existing === built) {
      logger.debug(`Created calendar system ${built.system.variant}`)
      emit('systemCreated', { variant: built.system.variant, family: built.family })
    }
    return existing
  }

  return {
    get: (variant) => entry(variant).system,

    hijri(variant) {
      const found = entry(variant)
      if (found.family !== 'hijri') throw new UnsupportedVariantError(variant, `Not a Hijri variant: '${variant}'`)
      return found.system
    },

    japanese() {
      const found = entry(JAPANESE)
      if (found.family !== 'japanese') throw new UnsupportedVariantError(JAPANESE)
      return found.system
    },

    historic(variant) {
      const found = entry(variant)
      if (found.family !== 'historic') throw new UnsupportedVariantError(variant, `Not a historic variant: '${variant}'`)
      return found.system
    },

    has: (variant) => cache.has(variant),
    variants: () => [...new Set(cache.values())].map((found) => found.system.variant),
    on(event, handler) {
      handlers[event].push(handler)
    },
    clear() {
      cache.clear()
    },
  }
}

// ============================================================================
// Default Registry
// ============================================================================

let defaultRegistry: CalendarRegistry | null = null

/** Process-wide registry with the default configuration, built on first use. */
export function getDefaultRegistry(): CalendarRegistry {
  defaultRegistry ??= createCalendarRegistry()
  return defaultRegistry
}

export function getCalendarSystem(variant: string): AnyCalendarSystem {
  return getDefaultRegistry().get(variant)
}
