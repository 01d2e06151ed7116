/**
 * East Asian Lunisolar Engine
 *
 * Months begin on the local day of the new moon. The year (sui) is framed by two
 * winter solstices; a sui with thirteen new moons has one leap month, the first
 * month without a major solar term. New year falls on the second new moon after
 * the winter solstice, or the third when a leap month intervenes.
 *
 * The local day depends on a zone offset that may change over time, so the engine
 * takes it as a function of the epoch-day.
 */

import type { EpochDay } from './epoch-day'
import { epochDayToGregorian, gregorianToEpochDay } from './epoch-day'
import {
  MEAN_SYNODIC_MONTH,
  createNewMoonSearch,
  newMoonAt,
  solarLongitude,
  solarLongitudeAtOrAfter,
  toJde,
} from './astronomy'

// ============================================================================
// Types
// ============================================================================

export interface LunisolarEngineOptions {
  /** zone offset in seconds valid on the given day */
  offsetSeconds(epochDay: EpochDay): number
  /** days whose new moon falls within minutes of local midnight and is fixed by decree */
  pinnedNewMoons?: readonly EpochDay[]
}

export interface LunisolarEngine {
  newMoonOnOrAfter(epochDay: EpochDay): EpochDay
  newMoonBefore(epochDay: EpochDay): EpochDay
  /** whether the month starting on the day holds no major solar term */
  hasNoMajorSolarTerm(epochDay: EpochDay): boolean
  newYearOnOrBefore(epochDay: EpochDay): EpochDay
}

const SECONDS_PER_DAY = 86_400

// a decreed new moon absorbs computed instants this close to its local midnight
const PIN_TOLERANCE_SECONDS = 300

export function lunations(from: EpochDay, to: EpochDay): number {
  return Math.round((to - from) / MEAN_SYNODIC_MONTH)
}

/** Offset in seconds of local mean time at an eastern longitude. */
export function localMeanTimeOffset(degrees: number, minutes = 0): number {
  return Math.round((degrees + minutes / 60) * 240)
}

// ============================================================================
// Engine
// ============================================================================

export function createLunisolarEngine(options: LunisolarEngineOptions): LunisolarEngine {
  const offsetOf = options.offsetSeconds
  const pins = (options.pinnedNewMoons ?? []).map((day) => day * SECONDS_PER_DAY - offsetOf(day))

  // Unbounded memos: callers stay inside the calendar's range, which holds about
  // 17,000 lunations and 1,400 solstices.
  const moons = new Map<number, number>()
  const moonAt = (n: number): number => {
    let instant = moons.get(n)
    if (instant === undefined) {
      const computed = newMoonAt(n)
      instant = pins.find((pin) => Math.abs(computed - pin) <= PIN_TOLERANCE_SECONDS) ?? computed
      moons.set(n, instant)
    }
    return instant
  }
  const search = createNewMoonSearch(moonAt)

  const solstices = new Map<number, number>()
  const solsticeIn = (year: number): number => {
    let instant = solstices.get(year)
    if (instant === undefined) {
      instant = solarLongitudeAtOrAfter(270, gregorianToEpochDay(year, 12, 1) * SECONDS_PER_DAY)
      solstices.set(year, instant)
    }
    return instant
  }

  const midnight = (day: EpochDay): number => day * SECONDS_PER_DAY - offsetOf(day)
  const localDay = (instant: number, reference: EpochDay): EpochDay =>
    Math.floor((instant + offsetOf(reference)) / SECONDS_PER_DAY)

  const newMoonOnOrAfter = (day: EpochDay): EpochDay => localDay(search.atOrAfter(midnight(day)), day)
  const newMoonBefore = (day: EpochDay): EpochDay => localDay(search.before(midnight(day)), day)

  const winterOnOrBefore = (day: EpochDay): EpochDay => {
    const date = epochDayToGregorian(day)
    const year = date.month <= 11 || date.day <= 15 ? date.year - 1 : date.year
    const winter = localDay(solsticeIn(year), day)
    return winter > day ? localDay(solsticeIn(year - 1), day) : winter
  }

  // major solar terms sit on multiples of 30°; index 0 is the one at 300°
  const majorTermIndex = (day: EpochDay): number =>
    (2 + Math.floor(solarLongitude(toJde(midnight(day))) / 30)) % 12

  const hasNoMajorSolarTerm = (day: EpochDay): boolean =>
    majorTermIndex(day) === majorTermIndex(newMoonOnOrAfter(day + 1))

  const newYearInSui = (day: EpochDay): EpochDay => {
    const s1 = winterOnOrBefore(day)
    const s2 = winterOnOrBefore(s1 + 370)
    const m12 = newMoonOnOrAfter(s1 + 1)
    const m13 = newMoonOnOrAfter(m12 + 1)
    const nextM11 = newMoonBefore(s2 + 1)
    if (lunations(m12, nextM11) === 12 && (hasNoMajorSolarTerm(m12) || hasNoMajorSolarTerm(m13))) {
      return newMoonOnOrAfter(m13 + 1)
    }
    return m13
  }

  const newYearOnOrBefore = (day: EpochDay): EpochDay => {
    const newYear = newYearInSui(day)
    return day >= newYear ? newYear : newYearInSui(day - 180)
  }

  return {
    newMoonOnOrAfter,
    newMoonBefore,
    hasNoMajorSolarTerm,
    newYearOnOrBefore,
  }
}
