/**
 * Era Resolution
 *
 * An ordered era table with binary search by epoch-day and neighbour navigation.
 * When a caller names an era that disagrees with the one computed from the date,
 * the leniency decides: strict fails, smart substitutes, lax keeps the caller's era.
 */

import type { EpochDay } from './epoch-day'
import type { Result } from './result'
import { Ok, Err } from './result'
import { EraMismatchError, ResourceFormatError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Leniency = 'strict' | 'smart' | 'lax'

export interface Era {
  readonly id: string
  /** epoch-day of the first day of the era */
  readonly start: EpochDay
  /** related standard year counted as year 1 of the era */
  readonly firstYear: number
  /** epoch-day after the last day of an era that has no successor in the table */
  readonly end?: EpochDay
}

export interface EraResolver<E extends Era> {
  readonly eras: readonly E[]
  findById(id: string): E | null
  /** era in force on the day, or null before the first era or after a closed last era */
  findByEpochDay(epochDay: EpochDay): E | null
  findNext(era: E): E | null
  findPrevious(era: E): E | null
  /** largest year of the era, or null for the open-ended current era */
  maxYearOfEra(era: E): number | null
  /**
   * Reconciles the era a caller asked for with the era in force on the day.
   */
  resolve(requested: E, epochDay: EpochDay, leniency: Leniency): Result<E, EraMismatchError>
}

// ============================================================================
// Resolver
// ============================================================================

/**
 * `relatedYearOf` maps a day to the standard year it belongs to; it bounds the year
 * range of an era by the start of the next one, or by its own `end`.
 */
export function createEraResolver<E extends Era>(
  eras: readonly E[],
  relatedYearOf: (epochDay: EpochDay) => number
): EraResolver<E> {
  for (let i = 1; i < eras.length; i++) {
    const previous = eras[i - 1]
    const current = eras[i]
    if (previous && current && current.start <= previous.start) {
      throw new ResourceFormatError(`Era starts must strictly increase: ${previous.id} then ${current.id}`)
    }
  }

  const byId = new Map(eras.map((era, index) => [era.id, index]))

  const findByEpochDay = (epochDay: EpochDay): E | null => {
    let low = 0
    let high = eras.length - 1
    while (low <= high) {
      const mid = (low + high) >>> 1
      if ((eras[mid]?.start ?? Infinity) <= epochDay) low = mid + 1
      else high = mid - 1
    }
    const era = eras[low - 1] ?? null
    return era !== null && era.end !== undefined && epochDay >= era.end ? null : era
  }

  const neighbour = (era: E, delta: number): E | null => {
    const index = byId.get(era.id)
    if (index === undefined) return null
    return eras[index + delta] ?? null
  }

  return {
    eras,
    findById: (id) => {
      const index = byId.get(id)
      return index === undefined ? null : eras[index] ?? null
    },
    findByEpochDay,
    findNext: (era) => neighbour(era, 1),
    findPrevious: (era) => neighbour(era, -1),

    maxYearOfEra(era) {
      const end = neighbour(era, 1)?.start ?? era.end
      return end === undefined ? null : relatedYearOf(end - 1) - era.firstYear + 1
    },

    resolve(requested, epochDay, leniency) {
      if (leniency === 'lax') return Ok(requested)
      const computed = findByEpochDay(epochDay)
      if (computed === null || computed.id === requested.id) return Ok(requested)
      if (leniency === 'strict') return Err(new EraMismatchError(requested.id, computed.id))
      return Ok(computed)
    },
  }
}
