/**
 * Chinese Eras
 *
 * Reign titles of the Qing dynasty and the continuous count from the Yellow Emperor.
 * A reign's first year is the Chinese year after the accession.
 */

import type { ChineseDate } from './calendar-system'
import type { Era, EraResolver } from './era-resolver'
import { createEraResolver } from './era-resolver'
import { chineseNewYearIn, chineseYearOfDay, relatedGregorianYear } from './chinese'
import { OutOfRangeError } from './errors'

export interface ChineseEra extends Era {
  readonly name: string
  /** last year of the reign */
  readonly maxYear: number
}

const REIGNS: readonly (readonly [string, string, number, number])[] = [
  ['qing-shunzhi', 'Shunzhi', 1644, 18],
  ['qing-kangxi', 'Kangxi', 1662, 61],
  ['qing-yongzheng', 'Yongzheng', 1723, 13],
  ['qing-qianlong', 'Qianlong', 1736, 60],
  ['qing-jiaqing', 'Jiaqing', 1796, 25],
  ['qing-daoguang', 'Daoguang', 1821, 30],
  ['qing-xianfeng', 'Xianfeng', 1851, 11],
  ['qing-tongzhi', 'Tongzhi', 1862, 13],
  ['qing-guangxu', 'Guangxu', 1875, 34],
  ['qing-xuantong', 'Xuantong', 1909, 3],
]

const LAST_REIGN_INDEX = REIGNS.length - 1

// the dynasty ends with the last year of Xuantong
export const CHINESE_ERAS: readonly ChineseEra[] = REIGNS.map(([id, name, firstYear, maxYear], index) => ({
  id,
  name,
  firstYear,
  maxYear,
  start: chineseNewYearIn(firstYear),
  ...(index === LAST_REIGN_INDEX ? { end: chineseNewYearIn(firstYear + maxYear) } : {}),
}))

const QING_FIRST_YEAR = 1644
const QING_LAST_YEAR = 1911

export const CHINESE_ERA_RESOLVER: EraResolver<ChineseEra> = createEraResolver(CHINESE_ERAS, chineseYearOfDay)

/** Offset of the Yellow Emperor count from the related Gregorian year */
export const YELLOW_EMPEROR_OFFSET = 2697

export function yellowEmperorYear(date: ChineseDate): number {
  return relatedGregorianYear(date) + YELLOW_EMPEROR_OFFSET
}

/**
 * Qing reign of the date, or null outside the dynasty's supported span. Reigns change
 * only at a new year, so the lookup uses the first day of the date's year.
 */
export function chineseEraOf(date: ChineseDate): ChineseEra | null {
  const year = relatedGregorianYear(date)
  if (!Number.isInteger(year) || year < QING_FIRST_YEAR || year > QING_LAST_YEAR) return null
  return CHINESE_ERA_RESOLVER.findByEpochDay(chineseNewYearIn(year))
}

export function yearOfChineseEra(era: ChineseEra, date: ChineseDate): number {
  const yearOfEra = relatedGregorianYear(date) - era.firstYear + 1
  if (yearOfEra < 1 || yearOfEra > era.maxYear) {
    throw new OutOfRangeError(`Year ${relatedGregorianYear(date)} is outside the ${era.name} reign`)
  }
  return yearOfEra
}
