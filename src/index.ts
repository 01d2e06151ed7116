/**
 * lunisolar-calendars
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  CalendarError, CalendarErrorCode,
  OutOfRangeError, InvalidDateError, UnsupportedVariantError, EraMismatchError,
  ResourceFormatError, ParseError,
} from './errors'
export type { CalendarErrorCode as CalendarErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap, mapResult } from './result'

// Epoch-day, Gregorian & Julian arithmetic
export type { EpochDay, IsoWeekday, YearMonthDay } from './epoch-day'
export {
  MIN_EPOCH_DAY, MAX_EPOCH_DAY, MIN_GREGORIAN_YEAR, MAX_GREGORIAN_YEAR,
  isGregorianLeapYear, gregorianLengthOfMonth, gregorianToEpochDay, epochDayToGregorian,
  isJulianLeapYear, julianLengthOfMonth, julianToEpochDay, epochDayToJulian,
  isoDayOfWeek as dayOfWeek, parseIsoDate, formatIsoDate, isoDate,
} from './epoch-day'

// Calendar contract & date types
export type {
  CalendarFamily, CalendarSystem, AnyCalendarSystem, CalendarDate, EastAsianMonth,
  CopticDate, IndianDate, HijriDate, ChineseDate, JapaneseDate, HistoricDate, HistoricEra,
} from './calendar-system'
export {
  eastAsianMonth, compareEastAsianMonths, sameEastAsianMonth, formatEastAsianMonth, sameDate,
} from './calendar-system'

// Field rules
export type { FieldRule, IntFieldRule, StandardRules, CalendarAccess, IntRuleSpec } from './field-rule'
export { createIntRule, createStandardRules, atFloor, atCeiling, shiftDays } from './field-rule'

// Era resolution
export type { Era, EraResolver, Leniency } from './era-resolver'
export { createEraResolver } from './era-resolver'

// Coptic & Indian
export {
  COPTIC, COPTIC_RULES, DIOCLETIAN_EPOCH, copticDate,
  isCopticLeapYear, copticLengthOfMonth, copticLengthOfYear,
} from './coptic'
export {
  INDIAN, INDIAN_RULES, indianDate,
  isIndianLeapYear, indianMonthsInYear, indianLengthOfMonth, indianLengthOfYear,
} from './indian'

// Hijri
export type { HijriSystem, HijriVariant } from './hijri'
export { hijriDate, createHijriRules, parseHijriVariant, formatHijriVariant } from './hijri'
export type { HijriAlgorithmSystem } from './hijri-algorithm'
export { createHijriAlgorithm, HIJRI_ALGORITHM_VARIANTS } from './hijri-algorithm'
export type { HijriTableSystem } from './hijri-table'
export { createHijriTable, UMALQURA } from './hijri-table'

// Month tables & resources
export type { MonthTable, MonthTableOptions } from './month-table'
export { parseMonthTable } from './month-table'
export type { ResourceSource, IntlSourceOptions } from './resource-loader'
export { fileSource, textSource, intlUmalquraSource, DEFAULT_DATA_DIRECTORY } from './resource-loader'

// Chinese
export type { ChineseSystem, ChineseRules, CyclicYear } from './chinese'
export {
  CHINESE, CHINESE_RULES, chineseDate, getLeapMonth, relatedGregorianYear, cyclicYear,
  chineseNewYearIn, plusMonths, plusYears, monthsBetween, compareChineseDates,
} from './chinese'
export type { ChineseEra } from './chinese-era'
export {
  CHINESE_ERAS, CHINESE_ERA_RESOLVER, YELLOW_EMPEROR_OFFSET,
  yellowEmperorYear, chineseEraOf, yearOfChineseEra,
} from './chinese-era'

// Japanese
export type { Nengo, JapaneseSystem, JapaneseRules } from './japanese'
export { JAPANESE, NENGO, GREGORIAN_SINCE, createJapaneseCalendar, japaneseDate, createJapaneseRules } from './japanese'

// Historic
export type { NewYearRule, NewYearStrategy, NewYearPeriod, HistoricFields } from './new-year'
export {
  NEW_YEAR_RULES, newYearOf, newYearUntil, combineNewYear, newYearRuleFor, displayedYear,
  julianEasterMarchDay,
} from './new-year'
export type { CalendarAlgorithm, ChronoHistory, CutOverEvent, EraPreference, PreferredEra } from './history'
export {
  JULIAN, GREGORIAN, SWEDISH, ANCIENT_JULIAN, SCALIGER_LEAP_YEARS_BC,
  FIRST_REFORM_HISTORY, PROLEPTIC_GREGORIAN, PROLEPTIC_JULIAN, SWEDEN, HISTORY_REGIONS,
  gregorianReform, historyForRegion, historyOfVariant, gregorianCutOver,
  withNewYearStrategy, withEraPreference, withAncientJulianLeapYears, eraPreference,
} from './history'
export type { HistoricSystem, HistoricRules, PreferredYear } from './historic'
export { createHistoricCalendar, historicDate, createHistoricRules } from './historic'

// Week fields
export type { WeekModel, WeekFields, WeekPeriods } from './week-fields'
export { ISO_WEEK, weekModelOf, weekModelForRegion, dayOfWeekLocal, createWeekFields, weekPeriodsOf } from './week-fields'

// Registry
export type {
  CalendarRegistry, CalendarRegistryConfig, CalendarLogger, HijriSourceKind, RegistryEvents, RegistryEvent,
} from './variant-registry'
export { createCalendarRegistry, getDefaultRegistry, getCalendarSystem } from './variant-registry'

// Serialization
export type { EncodedDate, TypeTag } from './serialization'
export { TYPE_TAGS, encodeDate, decodeDate, formatDate, parseDate } from './serialization'
