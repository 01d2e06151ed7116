/**
 * Consolidated error system for the calendar engine.
 *
 * All error classes extend CalendarError, which carries a typed error code.
 * Construction-time failures (bad resources, bad variant strings) are thrown immediately;
 * per-date failures reach the caller either thrown or wrapped in a Result.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CalendarErrorCode = {
  // Epoch-day or field value outside the supported span
  OUT_OF_RANGE: 'OUT_OF_RANGE',
  // Well-formed fields that do not denote a real date
  INVALID_DATE: 'INVALID_DATE',

  // Registry
  UNSUPPORTED_VARIANT: 'UNSUPPORTED_VARIANT',

  // Era resolution
  ERA_MISMATCH: 'ERA_MISMATCH',

  // Table loading
  RESOURCE_FORMAT: 'RESOURCE_FORMAT',

  // ISO parsing, serialized forms
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type CalendarErrorCode = (typeof CalendarErrorCode)[keyof typeof CalendarErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string) {
    super(message)
    this.name = 'CalendarError'
    this.code = code
  }
}

// ============================================================================
// Date Errors
// ============================================================================

export class OutOfRangeError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.OUT_OF_RANGE, message)
    this.name = 'OutOfRangeError'
  }
}

export class InvalidDateError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_DATE, message)
    this.name = 'InvalidDateError'
  }
}

// ============================================================================
// Registry & Era Errors
// ============================================================================

export class UnsupportedVariantError extends CalendarError {
  readonly variant: string

  constructor(variant: string, message?: string) {
    super(CalendarErrorCode.UNSUPPORTED_VARIANT, message ?? `Unsupported calendar variant: '${variant}'`)
    this.name = 'UnsupportedVariantError'
    this.variant = variant
  }
}

export class EraMismatchError extends CalendarError {
  readonly requested: string
  readonly resolved: string

  constructor(requested: string, resolved: string, message?: string) {
    super(
      CalendarErrorCode.ERA_MISMATCH,
      message ?? `Era mismatch: requested '${requested}' but the date belongs to '${resolved}'`
    )
    this.name = 'EraMismatchError'
    this.requested = requested
    this.resolved = resolved
  }
}

// ============================================================================
// Resource & Parse Errors
// ============================================================================

export class ResourceFormatError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.RESOURCE_FORMAT, message)
    this.name = 'ResourceFormatError'
  }
}

export class ParseError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}
