/**
 * Consolidated error system for weekdraw.
 *
 * All error classes extend WeekdrawError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * the module they are using.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const WeekdrawErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_DATA: 'INVALID_DATA',

  // Configuration
  CONFIGURATION: 'CONFIGURATION',
  DUPLICATE_HANDLE: 'DUPLICATE_HANDLE',

  // Preconditions
  INSUFFICIENT_POOL: 'INSUFFICIENT_POOL',
  ALREADY_DRAWN: 'ALREADY_DRAWN',
  WEEK_NOT_DRAWABLE: 'WEEK_NOT_DRAWABLE',
  MALFORMED_INPUT: 'MALFORMED_INPUT',

  // Draw contract
  POOL_EXHAUSTED: 'POOL_EXHAUSTED',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type WeekdrawErrorCode = (typeof WeekdrawErrorCode)[keyof typeof WeekdrawErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class WeekdrawError extends Error {
  readonly code: WeekdrawErrorCode

  constructor(code: WeekdrawErrorCode, message: string) {
    super(message)
    this.name = 'WeekdrawError'
    this.code = code
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends WeekdrawError {
  constructor(message: string) {
    super(WeekdrawErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends WeekdrawError {
  constructor(message: string) {
    super(WeekdrawErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class InvalidDataError extends WeekdrawError {
  constructor(message: string) {
    super(WeekdrawErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/** Missing roster field, missing store, or an invalid config value. Fatal. */
export class ConfigurationError extends WeekdrawError {
  constructor(message: string) {
    super(WeekdrawErrorCode.CONFIGURATION, message)
    this.name = 'ConfigurationError'
  }
}

export class DuplicateHandleError extends WeekdrawError {
  readonly handle: string

  constructor(handle: string) {
    super(WeekdrawErrorCode.DUPLICATE_HANDLE, `Duplicate participant handle '${handle}' in roster`)
    this.name = 'DuplicateHandleError'
    this.handle = handle
  }
}

// ============================================================================
// Precondition Errors
// ============================================================================

export class InsufficientPoolError extends WeekdrawError {
  readonly required: number
  readonly available: number

  constructor(required: number, available: number) {
    super(
      WeekdrawErrorCode.INSUFFICIENT_POOL,
      `Insufficient eligible participants: ${required} required, ${available} available`,
    )
    this.name = 'InsufficientPoolError'
    this.required = required
    this.available = available
  }
}

export class AlreadyDrawnError extends WeekdrawError {
  readonly week: string

  constructor(week: string) {
    super(WeekdrawErrorCode.ALREADY_DRAWN, `Week ${week} has already been drawn`)
    this.name = 'AlreadyDrawnError'
    this.week = week
  }
}

export class WeekNotDrawableError extends WeekdrawError {
  readonly week: string

  constructor(week: string, message: string) {
    super(WeekdrawErrorCode.WEEK_NOT_DRAWABLE, message)
    this.name = 'WeekNotDrawableError'
    this.week = week
  }
}

export class MalformedInputError extends WeekdrawError {
  constructor(message: string) {
    super(WeekdrawErrorCode.MALFORMED_INPUT, message)
    this.name = 'MalformedInputError'
  }
}

// ============================================================================
// Draw Contract Errors
// ============================================================================

export class PoolExhaustedError extends WeekdrawError {
  constructor(message: string) {
    super(WeekdrawErrorCode.POOL_EXHAUSTED, message)
    this.name = 'PoolExhaustedError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends WeekdrawError {
  constructor(message: string) {
    super(WeekdrawErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}
