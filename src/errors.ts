/**
 * Consolidated error system for fuzzy-dates.
 *
 * All error classes extend FuzzyDateError, which carries a typed error code.
 * Every error is thrown synchronously and never caught inside the library.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const FuzzyDateErrorCode = {
  // Rule engine
  VALIDATION: 'VALIDATION',
  OUT_OF_RANGE: 'OUT_OF_RANGE',
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Parsing
  FORMAT: 'FORMAT',

  // Arguments
  NULL_ARGUMENT: 'NULL_ARGUMENT',
} as const

export type FuzzyDateErrorCode = (typeof FuzzyDateErrorCode)[keyof typeof FuzzyDateErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class FuzzyDateError extends Error {
  readonly code: FuzzyDateErrorCode

  constructor(code: FuzzyDateErrorCode, message: string) {
    super(message)
    this.name = 'FuzzyDateError'
    this.code = code
  }
}

// ============================================================================
// Rule Errors
// ============================================================================

/** A registered rule rejected a candidate during construction. */
export class ValidationError extends FuzzyDateError {
  readonly rule: string
  readonly value: unknown

  constructor(
    rule: string,
    message: string,
    value?: unknown,
    code: FuzzyDateErrorCode = FuzzyDateErrorCode.VALIDATION
  ) {
    super(code, message)
    this.name = 'ValidationError'
    this.rule = rule
    this.value = value
  }
}

export class OutOfRangeError extends ValidationError {
  constructor(rule: string, message: string, value?: unknown) {
    super(rule, message, value, FuzzyDateErrorCode.OUT_OF_RANGE)
    this.name = 'OutOfRangeError'
  }
}

export class InvalidConfigError extends FuzzyDateError {
  constructor(message: string) {
    super(FuzzyDateErrorCode.INVALID_CONFIG, message)
    this.name = 'InvalidConfigError'
  }
}

// ============================================================================
// Parse Errors
// ============================================================================

export class FormatError extends FuzzyDateError {
  readonly input: string

  constructor(input: string, message: string) {
    super(FuzzyDateErrorCode.FORMAT, message)
    this.name = 'FormatError'
    this.input = input
  }
}

// ============================================================================
// Argument Errors
// ============================================================================

export class NullArgumentError extends FuzzyDateError {
  readonly argument: string

  constructor(argument: string) {
    super(FuzzyDateErrorCode.NULL_ARGUMENT, `Argument '${argument}' must not be null or undefined`)
    this.name = 'NullArgumentError'
    this.argument = argument
  }
}
