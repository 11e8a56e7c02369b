/**
 * Consolidated error system for civil-values.
 *
 * All error classes extend CivilError, which carries a typed error code.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CivilErrorCode = {
  // Encoding
  FIELD_RANGE: 'FIELD_RANGE',
  INVALID_FIELD: 'INVALID_FIELD',

  // Decoding
  PARSE_ERROR: 'PARSE_ERROR',

  // Scalar conversion
  UNSUPPORTED_SCAN_INPUT: 'UNSUPPORTED_SCAN_INPUT',

  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  INVALID_DATA: 'INVALID_DATA',
  VALIDATION: 'VALIDATION',
} as const

export type CivilErrorCode = (typeof CivilErrorCode)[keyof typeof CivilErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CivilError extends Error {
  readonly code: CivilErrorCode

  constructor(code: CivilErrorCode, message: string) {
    super(message)
    this.name = 'CivilError'
    this.code = code
  }
}

// ============================================================================
// Encoding Errors
// ============================================================================

export class FieldRangeError extends CivilError {
  constructor(message: string) {
    super(CivilErrorCode.FIELD_RANGE, message)
    this.name = 'FieldRangeError'
  }
}

export class InvalidFieldError extends CivilError {
  constructor(message: string) {
    super(CivilErrorCode.INVALID_FIELD, message)
    this.name = 'InvalidFieldError'
  }
}

// ============================================================================
// Decoding Errors
// ============================================================================

export class ParseError extends CivilError {
  constructor(message: string) {
    super(CivilErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Scalar Conversion Errors
// ============================================================================

export class ScanError extends CivilError {
  constructor(message: string) {
    super(CivilErrorCode.UNSUPPORTED_SCAN_INPUT, message)
    this.name = 'ScanError'
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends CivilError {
  constructor(message: string) {
    super(CivilErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends CivilError {
  constructor(message: string) {
    super(CivilErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class InvalidDataError extends CivilError {
  constructor(message: string) {
    super(CivilErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

export class ValidationError extends CivilError {
  constructor(message: string) {
    super(CivilErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}
