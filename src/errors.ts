/**
 * Consolidated error system for timespan-rules.
 *
 * All error classes extend TimespanError, which carries a typed error code.
 * Rule parsing errors also record the offending rule text and field.
 */

import type { FieldName } from './field-domains'

// ============================================================================
// Error Codes
// ============================================================================

export const TimespanErrorCode = {
  // Rule parsing
  MALFORMED_RULE: 'MALFORMED_RULE',
  EMPTY_FIELD: 'EMPTY_FIELD',
  INVALID_VALUE: 'INVALID_VALUE',
  UNKNOWN_NAME: 'UNKNOWN_NAME',

  // Timestamps
  INVALID_TIMESTAMP: 'INVALID_TIMESTAMP',

  // Durations
  DURATION_FORMAT: 'DURATION_FORMAT',

  // Configuration
  CONFIG: 'CONFIG',
} as const

export type TimespanErrorCode = (typeof TimespanErrorCode)[keyof typeof TimespanErrorCode]

/** Where in a rule a parse error was raised. */
export type RuleErrorContext = {
  rule?: string
  field?: FieldName
}

// ============================================================================
// Base Class
// ============================================================================

export class TimespanError extends Error {
  readonly code: TimespanErrorCode
  readonly rule: string | undefined
  readonly field: FieldName | undefined

  constructor(code: TimespanErrorCode, message: string, context: RuleErrorContext = {}) {
    super(message)
    this.name = 'TimespanError'
    this.code = code
    this.rule = context.rule
    this.field = context.field
  }
}

// ============================================================================
// Rule Parsing Errors
// ============================================================================

export class MalformedRuleError extends TimespanError {
  constructor(message: string, context?: RuleErrorContext) {
    super(TimespanErrorCode.MALFORMED_RULE, message, context)
    this.name = 'MalformedRuleError'
  }
}

export class EmptyFieldError extends TimespanError {
  constructor(message: string, context?: RuleErrorContext) {
    super(TimespanErrorCode.EMPTY_FIELD, message, context)
    this.name = 'EmptyFieldError'
  }
}

export class InvalidValueError extends TimespanError {
  constructor(message: string, context?: RuleErrorContext) {
    super(TimespanErrorCode.INVALID_VALUE, message, context)
    this.name = 'InvalidValueError'
  }
}

export class UnknownNameError extends TimespanError {
  constructor(message: string, context?: RuleErrorContext) {
    super(TimespanErrorCode.UNKNOWN_NAME, message, context)
    this.name = 'UnknownNameError'
  }
}

// ============================================================================
// Timestamp Errors
// ============================================================================

export class InvalidTimestampError extends TimespanError {
  constructor(message: string) {
    super(TimespanErrorCode.INVALID_TIMESTAMP, message)
    this.name = 'InvalidTimestampError'
  }
}

// ============================================================================
// Duration Errors
// ============================================================================

export class DurationFormatError extends TimespanError {
  constructor(message: string) {
    super(TimespanErrorCode.DURATION_FORMAT, message)
    this.name = 'DurationFormatError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigError extends TimespanError {
  constructor(message: string) {
    super(TimespanErrorCode.CONFIG, message)
    this.name = 'ConfigError'
  }
}
