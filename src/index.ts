/**
 * timespan-rules
 *
 * Public API exports
 */

// Error system
export {
  TimespanError, TimespanErrorCode,
  MalformedRuleError, EmptyFieldError, InvalidValueError, UnknownNameError,
  InvalidTimestampError, DurationFormatError, ConfigError,
} from './errors'
export type {
  TimespanErrorCode as TimespanErrorCodeType,
  RuleErrorContext,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Shared types
export type {
  SubRange, FieldSpec, TimespanRule, RuleInput,
  LocalDateTime, TimestampParts, TimestampInput,
  FieldName, Weekday, MonthName,
} from './types'

// Field domains
export type { FieldDomain } from './field-domains'
export { FIELD_DOMAINS, FIELD_ORDER, WEEKDAYS, MONTHS, MINUTES_PER_DAY } from './field-domains'

// Rule parsing
export { parseRule, parseRules, parseField, validateRule, formatRule } from './field-parser'

// Evaluation
export { fieldMatches, subRangeMatches } from './range-evaluator'
export { match, matchOne, evaluateRule } from './rule-aggregator'

// Timestamps
export type { DateTimeFields } from './timestamp'
export {
  toTimestampParts, parseLocalDateTime, makeLocalDateTime,
  dayOfWeek, daysInMonth, isLeapYear,
} from './timestamp'

// Durations
export type { DurationSpecifier, DurationParts, TimeSpan, DurationFormatOptions } from './duration'
export {
  toDurationString, fromDurationString, totalSeconds,
  constant, generalShort, generalLong,
} from './duration'

// Configuration
export type { TimespanConfig } from './config'
export { loadConfig, isValidDecimalSeparator } from './config'
