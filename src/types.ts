/**
 * Shared Types
 *
 * Parsed forms of timespan rules and the decomposed timestamp they are
 * evaluated against.
 */

export type { FieldName, Weekday, MonthName } from './field-domains'

// ============================================================================
// Parsed Rules
// ============================================================================

/** Inclusive ordinal range; low > high wraps around the end of the domain */
export type SubRange = {
  readonly low: number
  readonly high: number
}

export type FieldSpec =
  | { readonly type: 'wildcard' }
  | { readonly type: 'ranges'; readonly ranges: readonly SubRange[] }

export type TimespanRule = {
  /** Rule text as supplied, kept for diagnostics */
  readonly source: string
  readonly negated: boolean
  readonly time: FieldSpec
  readonly weekday: FieldSpec
  readonly day: FieldSpec
  readonly month: FieldSpec
}

/** A rule as callers hand it to the matcher: raw text or already parsed */
export type RuleInput = string | TimespanRule

// ============================================================================
// Timestamps
// ============================================================================

declare const __localDateTime: unique symbol

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm[:ss] */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

export type TimestampParts = {
  /** 0..1439 */
  readonly minuteOfDay: number
  /** 0..6, 0 = Monday */
  readonly weekday: number
  /** 1..31 */
  readonly day: number
  /** 1..12 */
  readonly month: number
}

/** Strings are read as LocalDateTime */
export type TimestampInput = Date | LocalDateTime | string | TimestampParts
