/**
 * Rule Aggregator
 *
 * Evaluates a list of timespan rules against one timestamp. Each rule is the
 * AND of its four fields, inverted when negated; the list is the AND of its
 * rules. An empty list matches every timestamp.
 */

import { FIELD_DOMAINS } from './field-domains'
import { parseRule } from './field-parser'
import { fieldMatches } from './range-evaluator'
import { toTimestampParts } from './timestamp'
import type { RuleInput, TimespanRule, TimestampInput, TimestampParts } from './types'

export type { RuleInput, TimespanRule, TimestampInput, TimestampParts } from './types'

function toRule(input: RuleInput): TimespanRule {
  return typeof input === 'string' ? parseRule(input) : input
}

/** Effective result of one parsed rule, negation applied */
export function evaluateRule(rule: TimespanRule, parts: TimestampParts): boolean {
  const raw =
    fieldMatches(rule.time, parts.minuteOfDay, FIELD_DOMAINS.time) &&
    fieldMatches(rule.weekday, parts.weekday, FIELD_DOMAINS.weekday) &&
    fieldMatches(rule.day, parts.day, FIELD_DOMAINS.day) &&
    fieldMatches(rule.month, parts.month, FIELD_DOMAINS.month)
  return raw !== rule.negated
}

/**
 * True when every rule holds at `timestamp`.
 *
 * All rule strings are parsed before anything is evaluated, so a malformed
 * rule fails the call regardless of its position or the timestamp.
 *
 * @example
 * match(['9:00-17:00|mon-fri|*|*', '!*|*|25|dec'], '2024-12-24T10:00')  // true
 * match(['9:00-17:00|mon-fri|*|*', '!*|*|25|dec'], '2024-12-25T10:00')  // false
 */
export function match(rules: readonly RuleInput[], timestamp: TimestampInput): boolean {
  const parsed = rules.map(toRule)
  const parts = toTimestampParts(timestamp)
  return parsed.every((rule) => evaluateRule(rule, parts))
}

export function matchOne(rule: RuleInput, timestamp: TimestampInput): boolean {
  return evaluateRule(toRule(rule), toTimestampParts(timestamp))
}
