/**
 * Range Evaluator
 *
 * Membership of a single timestamp component in a parsed field.
 */

import type { FieldDomain } from './field-domains'
import type { FieldSpec, SubRange } from './types'

/**
 * Inclusive range test. When low > high the range wraps past the end of the
 * domain, so it covers [low, max] and [min, high].
 */
export function subRangeMatches(range: SubRange, value: number): boolean {
  if (range.low <= range.high) {
    return value >= range.low && value <= range.high
  }
  return value >= range.low || value <= range.high
}

/**
 * Values outside the domain never match a non-wildcard field. Day-of-month
 * wraparound is numeric: `28-3` covers 28..31 and 1..3 whatever the month length.
 */
export function fieldMatches(spec: FieldSpec, value: number, domain: FieldDomain): boolean {
  if (spec.type === 'wildcard') return true
  if (value < domain.min || value > domain.max) return false
  return spec.ranges.some((range) => subRangeMatches(range, value))
}
