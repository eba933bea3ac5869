/**
 * Field Parser
 *
 * Turns rule text of the form `time|weekday|day|month` into a TimespanRule.
 * All four fields share one grammar (comma-separated sub-ranges of one or
 * two tokens); only token resolution differs per domain.
 */

import {
  type FieldDomain,
  type FieldName,
  FIELD_DOMAINS,
  FIELD_ORDER,
  MONTHS,
  WEEKDAYS,
  inDomain,
} from './field-domains'
import {
  type RuleErrorContext,
  TimespanError,
  MalformedRuleError,
  EmptyFieldError,
  InvalidValueError,
  UnknownNameError,
} from './errors'
import { type Result, Ok, Err } from './result'
import type { FieldSpec, SubRange, TimespanRule } from './types'

export type { FieldSpec, SubRange, TimespanRule } from './types'

// ============================================================================
// Constants
// ============================================================================

const WILDCARD: FieldSpec = { type: 'wildcard' }

const NEGATION_PREFIX = '!'
const FIELD_SEPARATOR = '|'
const RANGE_LIST_SEPARATOR = ','
const RANGE_SEPARATOR = '-'

const TIME_TOKEN = /^(\d{1,2}):(\d{2})$/
const NUMERIC_TOKEN = /^\d+$/

// ============================================================================
// Token Resolution
// ============================================================================

function resolveTime(token: string, context: RuleErrorContext): number {
  const match = TIME_TOKEN.exec(token)
  if (!match) {
    throw new InvalidValueError(`Invalid time '${token}', expected H:MM${where(context)}`, context)
  }
  const hours = parseInt(match[1] ?? '', 10)
  const minutes = parseInt(match[2] ?? '', 10)
  if (hours > 23 || minutes > 59) {
    throw new InvalidValueError(`Time '${token}' is outside 0:00-23:59${where(context)}`, context)
  }
  return hours * 60 + minutes
}

function resolveOrdinal(token: string, domain: FieldDomain, context: RuleErrorContext): number {
  if (NUMERIC_TOKEN.test(token)) {
    const value = parseInt(token, 10)
    if (!inDomain(value, domain)) {
      throw new InvalidValueError(
        `${domain.name} value '${token}' is outside ${domain.min}-${domain.max}${where(context)}`,
        context
      )
    }
    return value
  }

  if (domain.names === undefined) {
    throw new InvalidValueError(`Invalid ${domain.name} value '${token}'${where(context)}`, context)
  }

  const value = domain.names.get(token.toLowerCase())
  if (value === undefined) {
    throw new UnknownNameError(`Unknown ${domain.name} name '${token}'${where(context)}`, context)
  }
  return value
}

function resolveToken(token: string, domain: FieldDomain, context: RuleErrorContext): number {
  return domain.name === 'time' ? resolveTime(token, context) : resolveOrdinal(token, domain, context)
}

function where(context: RuleErrorContext): string {
  if (context.rule !== undefined) return ` in ${context.field ?? 'rule'} field of '${context.rule}'`
  if (context.field !== undefined) return ` in ${context.field} field`
  return ''
}

// ============================================================================
// Field Parsing
// ============================================================================

function parseSubRange(text: string, domain: FieldDomain, context: RuleErrorContext): SubRange {
  const parts = text.split(RANGE_SEPARATOR).map((p) => p.trim())
  if (parts.length > 2 || parts.some((p) => p === '')) {
    throw new MalformedRuleError(`Malformed range '${text}'${where(context)}`, context)
  }
  const low = resolveToken(parts[0] ?? '', domain, context)
  const high = parts.length === 2 ? resolveToken(parts[1] ?? '', domain, context) : low
  return { low, high }
}

/**
 * Parse one field against its domain.
 *
 * @param rule - rule text the field came from, used in error messages
 */
export function parseField(text: string, domain: FieldDomain, rule?: string): FieldSpec {
  const context: RuleErrorContext = rule === undefined ? { field: domain.name } : { rule, field: domain.name }
  const trimmed = text.trim()

  if (trimmed === '') {
    throw new EmptyFieldError(`Empty ${domain.name} field${rule === undefined ? '' : ` in '${rule}'`}`, context)
  }
  if (trimmed === '*') return WILDCARD

  const ranges = trimmed.split(RANGE_LIST_SEPARATOR).map((part) => parseSubRange(part, domain, context))
  return { type: 'ranges', ranges }
}

// ============================================================================
// Rule Parsing
// ============================================================================

export function parseRule(source: string): TimespanRule {
  let body = source.trim()
  const negated = body.startsWith(NEGATION_PREFIX)
  if (negated) body = body.slice(NEGATION_PREFIX.length)

  const fields = body.split(FIELD_SEPARATOR)
  if (fields.length !== FIELD_ORDER.length) {
    throw new MalformedRuleError(
      `Rule '${source}' has ${fields.length} field${fields.length === 1 ? '' : 's'}, expected time|weekday|day|month`,
      { rule: source }
    )
  }

  const [time = '', weekday = '', day = '', month = ''] = fields
  return {
    source,
    negated,
    time: parseField(time, FIELD_DOMAINS.time, source),
    weekday: parseField(weekday, FIELD_DOMAINS.weekday, source),
    day: parseField(day, FIELD_DOMAINS.day, source),
    month: parseField(month, FIELD_DOMAINS.month, source),
  }
}

export function parseRules(sources: readonly string[]): TimespanRule[] {
  return sources.map(parseRule)
}

/**
 * Parse without throwing. Only timespan errors are captured; anything else
 * is rethrown.
 */
export function validateRule(source: string): Result<TimespanRule, TimespanError> {
  try {
    return Ok(parseRule(source))
  } catch (err) {
    if (err instanceof TimespanError) return Err(err)
    throw err
  }
}

// ============================================================================
// Formatting
// ============================================================================

function formatValue(value: number, field: FieldName): string {
  switch (field) {
    case 'time':
      return `${Math.floor(value / 60)}:${String(value % 60).padStart(2, '0')}`
    case 'weekday':
      return WEEKDAYS[value] ?? String(value)
    case 'month':
      return MONTHS[value - 1] ?? String(value)
    case 'day':
      return String(value)
  }
}

function formatField(spec: FieldSpec, field: FieldName): string {
  if (spec.type === 'wildcard') return '*'
  return spec.ranges
    .map(({ low, high }) =>
      low === high ? formatValue(low, field) : `${formatValue(low, field)}-${formatValue(high, field)}`
    )
    .join(RANGE_LIST_SEPARATOR)
}

/** Canonical rule text: H:MM times, three-letter names, numeric days */
export function formatRule(rule: TimespanRule): string {
  const body = FIELD_ORDER.map((field) => formatField(rule[field], field)).join(FIELD_SEPARATOR)
  return rule.negated ? NEGATION_PREFIX + body : body
}
