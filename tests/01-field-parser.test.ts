/**
 * Segment 01: Field Parser Tests
 *
 * Tests parsing of rule text into TimespanRule values: field splitting,
 * wildcard and range expansion, name resolution, and the parse error taxonomy.
 */

import { describe, it, expect } from 'vitest'
import {
  parseRule,
  parseRules,
  parseField,
  validateRule,
  formatRule,
  type FieldSpec,
} from '../src/field-parser'
import { FIELD_DOMAINS } from '../src/field-domains'
import {
  MalformedRuleError,
  EmptyFieldError,
  InvalidValueError,
  UnknownNameError,
  TimespanErrorCode,
} from '../src/errors'

function ranges(...pairs: [number, number][]): FieldSpec {
  return { type: 'ranges', ranges: pairs.map(([low, high]) => ({ low, high })) }
}

// ============================================================================
// 1. FIELD PARSING
// ============================================================================

describe('parseField', () => {
  describe('wildcard', () => {
    it('parses * as wildcard in every domain', () => {
      for (const domain of Object.values(FIELD_DOMAINS)) {
        expect(parseField('*', domain)).toEqual({ type: 'wildcard' })
      }
    })

    it('trims whitespace around *', () => {
      expect(parseField(' * ', FIELD_DOMAINS.day)).toEqual({ type: 'wildcard' })
    })
  })

  describe('time', () => {
    it('converts H:MM to minutes since midnight', () => {
      expect(parseField('9:30', FIELD_DOMAINS.time)).toEqual(ranges([570, 570]))
    })

    it('accepts HH:MM', () => {
      expect(parseField('09:00-17:00', FIELD_DOMAINS.time)).toEqual(ranges([540, 1020]))
    })

    it('accepts the full day boundaries', () => {
      expect(parseField('0:00-23:59', FIELD_DOMAINS.time)).toEqual(ranges([0, 1439]))
    })

    it('keeps wraparound ranges as written', () => {
      expect(parseField('22:00-6:00', FIELD_DOMAINS.time)).toEqual(ranges([1320, 360]))
    })

    it('parses comma-separated ranges in order', () => {
      expect(parseField('8:00-12:00,13:00-17:30', FIELD_DOMAINS.time)).toEqual(ranges([480, 720], [780, 1050]))
    })

    it('rejects hour 24', () => {
      expect(() => parseField('24:00', FIELD_DOMAINS.time)).toThrow(InvalidValueError)
    })

    it('rejects hour 25', () => {
      expect(() => parseField('25:00', FIELD_DOMAINS.time)).toThrow(InvalidValueError)
    })

    it('rejects minute 60', () => {
      expect(() => parseField('9:60', FIELD_DOMAINS.time)).toThrow(InvalidValueError)
    })

    it('rejects a single-digit minute', () => {
      expect(() => parseField('9:5', FIELD_DOMAINS.time)).toThrow(InvalidValueError)
    })

    it('rejects a bare hour', () => {
      expect(() => parseField('9', FIELD_DOMAINS.time)).toThrow(InvalidValueError)
    })
  })

  describe('weekday', () => {
    it('resolves abbreviations to 0 = Monday', () => {
      expect(parseField('mon-fri', FIELD_DOMAINS.weekday)).toEqual(ranges([0, 4]))
    })

    it('resolves full names case-insensitively', () => {
      expect(parseField('Saturday,SUNDAY', FIELD_DOMAINS.weekday)).toEqual(ranges([5, 5], [6, 6]))
    })

    it('accepts numeric ordinals', () => {
      expect(parseField('1', FIELD_DOMAINS.weekday)).toEqual(ranges([1, 1]))
    })

    it('mixes names and numbers within a range', () => {
      expect(parseField('fri-0', FIELD_DOMAINS.weekday)).toEqual(ranges([4, 0]))
    })

    it('rejects ordinal 7 as an invalid value', () => {
      expect(() => parseField('7', FIELD_DOMAINS.weekday)).toThrow(InvalidValueError)
    })

    it('rejects an unknown name', () => {
      expect(() => parseField('funday', FIELD_DOMAINS.weekday)).toThrow(UnknownNameError)
    })
  })

  describe('day of month', () => {
    it('parses numeric ranges', () => {
      expect(parseField('22-28', FIELD_DOMAINS.day)).toEqual(ranges([22, 28]))
    })

    it('rejects day 0', () => {
      expect(() => parseField('0', FIELD_DOMAINS.day)).toThrow(InvalidValueError)
    })

    it('rejects day 32', () => {
      expect(() => parseField('32', FIELD_DOMAINS.day)).toThrow(InvalidValueError)
    })

    it('rejects names, since days have no name table', () => {
      expect(() => parseField('first', FIELD_DOMAINS.day)).toThrow(InvalidValueError)
    })
  })

  describe('month', () => {
    it('resolves abbreviations to 1 = January', () => {
      expect(parseField('jan', FIELD_DOMAINS.month)).toEqual(ranges([1, 1]))
    })

    it('resolves full names', () => {
      expect(parseField('November-December', FIELD_DOMAINS.month)).toEqual(ranges([11, 12]))
    })

    it('accepts numeric months', () => {
      expect(parseField('12', FIELD_DOMAINS.month)).toEqual(ranges([12, 12]))
    })

    it('rejects month 13', () => {
      expect(() => parseField('13', FIELD_DOMAINS.month)).toThrow(InvalidValueError)
    })

    it('rejects month 0', () => {
      expect(() => parseField('0', FIELD_DOMAINS.month)).toThrow(InvalidValueError)
    })

    it('rejects an unknown name', () => {
      expect(() => parseField('smarch', FIELD_DOMAINS.month)).toThrow(UnknownNameError)
    })
  })

  describe('malformed fields', () => {
    it('rejects an empty field', () => {
      expect(() => parseField('', FIELD_DOMAINS.day)).toThrow(EmptyFieldError)
    })

    it('rejects a whitespace-only field', () => {
      expect(() => parseField('   ', FIELD_DOMAINS.day)).toThrow(EmptyFieldError)
    })

    it('rejects a range with three parts', () => {
      expect(() => parseField('1-2-3', FIELD_DOMAINS.day)).toThrow(MalformedRuleError)
    })

    it('rejects an open-ended range', () => {
      expect(() => parseField('5-', FIELD_DOMAINS.day)).toThrow(MalformedRuleError)
    })

    it('rejects an empty list entry', () => {
      expect(() => parseField('1,,3', FIELD_DOMAINS.day)).toThrow(MalformedRuleError)
    })
  })
})

// ============================================================================
// 2. RULE PARSING
// ============================================================================

describe('parseRule', () => {
  it('parses the four fields in order', () => {
    const rule = parseRule('9:00-17:00|mon-fri|*|*')
    expect(rule).toEqual({
      source: '9:00-17:00|mon-fri|*|*',
      negated: false,
      time: ranges([540, 1020]),
      weekday: ranges([0, 4]),
      day: { type: 'wildcard' },
      month: { type: 'wildcard' },
    })
  })

  it('strips a leading ! and marks the rule negated', () => {
    const rule = parseRule('!*|thu|22-28|nov')
    expect(rule.negated).toBe(true)
    expect(rule.source).toBe('!*|thu|22-28|nov')
    expect(rule.weekday).toEqual(ranges([3, 3]))
    expect(rule.day).toEqual(ranges([22, 28]))
    expect(rule.month).toEqual(ranges([11, 11]))
  })

  it('tolerates whitespace around fields', () => {
    const rule = parseRule(' 9:00-17:00 | mon-fri | * | * ')
    expect(rule.time).toEqual(ranges([540, 1020]))
    expect(rule.weekday).toEqual(ranges([0, 4]))
  })

  it('rejects two fields', () => {
    expect(() => parseRule('only-two|fields')).toThrow(MalformedRuleError)
  })

  it('rejects five fields', () => {
    expect(() => parseRule('*|*|*|*|UTC')).toThrow(MalformedRuleError)
  })

  it('rejects a lone !', () => {
    expect(() => parseRule('!')).toThrow(MalformedRuleError)
  })

  it('rejects an empty field instead of treating it as a wildcard', () => {
    expect(() => parseRule('*||*|*')).toThrow(EmptyFieldError)
  })

  it('rejects month 13', () => {
    expect(() => parseRule('*|*|*|13')).toThrow(InvalidValueError)
  })

  describe('error context', () => {
    it('records the rule and field of an invalid value', () => {
      try {
        parseRule('*|*|*|13')
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidValueError)
        if (!(err instanceof InvalidValueError)) return
        expect(err.code).toBe(TimespanErrorCode.INVALID_VALUE)
        expect(err.rule).toBe('*|*|*|13')
        expect(err.field).toBe('month')
        expect(err.message).toBe("month value '13' is outside 1-12 in month field of '*|*|*|13'")
      }
    })

    it('records the rule of a malformed rule', () => {
      try {
        parseRule('only-two|fields')
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedRuleError)
        if (!(err instanceof MalformedRuleError)) return
        expect(err.rule).toBe('only-two|fields')
        expect(err.field).toBeUndefined()
        expect(err.message).toBe("Rule 'only-two|fields' has 2 fields, expected time|weekday|day|month")
      }
    })

    it('names the weekday field of an unknown name', () => {
      try {
        parseRule('*|mon-fry|*|*')
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(UnknownNameError)
        if (!(err instanceof UnknownNameError)) return
        expect(err.field).toBe('weekday')
        expect(err.message).toBe("Unknown weekday name 'fry' in weekday field of '*|mon-fry|*|*'")
      }
    })
  })
})

describe('parseRules', () => {
  it('parses every rule in order', () => {
    const rules = parseRules(['*|*|*|*', '!*|*|1|jan'])
    expect(rules).toHaveLength(2)
    expect(rules[0]?.negated).toBe(false)
    expect(rules[1]?.negated).toBe(true)
  })

  it('fails on the first malformed rule', () => {
    expect(() => parseRules(['*|*|*|*', '*|*|32|*'])).toThrow(InvalidValueError)
  })
})

// ============================================================================
// 3. VALIDATION
// ============================================================================

describe('validateRule', () => {
  it('returns Ok with the parsed rule', () => {
    const result = validateRule('*|sat,sun|*|*')
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.weekday).toEqual(ranges([5, 5], [6, 6]))
  })

  it('returns Err with the parse error', () => {
    const result = validateRule('*|*|*|dec-jam')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UnknownNameError)
      expect(result.error.code).toBe('UNKNOWN_NAME')
    }
  })
})

// ============================================================================
// 4. FORMATTING
// ============================================================================

describe('formatRule', () => {
  it('writes canonical names and H:MM times', () => {
    expect(formatRule(parseRule('09:00-17:30|Monday-FRIDAY|*|*'))).toBe('9:00-17:30|mon-fri|*|*')
  })

  it('collapses single values and keeps the negation', () => {
    expect(formatRule(parseRule('!*|4|25-25|12'))).toBe('!*|fri|25|dec')
  })

  it('keeps comma lists and wraparound order', () => {
    expect(formatRule(parseRule('22:00-6:05,12:00|sat-mon|28-3|nov-feb'))).toBe(
      '22:00-6:05,12:00|sat-mon|28-3|nov-feb'
    )
  })

  it('re-parses to the same field specs', () => {
    const rule = parseRule('!0:15-23:45|tue,thu|1-15|3-5')
    const reparsed = parseRule(formatRule(rule))
    expect(reparsed.negated).toBe(rule.negated)
    expect(reparsed.time).toEqual(rule.time)
    expect(reparsed.weekday).toEqual(rule.weekday)
    expect(reparsed.day).toEqual(rule.day)
    expect(reparsed.month).toEqual(rule.month)
  })
})
