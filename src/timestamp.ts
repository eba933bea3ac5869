/**
 * Timestamp Decomposition
 *
 * Reduces the accepted timestamp forms to the four integers a rule is
 * evaluated against. No time zone conversion happens here: a Date is read
 * through its local-time getters and a LocalDateTime is taken at face value.
 */

import { FIELD_DOMAINS, FIELD_ORDER, inDomain } from './field-domains'
import { InvalidTimestampError } from './errors'
import type { LocalDateTime, TimestampInput, TimestampParts } from './types'

export type { LocalDateTime, TimestampInput, TimestampParts } from './types'

export type DateTimeFields = {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

// ============================================================================
// Calendar Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

/** Weekday ordinal, 0 = Monday. JDN 0 fell on a Monday. */
export function dayOfWeek(year: number, month: number, day: number): number {
  return ((dateToJDN(year, month, day) % 7) + 7) % 7
}

// ============================================================================
// Parsing
// ============================================================================

const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?$/

export function parseLocalDateTime(str: string): DateTimeFields {
  const match = LOCAL_DATE_TIME.exec(str)
  if (!match) throw new InvalidTimestampError(`Invalid datetime format: '${str}'`)

  const [, y = '', mo = '', d = '', h = '', mi = '', s] = match
  const fields: DateTimeFields = {
    year: parseInt(y, 10),
    month: parseInt(mo, 10),
    day: parseInt(d, 10),
    hour: parseInt(h, 10),
    minute: parseInt(mi, 10),
    second: s === undefined ? 0 : parseInt(s, 10),
  }

  if (fields.month < 1 || fields.month > 12)
    throw new InvalidTimestampError(`Invalid month in datetime: '${str}'`)
  if (fields.day < 1 || fields.day > daysInMonth(fields.year, fields.month))
    throw new InvalidTimestampError(`Invalid day in datetime: '${str}'`)
  if (fields.hour > 23 || fields.minute > 59 || fields.second > 59)
    throw new InvalidTimestampError(`Invalid time in datetime: '${str}'`)

  return fields
}

// ============================================================================
// Decomposition
// ============================================================================

function fromFields(fields: DateTimeFields): TimestampParts {
  return {
    minuteOfDay: fields.hour * 60 + fields.minute,
    weekday: dayOfWeek(fields.year, fields.month, fields.day),
    day: fields.day,
    month: fields.month,
  }
}

function fromDate(date: Date): TimestampParts {
  if (Number.isNaN(date.getTime())) throw new InvalidTimestampError('Invalid Date')
  return {
    minuteOfDay: date.getHours() * 60 + date.getMinutes(),
    // getDay() counts from Sunday
    weekday: (date.getDay() + 6) % 7,
    day: date.getDate(),
    month: date.getMonth() + 1,
  }
}

function checkParts(parts: TimestampParts): TimestampParts {
  for (const field of FIELD_ORDER) {
    const value = field === 'time' ? parts.minuteOfDay : parts[field]
    if (!inDomain(value, FIELD_DOMAINS[field])) {
      const name = field === 'time' ? 'minuteOfDay' : field
      throw new InvalidTimestampError(
        `Timestamp ${name} ${value} is outside ${FIELD_DOMAINS[field].min}-${FIELD_DOMAINS[field].max}`
      )
    }
  }
  return parts
}

export function toTimestampParts(input: TimestampInput): TimestampParts {
  if (input instanceof Date) return fromDate(input)
  if (typeof input === 'string') return fromFields(parseLocalDateTime(input))
  return checkParts(input)
}

export function makeLocalDateTime(fields: Omit<DateTimeFields, 'second'> & { second?: number }): LocalDateTime {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0')
  const time = `${pad(fields.hour)}:${pad(fields.minute)}:${pad(fields.second ?? 0)}`
  const str = `${pad(fields.year, 4)}-${pad(fields.month)}-${pad(fields.day)}T${time}`
  parseLocalDateTime(str)
  return str as LocalDateTime
}
