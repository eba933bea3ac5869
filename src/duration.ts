/**
 * Duration Strings
 *
 * Conversion between structured durations and .NET TimeSpan strings in the
 * three standard formats:
 *
 *   'c'  constant       [-][d.]hh:mm:ss[.fffffff]   invariant
 *   'g'  general short  [-][d:]h:mm:ss[.FFFFFFF]    locale decimal separator
 *   'G'  general long   [-]d:hh:mm:ss.fffffff       locale decimal separator
 *
 * Fractions are written in 100 ns ticks; values are kept to microsecond
 * precision. Independent of the timespan rule matcher.
 */

import { isValidDecimalSeparator, loadConfig, localeDecimalSeparator } from './config'
import { DurationFormatError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type DurationSpecifier = 'c' | 'g' | 'G'

export type DurationParts = {
  days?: number
  hours?: number
  minutes?: number
  seconds?: number
  milliseconds?: number
}

/** A parsed duration string. Components are non-negative; the sign is separate. */
export type TimeSpan = {
  negative: boolean
  days: number
  hours: number
  minutes: number
  seconds: number
  /** Sub-second part in 100 ns ticks, 0..9_999_999 */
  ticks: number
}

export type DurationFormatOptions = {
  /** Overrides the locale and the environment */
  decimalSeparator?: string
  /** BCP 47 tag whose number format supplies the decimal separator */
  locale?: string
}

// ============================================================================
// Constants
// ============================================================================

const TICKS_PER_SECOND = 10_000_000
const TICKS_PER_MICROSECOND = 10
const TICK_DIGITS = 7

const MICROS_PER_SECOND = 1_000_000
const MICROS_PER_MINUTE = 60 * MICROS_PER_SECOND
const MICROS_PER_HOUR = 60 * MICROS_PER_MINUTE
const MICROS_PER_DAY = 24 * MICROS_PER_HOUR

// The fraction separator is any single character a formatter may emit (see isValidDecimalSeparator)
const DURATION_PATTERN = /^(-?)(?:(\d+)[:.])?(\d{1,2}):(\d{2}):(\d{2})(?:[^\d:\-\s](\d{1,7}))?$/u

// ============================================================================
// Helpers
// ============================================================================

function totalSecondsOf(input: number | DurationParts): number {
  if (typeof input === 'number') return input
  return (
    (input.days ?? 0) * 86_400 +
    (input.hours ?? 0) * 3_600 +
    (input.minutes ?? 0) * 60 +
    (input.seconds ?? 0) +
    (input.milliseconds ?? 0) / 1_000
  )
}

function separatorForLocale(locale: string): string {
  try {
    return localeDecimalSeparator(locale)
  } catch (err) {
    if (err instanceof RangeError) throw new DurationFormatError(`Invalid locale '${locale}'`)
    throw err
  }
}

function resolveDecimalSeparator(options: DurationFormatOptions): string {
  let separator: string
  if (options.decimalSeparator !== undefined) separator = options.decimalSeparator
  else if (options.locale !== undefined) separator = separatorForLocale(options.locale)
  else return loadConfig().decimalSeparator

  if (!isValidDecimalSeparator(separator)) {
    throw new DurationFormatError(
      `Decimal separator must be a single non-digit character other than ':', '-' or whitespace, got '${separator}'`
    )
  }
  return separator
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0')
}

// ============================================================================
// Formatting
// ============================================================================

export function toDurationString(
  specifier: DurationSpecifier,
  input: number | DurationParts,
  options: DurationFormatOptions = {}
): string {
  const total = totalSecondsOf(input)
  if (!Number.isFinite(total)) {
    throw new DurationFormatError(`Cannot format a non-finite duration: ${total}`)
  }

  let micros = Math.round(Math.abs(total) * MICROS_PER_SECOND)
  const negative = total < 0 && micros > 0

  const days = Math.floor(micros / MICROS_PER_DAY)
  micros -= days * MICROS_PER_DAY
  const hours = Math.floor(micros / MICROS_PER_HOUR)
  micros -= hours * MICROS_PER_HOUR
  const minutes = Math.floor(micros / MICROS_PER_MINUTE)
  micros -= minutes * MICROS_PER_MINUTE
  const seconds = Math.floor(micros / MICROS_PER_SECOND)
  micros -= seconds * MICROS_PER_SECOND
  const ticks = micros * TICKS_PER_MICROSECOND

  const hh = pad(hours, specifier === 'g' ? 1 : 2)
  const clock = `${hh}:${pad(minutes, 2)}:${pad(seconds, 2)}`

  let fraction = ''
  if (ticks > 0 || specifier === 'G') {
    const separator = specifier === 'c' ? '.' : resolveDecimalSeparator(options)
    const digits = pad(ticks, TICK_DIGITS)
    fraction = separator + (specifier === 'g' ? digits.replace(/0+$/, '') : digits)
  }

  let dayPart = ''
  if (days > 0 || specifier === 'G') {
    dayPart = `${days}${specifier === 'c' ? '.' : ':'}`
  }

  return `${negative ? '-' : ''}${dayPart}${clock}${fraction}`
}

export function constant(input: number | DurationParts): string {
  return toDurationString('c', input)
}

export function generalShort(input: number | DurationParts, options?: DurationFormatOptions): string {
  return toDurationString('g', input, options)
}

export function generalLong(input: number | DurationParts, options?: DurationFormatOptions): string {
  return toDurationString('G', input, options)
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a duration string in any of the three formats. Any separator the
 * formatter accepts is read back as the decimal separator.
 */
export function fromDurationString(text: string): TimeSpan {
  const match = DURATION_PATTERN.exec(text.trim())
  if (!match) throw new DurationFormatError(`Invalid duration string: '${text}'`)

  const [, sign, d, h = '', m = '', s = '', f] = match
  const span: TimeSpan = {
    negative: sign === '-',
    days: d === undefined ? 0 : parseInt(d, 10),
    hours: parseInt(h, 10),
    minutes: parseInt(m, 10),
    seconds: parseInt(s, 10),
    ticks: f === undefined ? 0 : parseInt(f.padEnd(TICK_DIGITS, '0'), 10),
  }

  if (span.hours > 23) throw new DurationFormatError(`Hours out of range in duration: '${text}'`)
  if (span.minutes > 59) throw new DurationFormatError(`Minutes out of range in duration: '${text}'`)
  if (span.seconds > 59) throw new DurationFormatError(`Seconds out of range in duration: '${text}'`)

  return span
}

export function totalSeconds(input: string | TimeSpan): number {
  const span = typeof input === 'string' ? fromDurationString(input) : input
  const magnitude =
    span.days * 86_400 + span.hours * 3_600 + span.minutes * 60 + span.seconds + span.ticks / TICKS_PER_SECOND
  return span.negative ? -magnitude : magnitude
}
