/**
 * Environment Configuration
 *
 * TIMESPAN_DECIMAL_SEPARATOR - decimal separator for 'g' and 'G' durations
 * TIMESPAN_LOCALE            - either a separator character, or a BCP 47 tag
 *                              whose number format supplies the separator
 *
 * TIMESPAN_DECIMAL_SEPARATOR wins when both are set. With neither set the
 * separator is '.', whatever the process locale.
 */

import { ConfigError } from './errors'

export type TimespanConfig = {
  decimalSeparator: string
}

const DEFAULT_DECIMAL_SEPARATOR = '.'

// A separator must not be confusable with the digits, ':' or '-' around it
const INVALID_SEPARATOR = /[\d:\-\s]/

export function isValidDecimalSeparator(separator: string): boolean {
  return [...separator].length === 1 && !INVALID_SEPARATOR.test(separator)
}

/** Decimal separator of a locale's number format; throws RangeError for a malformed tag */
export function localeDecimalSeparator(locale: string): string {
  const parts = new Intl.NumberFormat(locale).formatToParts(1.5)
  return parts.find((p) => p.type === 'decimal')?.value ?? DEFAULT_DECIMAL_SEPARATOR
}

function separatorFromLocale(value: string): string {
  if (isValidDecimalSeparator(value)) return value
  try {
    return localeDecimalSeparator(value)
  } catch (err) {
    if (err instanceof RangeError) {
      throw new ConfigError(`TIMESPAN_LOCALE must be a separator character or a locale tag, got '${value}'`)
    }
    throw err
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): TimespanConfig {
  const explicit = env.TIMESPAN_DECIMAL_SEPARATOR ?? ''
  const locale = env.TIMESPAN_LOCALE ?? ''

  let separator = DEFAULT_DECIMAL_SEPARATOR
  if (explicit !== '') separator = explicit
  else if (locale !== '') separator = separatorFromLocale(locale)

  if (!isValidDecimalSeparator(separator)) {
    const source = explicit !== '' ? 'TIMESPAN_DECIMAL_SEPARATOR' : 'TIMESPAN_LOCALE'
    throw new ConfigError(
      `${source} must give a single non-digit character other than ':', '-' or whitespace, got '${separator}'`
    )
  }
  return { decimalSeparator: separator }
}
