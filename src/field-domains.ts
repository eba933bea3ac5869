/**
 * Field Domains
 *
 * The four positional fields of a timespan rule and the ordinal space each
 * one lives in. Bounds and name tables are defined once here and shared
 * read-only by the parser and the evaluator.
 */

export type FieldName = 'time' | 'weekday' | 'day' | 'month'

export type FieldDomain = {
  readonly name: FieldName
  /** Smallest ordinal in the domain */
  readonly min: number
  /** Largest ordinal in the domain */
  readonly max: number
  /** Lowercase name/abbreviation to ordinal, for domains that accept names */
  readonly names?: ReadonlyMap<string, number>
}

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

export type MonthName =
  | 'jan' | 'feb' | 'mar' | 'apr' | 'may' | 'jun'
  | 'jul' | 'aug' | 'sep' | 'oct' | 'nov' | 'dec'

// ============================================================================
// Name Tables
// ============================================================================

/** Index = weekday ordinal (0 = Monday) */
export const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

const WEEKDAY_NAMES = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday']

/** Index + 1 = month ordinal */
export const MONTHS: readonly MonthName[] = [
  'jan', 'feb', 'mar', 'apr', 'may', 'jun',
  'jul', 'aug', 'sep', 'oct', 'nov', 'dec',
]

const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
]

function nameTable(abbreviations: readonly string[], fullNames: readonly string[], first: number): ReadonlyMap<string, number> {
  const table = new Map<string, number>()
  abbreviations.forEach((name, i) => table.set(name, first + i))
  fullNames.forEach((name, i) => table.set(name, first + i))
  return table
}

// ============================================================================
// Domains
// ============================================================================

export const MINUTES_PER_DAY = 1440

export const FIELD_DOMAINS: { readonly [K in FieldName]: FieldDomain & { readonly name: K } } = {
  time: { name: 'time', min: 0, max: MINUTES_PER_DAY - 1 },
  weekday: { name: 'weekday', min: 0, max: 6, names: nameTable(WEEKDAYS, WEEKDAY_NAMES, 0) },
  day: { name: 'day', min: 1, max: 31 },
  month: { name: 'month', min: 1, max: 12, names: nameTable(MONTHS, MONTH_NAMES, 1) },
}

/** Field order as written in a rule */
export const FIELD_ORDER: readonly FieldName[] = ['time', 'weekday', 'day', 'month']

export function inDomain(value: number, domain: FieldDomain): boolean {
  return Number.isInteger(value) && value >= domain.min && value <= domain.max
}
