/**
 * FuzzyDate
 *
 * A calendar date whose year, month and/or day may be unknown. Every factory
 * funnels through one private constructor that runs the rules of the given
 * RulesRunner; an instance that exists has passed all of them and is frozen.
 */

import {
  type CalendarDate,
  addDays as addCalendarDays,
  addMonths as addCalendarMonths,
  daysInMonth,
  formatLongDate,
  formatMonthYear,
  fromJsDate,
  isLeapYear as isGregorianLeapYear,
  pad2,
  pad4,
  today as calendarToday,
} from './calendar'
import { FormatError, ValidationError } from './errors'
import { requireSink, type FieldSink } from './fields'
import { Err, Ok, type Result } from './result'
import { defaultRulesRunner, type RulesRunner } from './rules-runner'

// ============================================================================
// Types
// ============================================================================

/** Component bag accepted by `FuzzyDate.of` and produced by `toJSON`. */
export type FuzzyDateParts = {
  year?: number
  month?: number
  day?: number
}

// ============================================================================
// Helpers
// ============================================================================

/** Absence sorts before presence; present values compare numerically. */
function compareComponent(a: number | undefined, b: number | undefined): -1 | 0 | 1 {
  if (a === undefined) return b === undefined ? 0 : -1
  if (b === undefined) return 1
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

function parseComponent(text: string, start: number, end: number, field: string): number {
  const slice = text.substring(start, end)
  if (!/^\d+$/.test(slice)) {
    throw new FormatError(text, `Invalid ${field} in '${text}': '${slice}' is not a number`)
  }
  return parseInt(slice, 10)
}

// ============================================================================
// FuzzyDate
// ============================================================================

export class FuzzyDate {
  readonly kind = 'fuzzyDate' as const
  readonly year: number | undefined
  readonly month: number | undefined
  readonly day: number | undefined
  /** The context this value was validated by; derived values reuse it. */
  readonly rules: RulesRunner

  private constructor(
    year: number | undefined,
    month: number | undefined,
    day: number | undefined,
    rules: RulesRunner
  ) {
    this.year = year
    this.month = month
    this.day = day
    this.rules = rules

    rules.runRules(this)
    Object.freeze(this)
  }

  // ========== Factories ==========

  /** Any combination of components. */
  static of(parts: FuzzyDateParts = {}, rules: RulesRunner = defaultRulesRunner): FuzzyDate {
    return new FuzzyDate(parts.year, parts.month, parts.day, rules)
  }

  static unknown(rules: RulesRunner = defaultRulesRunner): FuzzyDate {
    return new FuzzyDate(undefined, undefined, undefined, rules)
  }

  /** The current local calendar date. */
  static today(rules: RulesRunner = defaultRulesRunner): FuzzyDate {
    return FuzzyDate.fromCalendar(calendarToday(), rules)
  }

  static fromCalendarDate(
    year: number,
    month: number,
    day: number,
    rules: RulesRunner = defaultRulesRunner
  ): FuzzyDate {
    return new FuzzyDate(year, month, day, rules)
  }

  static fromYearMonth(year: number, month: number, rules: RulesRunner = defaultRulesRunner): FuzzyDate {
    return new FuzzyDate(year, month, undefined, rules)
  }

  static fromYear(year: number, rules: RulesRunner = defaultRulesRunner): FuzzyDate {
    return new FuzzyDate(year, undefined, undefined, rules)
  }

  static fromCalendar(date: CalendarDate, rules: RulesRunner = defaultRulesRunner): FuzzyDate {
    return new FuzzyDate(date.year, date.month, date.day, rules)
  }

  /** Local calendar components of a JS Date. An invalid Date fails validation. */
  static fromDate(date: Date, rules: RulesRunner = defaultRulesRunner): FuzzyDate {
    return FuzzyDate.fromCalendar(fromJsDate(date), rules)
  }

  /**
   * Parses "YYYY", "YYYY/MM" or "YYYY/MM/DD" by fixed-width slicing on
   * length alone; separators are never inspected.
   *
   * - shorter than 4: unknown date
   * - 4 to 6: year from [0, 4)
   * - 7 or more: month from [5, 7) as well
   * - exactly 10: day from [8, 10) as well
   *
   * @throws FormatError when a slice is not a number
   * @throws ValidationError when the components break a rule
   */
  static parse(text: string, rules: RulesRunner = defaultRulesRunner): FuzzyDate {
    let year: number | undefined
    let month: number | undefined
    let day: number | undefined

    if (text.length >= 4) {
      year = parseComponent(text, 0, 4, 'year')

      if (text.length >= 7) {
        month = parseComponent(text, 5, 7, 'month')

        if (text.length === 10) {
          day = parseComponent(text, 8, 10, 'day')
        }
      }
    }

    return new FuzzyDate(year, month, day, rules)
  }

  static tryParse(
    text: string,
    rules: RulesRunner = defaultRulesRunner
  ): Result<FuzzyDate, FormatError | ValidationError> {
    try {
      return Ok(FuzzyDate.parse(text, rules))
    } catch (e) {
      if (e instanceof FormatError || e instanceof ValidationError) return Err(e)
      throw e
    }
  }

  static tryCreate(
    parts: FuzzyDateParts,
    rules: RulesRunner = defaultRulesRunner
  ): Result<FuzzyDate, ValidationError> {
    try {
      return Ok(FuzzyDate.of(parts, rules))
    } catch (e) {
      if (e instanceof ValidationError) return Err(e)
      throw e
    }
  }

  /** For `Array#sort`. */
  static compare(a: FuzzyDate, b: FuzzyDate): -1 | 0 | 1 {
    return a.compareTo(b)
  }

  // ========== Inspection ==========

  /** Number of leading populated components: year, then month, then day. */
  get specificity(): 0 | 1 | 2 | 3 {
    if (this.year === undefined) return 0
    if (this.month === undefined) return 1
    if (this.day === undefined) return 2
    return 3
  }

  get isUnknown(): boolean {
    return this.year === undefined && this.month === undefined && this.day === undefined
  }

  get isComplete(): boolean {
    return this.year !== undefined && this.month !== undefined && this.day !== undefined
  }

  isLeapYear(): boolean {
    if (this.year === undefined) return false
    return isGregorianLeapYear(this.year)
  }

  // ========== Comparison ==========

  /**
   * Year, then month, then day. At each level an absent component sorts
   * before a present one and two absent components tie.
   */
  compareTo(other: FuzzyDate): -1 | 0 | 1 {
    return (
      compareComponent(this.year, other.year) ||
      compareComponent(this.month, other.month) ||
      compareComponent(this.day, other.day)
    )
  }

  equals(other: FuzzyDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day
  }

  isBefore(other: FuzzyDate): boolean {
    return this.compareTo(other) < 0
  }

  isAfter(other: FuzzyDate): boolean {
    return this.compareTo(other) > 0
  }

  // ========== Derived Values ==========

  addYears(n: number): FuzzyDate {
    const year = this.year === undefined ? undefined : this.year + n
    return new FuzzyDate(year, this.month, this.day, this.rules)
  }

  /**
   * Without a month this is an unchanged copy. With one, the result is
   * computed on `toCalendarDate()` and is always complete: an unknown year
   * becomes 1 and an unknown day becomes the 1st.
   */
  addMonths(n: number): FuzzyDate {
    if (this.month === undefined) {
      return new FuzzyDate(this.year, this.month, this.day, this.rules)
    }
    return FuzzyDate.fromCalendar(addCalendarMonths(this.toCalendarDate(), n), this.rules)
  }

  /** Same pattern as `addMonths`, keyed on the day. */
  addDays(n: number): FuzzyDate {
    if (this.day === undefined) {
      return new FuzzyDate(this.year, this.month, this.day, this.rules)
    }
    return FuzzyDate.fromCalendar(addCalendarDays(this.toCalendarDate(), n), this.rules)
  }

  /**
   * Lossy: unknown components become 1, the year is floored at 1 and the day
   * is clamped to the month length (a yearless Feb 29 lands on 0001-02-28).
   */
  toCalendarDate(): CalendarDate {
    const year = Math.max(this.year ?? 1, 1)
    const month = this.month ?? 1
    const day = Math.min(this.day ?? 1, daysInMonth(year, month))
    return { year, month, day }
  }

  // ========== Output ==========

  /** "YYYY", "YYYY/MM" or "YYYY/MM/DD"; empty when the year is unknown. */
  toCanonicalString(): string {
    if (this.year === undefined) return ''
    if (this.month === undefined) return pad4(this.year)
    if (this.day === undefined) return `${pad4(this.year)}/${pad2(this.month)}`
    return `${pad4(this.year)}/${pad2(this.month)}/${pad2(this.day)}`
  }

  /**
   * Diagnostic rendering only. Consumers should format through their own
   * display layer.
   */
  toString(): string {
    if (this.year === undefined) return 'unknown date'
    if (this.month === undefined) return String(this.year)
    if (this.day === undefined) return formatMonthYear(this.year, this.month)
    return formatLongDate({ year: this.year, month: this.month, day: this.day })
  }

  writeFields(sink: FieldSink | null | undefined): void {
    const target = requireSink(sink, 'sink')
    target.addValue('Year', this.year)
    target.addValue('Month', this.month)
    target.addValue('Day', this.day)
  }

  toJSON(): FuzzyDateParts {
    const json: FuzzyDateParts = {}
    if (this.year !== undefined) json.year = this.year
    if (this.month !== undefined) json.month = this.month
    if (this.day !== undefined) json.day = this.day
    return json
  }
}
