/**
 * FuzzyDateRange
 *
 * An immutable pair of FuzzyDate endpoints, validated by the
 * fuzzyDateRange rules of its RulesRunner.
 */

import { daysBetween } from './calendar'
import { makeDuration, type Duration } from './core'
import { requireSink, type FieldSink } from './fields'
import { FuzzyDate, type FuzzyDateParts } from './fuzzy-date'
import { defaultRulesRunner, type RulesRunner } from './rules-runner'

export type FuzzyDateRangeParts = {
  from?: FuzzyDateParts
  to?: FuzzyDateParts
}

export class FuzzyDateRange {
  readonly kind = 'fuzzyDateRange' as const
  readonly from: FuzzyDate
  readonly to: FuzzyDate
  readonly rules: RulesRunner

  /** A missing endpoint is the unknown date. */
  constructor(
    from?: FuzzyDate | null,
    to?: FuzzyDate | null,
    rules: RulesRunner = defaultRulesRunner
  ) {
    this.from = from ?? FuzzyDate.unknown(rules)
    this.to = to ?? FuzzyDate.unknown(rules)
    this.rules = rules

    rules.runRules(this)
    Object.freeze(this)
  }

  static of(parts: FuzzyDateRangeParts = {}, rules: RulesRunner = defaultRulesRunner): FuzzyDateRange {
    return new FuzzyDateRange(FuzzyDate.of(parts.from, rules), FuzzyDate.of(parts.to, rules), rules)
  }

  static compare(a: FuzzyDateRange, b: FuzzyDateRange): -1 | 0 | 1 {
    return a.compareTo(b)
  }

  /**
   * Signed days from `from` to `to`, measured between the endpoints'
   * `toCalendarDate()` materializations and so just as lossy.
   */
  toDuration(): Duration {
    return makeDuration(daysBetween(this.from.toCalendarDate(), this.to.toCalendarDate()))
  }

  compareTo(other: FuzzyDateRange): -1 | 0 | 1 {
    return this.from.compareTo(other.from) || this.to.compareTo(other.to)
  }

  equals(other: FuzzyDateRange): boolean {
    return this.from.equals(other.from) && this.to.equals(other.to)
  }

  /** Diagnostic rendering only. */
  toString(): string {
    return `${this.from.toString()}-${this.to.toString()}`
  }

  writeFields(sink: FieldSink | null | undefined): void {
    const target = requireSink(sink, 'sink')
    target.addValue('From', this.from)
    target.addValue('To', this.to)
  }

  toJSON(): { from: FuzzyDateParts; to: FuzzyDateParts } {
    return { from: this.from.toJSON(), to: this.to.toJSON() }
  }
}
