/**
 * fuzzy-dates
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  FuzzyDateError, FuzzyDateErrorCode,
  ValidationError, OutOfRangeError, InvalidConfigError,
  FormatError, NullArgumentError,
} from './errors'
export type { FuzzyDateErrorCode as FuzzyDateErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Calendar helpers
export type { CalendarDate, Weekday } from './calendar'
export {
  isLeapYear, daysInMonth, maxDaysInMonth, daysInYear,
  makeCalendarDate, fromJsDate,
  addDays, addMonths, daysBetween,
  dayOfWeek, compareCalendarDates,
  monthName, formatMonthYear, formatLongDate,
} from './calendar'

// Branded types
export type { Duration } from './core'
export { makeDuration } from './core'

// Value types
export type { FuzzyDateParts } from './fuzzy-date'
export { FuzzyDate } from './fuzzy-date'
export type { FuzzyDateRangeParts } from './fuzzy-date-range'
export { FuzzyDateRange } from './fuzzy-date-range'

// Structured fields
export type { FieldSink } from './fields'
export { FieldMap } from './fields'

// Rules
export type {
  Rule, AnyRule, RuleViolation, RuleTarget, RuleCandidates, Candidate,
} from './rules'
export { defineRule, isRuleTarget, RULE_TARGETS } from './rules'
export {
  BUILT_IN_RULES,
  componentsMustBeIntegers, monthMustBeInRange, dayMustBeInRange, rangeMustNotBeInverted,
  monthRequiresYear, dayRequiresMonth,
} from './builtin-rules'
export type { RulesConfig } from './rules-runner'
export { RulesRunner, createRulesRunner, defaultRulesRunner } from './rules-runner'

// Logging
export type { Logger, LoggerOptions, LogLevel } from './logger'
export { createLogger, resolveLogLevel, isLogLevel, LOG_LEVEL_ENV } from './logger'
