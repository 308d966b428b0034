/**
 * Built-in Rules
 *
 * The default rule set, applied in the order of BUILT_IN_RULES, plus the
 * opt-in hierarchy rules that are not part of it.
 */

import { daysInMonth, maxDaysInMonth } from './calendar'
import { defineRule, type AnyRule } from './rules'

// ============================================================================
// FuzzyDate Rules
// ============================================================================

export const componentsMustBeIntegers = defineRule('fuzzyDate', 'componentsMustBeIntegers', (date) => {
  const components = [
    ['Year', date.year],
    ['Month', date.month],
    ['Day', date.day],
  ] as const
  for (const [field, value] of components) {
    if (value !== undefined && !Number.isSafeInteger(value)) {
      return { message: `${field} must be an integer, got ${value}`, value }
    }
  }
  return undefined
})

export const monthMustBeInRange = defineRule('fuzzyDate', 'monthMustBeInRange', (date) => {
  const month = date.month
  if (month === undefined) return undefined
  if (month < 1 || month > 12) {
    return { message: `Month must be between 1 and 12, got ${month}`, value: month, outOfRange: true }
  }
  return undefined
})

/**
 * Day must exist in its month. Without a year, February allows the 29th;
 * without a month, any day up to 31 passes.
 */
export const dayMustBeInRange = defineRule('fuzzyDate', 'dayMustBeInRange', (date) => {
  const { year, month, day } = date
  if (day === undefined) return undefined

  let max = 31
  if (month !== undefined) {
    max = year !== undefined ? daysInMonth(year, month) : maxDaysInMonth(month)
  }

  if (day < 1 || day > max) {
    return { message: `Day must be between 1 and ${max}, got ${day}`, value: day, outOfRange: true }
  }
  return undefined
})

// ============================================================================
// FuzzyDateRange Rules
// ============================================================================

/** Only complete endpoints are ordered; partial ones may overlap freely. */
export const rangeMustNotBeInverted = defineRule('fuzzyDateRange', 'rangeMustNotBeInverted', (range) => {
  const { from, to } = range
  if (!from.isComplete || !to.isComplete) return undefined
  if (to.compareTo(from) < 0) {
    return {
      message: `Range end ${to.toCanonicalString()} precedes start ${from.toCanonicalString()}`,
      value: { from: from.toCanonicalString(), to: to.toCanonicalString() },
    }
  }
  return undefined
})

export const BUILT_IN_RULES: readonly AnyRule[] = [
  componentsMustBeIntegers,
  monthMustBeInRange,
  dayMustBeInRange,
  rangeMustNotBeInverted,
]

// ============================================================================
// Opt-in Rules
// ============================================================================

export const monthRequiresYear = defineRule('fuzzyDate', 'monthRequiresYear', (date) => {
  if (date.month !== undefined && date.year === undefined) {
    return { message: 'Month cannot be set while year is unknown', value: date.month }
  }
  return undefined
})

export const dayRequiresMonth = defineRule('fuzzyDate', 'dayRequiresMonth', (date) => {
  if (date.day !== undefined && date.month === undefined) {
    return { message: 'Day cannot be set while month is unknown', value: date.day }
  }
  return undefined
})
