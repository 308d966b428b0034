/**
 * Rule Types
 *
 * A rule is one independently testable constraint over a single kind of
 * value. Rules are tagged with the kind they validate; the runner only ever
 * hands a rule candidates of that kind.
 */

import type { FuzzyDate } from './fuzzy-date'
import type { FuzzyDateRange } from './fuzzy-date-range'

// ============================================================================
// Targets
// ============================================================================

/** Maps each rule target tag to the value type it validates. */
export type RuleCandidates = {
  fuzzyDate: FuzzyDate
  fuzzyDateRange: FuzzyDateRange
}

export type RuleTarget = keyof RuleCandidates

export type Candidate = RuleCandidates[RuleTarget]

export const RULE_TARGETS: readonly RuleTarget[] = ['fuzzyDate', 'fuzzyDateRange']

export function isRuleTarget(value: string): value is RuleTarget {
  return (RULE_TARGETS as readonly string[]).includes(value)
}

// ============================================================================
// Rules
// ============================================================================

export type RuleViolation = {
  message: string
  value?: unknown
  /** Reported as an OutOfRangeError rather than a plain ValidationError */
  outOfRange?: boolean
}

export interface Rule<K extends RuleTarget = RuleTarget> {
  readonly name: string
  readonly target: K
  /** Returns undefined to accept the candidate. Must not mutate anything. */
  check(candidate: RuleCandidates[K]): RuleViolation | undefined
}

/** A rule for any one target, discriminated by `target`. */
export type AnyRule = { [K in RuleTarget]: Rule<K> }[RuleTarget]

export function defineRule<K extends RuleTarget>(
  target: K,
  name: string,
  check: (candidate: RuleCandidates[K]) => RuleViolation | undefined
): Rule<K> {
  return Object.freeze({ name, target, check })
}
