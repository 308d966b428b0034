/**
 * Rules Runner
 *
 * The validation context both value types are built through. A runner is
 * immutable: rules are bucketed by target when it is created, and adding
 * rules yields a new runner. Value types hold the runner that built them, so
 * derived values are checked against the same rules.
 */

import { InvalidConfigError, OutOfRangeError, ValidationError } from './errors'
import { BUILT_IN_RULES } from './builtin-rules'
import { createLogger, type Logger } from './logger'
import {
  isRuleTarget,
  type AnyRule,
  type Candidate,
  type Rule,
  type RuleCandidates,
  type RuleTarget,
} from './rules'

// ============================================================================
// Types
// ============================================================================

export type RulesConfig = {
  /** Appended after the built-ins, in order */
  rules?: readonly AnyRule[]
  /** Include BUILT_IN_RULES (default true) */
  builtIns?: boolean
  logger?: Logger
  /** Used when no logger is given */
  logLevel?: string
}

type RuleBuckets = { readonly [K in RuleTarget]: ReadonlyArray<Rule<K>> }

// ============================================================================
// Runner
// ============================================================================

function bucketRules(rules: readonly AnyRule[]): RuleBuckets {
  const names = new Set<string>()
  const fuzzyDate: Rule<'fuzzyDate'>[] = []
  const fuzzyDateRange: Rule<'fuzzyDateRange'>[] = []

  for (const rule of rules) {
    const { name, target } = rule
    if (!isRuleTarget(target)) {
      throw new InvalidConfigError(`Rule '${name}' has unknown target '${String(target)}'`)
    }
    if (names.has(name)) {
      throw new InvalidConfigError(`Duplicate rule name: '${name}'`)
    }
    names.add(name)

    switch (rule.target) {
      case 'fuzzyDate':
        fuzzyDate.push(rule)
        break
      case 'fuzzyDateRange':
        fuzzyDateRange.push(rule)
        break
    }
  }

  return { fuzzyDate, fuzzyDateRange }
}

export class RulesRunner {
  readonly logger: Logger
  private readonly all: readonly AnyRule[]
  private readonly buckets: RuleBuckets

  constructor(rules: readonly AnyRule[], logger: Logger) {
    this.buckets = bucketRules(rules)
    this.all = Object.freeze([...rules])
    this.logger = logger
    Object.freeze(this)
  }

  /** Every rule, in registration order. */
  get rules(): readonly AnyRule[] {
    return this.all
  }

  rulesFor<K extends RuleTarget>(kind: K): ReadonlyArray<Rule<K>> {
    return this.buckets[kind]
  }

  withRules(...rules: AnyRule[]): RulesRunner {
    return new RulesRunner([...this.all, ...rules], this.logger)
  }

  /**
   * Runs every rule targeting the candidate's kind, in registration order.
   * Throws on the first violation; later rules are not evaluated.
   */
  runRules(candidate: Candidate): void {
    switch (candidate.kind) {
      case 'fuzzyDate':
        this.apply('fuzzyDate', candidate)
        break
      case 'fuzzyDateRange':
        this.apply('fuzzyDateRange', candidate)
        break
    }
  }

  private apply<K extends RuleTarget>(kind: K, candidate: RuleCandidates[K]): void {
    const rules: ReadonlyArray<Rule<K>> = this.buckets[kind]
    for (const rule of rules) {
      const violation = rule.check(candidate)
      if (violation === undefined) continue

      this.logger.debug({ rule: rule.name, kind, value: violation.value }, violation.message)
      throw violation.outOfRange
        ? new OutOfRangeError(rule.name, violation.message, violation.value)
        : new ValidationError(rule.name, violation.message, violation.value)
    }
  }
}

// ============================================================================
// Construction
// ============================================================================

export function createRulesRunner(config: RulesConfig = {}): RulesRunner {
  const builtIns = config.builtIns ?? true
  const rules = [...(builtIns ? BUILT_IN_RULES : []), ...(config.rules ?? [])]
  const logger = config.logger ?? createLogger({ level: config.logLevel })
  logger.debug({ rules: rules.map((r) => r.name) }, 'rules runner created')
  return new RulesRunner(rules, logger)
}

/** Built-in rules, logging per FUZZY_DATES_LOG_LEVEL. Created once at load. */
export const defaultRulesRunner: RulesRunner = createRulesRunner()
