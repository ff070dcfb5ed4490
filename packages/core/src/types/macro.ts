import type { CompileResult } from './compiled'
import type { DispatchError, InvalidRuleError, RuleFailure, RuleGeneratorError } from './errors'
import type { CaptureList, MatchableToken } from './token'

// =============================================================================
// RULES
// =============================================================================

/**
 * Builds a value from a matched token sequence.
 *
 * Captures reference the input tokens; copy what must outlive the call.
 * Throw a `GeneratorError` to report that no value can be built.
 *
 * @public
 */
export type Generator<T extends MatchableToken, V> = (tokens: readonly T[], captures: CaptureList<T>) => V

/**
 * A pattern paired with the generator that runs when it matches.
 * @public
 */
export interface Rule<T extends MatchableToken, V> {
  /** Pattern source, as written */
  readonly pattern: string

  readonly generator: Generator<T, V>

  /**
   * The compiled pattern, or the parse error of a pattern that does not parse.
   * Parsed on first call and cached for the life of the rule.
   */
  compiled(): CompileResult
}

// =============================================================================
// DISPATCHER
// =============================================================================

/**
 * Outcome of {@link Dispatcher.expand}.
 * @public
 */
export type ExpandResult<V> =
  | {
      readonly ok: true
      readonly value: V

      /** Index of the rule that produced the value */
      readonly ruleIndex: number
    }
  | {
      readonly ok: false
      readonly error: ExpandError
    }

/**
 * Why {@link Dispatcher.expand} produced no value.
 *
 * `INVALID_RULE_PATTERN` means a rule that does not parse was reached before
 * the rule that matched.
 *
 * @public
 */
export type ExpandError = DispatchError | InvalidRuleError | RuleGeneratorError

/**
 * Outcome of {@link Dispatcher.tryExpand}. A missing value means no rule
 * applied; only broken rule patterns are reported as errors.
 * @public
 */
export type TryExpandResult<V> =
  | {
      readonly ok: true
      readonly value: V | undefined
    }
  | {
      readonly ok: false
      readonly error: InvalidRuleError
    }

/**
 * An ordered list of rules. The first rule whose pattern matches the whole
 * token sequence produces the value.
 * @public
 */
export interface Dispatcher<T extends MatchableToken, V> {
  /** Rules in priority order */
  readonly rules: readonly Rule<T, V>[]

  /** Run the first matching rule, or explain why none matched. */
  expand(tokens: readonly T[]): ExpandResult<V>

  /**
   * Run the first matching rule; absence when none applies. Rules that do
   * not parse are reported whenever they are reached.
   */
  tryExpand(tokens: readonly T[]): TryExpandResult<V>

  /** Parse every rule pattern now, returning the ones that fail. */
  validate(): readonly RuleFailure[]
}
