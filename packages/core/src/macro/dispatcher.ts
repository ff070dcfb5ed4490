/**
 * Macro dispatch - tries rules in order and runs the first match.
 * @packageDocumentation
 */

import type {
  CaptureList,
  Dispatcher,
  ExpandResult,
  InvalidRuleError,
  MatchableToken,
  MatchError,
  PatternError,
  Rule,
  RuleFailure,
  TryExpandResult,
} from '../types'
import { GeneratorError } from '../types'
import { applyQuickReject } from '../compile'
import { matchTokens } from '../match'

/**
 * The rule that matched, with its captures.
 */
interface Selected<T extends MatchableToken, V> {
  readonly rule: Rule<T, V>
  readonly ruleIndex: number
  readonly captures: CaptureList<T>
}

/**
 * Outcome of walking the rules in order.
 */
interface Selection<T extends MatchableToken, V> {
  readonly selected?: Selected<T, V>

  /** Failures of the rules tried before the match (all rules if none matched) */
  readonly ruleErrors: readonly RuleFailure[]
}

/**
 * Compose rules into a macro.
 *
 * Rule order is priority: the first rule whose pattern matches the whole token
 * sequence wins, whatever the rules after it would do. A rule whose pattern
 * does not parse is reported whenever dispatch reaches it.
 *
 * @example
 * const vec = makeDispatcher(
 *   makeRule('vec ! [ ]', (): string[] => []),
 *   makeRule('vec ! [ $e+ ]', (_tokens, captures) => captures.map((c) => c.token)),
 * )
 * vec.expand(['vec', '!', '[', '1', '2', ']']) // => { ok: true, value: ['1', '2'], ruleIndex: 1 }
 *
 * @param rules - Rules in priority order
 * @returns The dispatcher
 *
 * @public
 */
export function makeDispatcher<T extends MatchableToken, V>(...rules: Rule<T, V>[]): Dispatcher<T, V> {
  const frozen = Object.freeze([...rules])

  const expand = (tokens: readonly T[]): ExpandResult<V> => {
    const { selected, ruleErrors } = select(frozen, tokens, false)

    if (selected === undefined) {
      return {
        ok: false,
        error: { code: 'NO_MATCHING_RULE', message: 'no matching rule', ruleErrors },
      }
    }

    const invalid = ruleErrors.filter(isParseFailure)
    if (invalid.length > 0) {
      return { ok: false, error: invalidRules(invalid, frozen.length) }
    }

    return generate(selected, tokens)
  }

  const tryExpand = (tokens: readonly T[]): TryExpandResult<V> => {
    const { selected, ruleErrors } = select(frozen, tokens, true)

    const invalid = ruleErrors.filter(isParseFailure)
    if (invalid.length > 0) {
      return { ok: false, error: invalidRules(invalid, frozen.length) }
    }

    if (selected === undefined) {
      return { ok: true, value: undefined }
    }

    // A generator failure is absence too
    const result = generate(selected, tokens)
    return { ok: true, value: result.ok ? result.value : undefined }
  }

  const validate = (): readonly RuleFailure[] => {
    const failures: RuleFailure[] = []
    for (const [ruleIndex, rule] of frozen.entries()) {
      const compiled = rule.compiled()
      if (!compiled.ok) {
        failures.push({ ruleIndex, pattern: rule.pattern, error: compiled.error })
      }
    }
    return failures
  }

  return { rules: frozen, expand, tryExpand, validate }
}

/**
 * Find the first rule that matches the whole token sequence.
 *
 * With `quick` set, rules the quick-reject filter rules out are skipped
 * without walking their pattern and leave no mismatch behind.
 */
function select<T extends MatchableToken, V>(
  rules: readonly Rule<T, V>[],
  tokens: readonly T[],
  quick: boolean,
): Selection<T, V> {
  const ruleErrors: RuleFailure[] = []

  for (const [ruleIndex, rule] of rules.entries()) {
    const compiled = rule.compiled()
    if (!compiled.ok) {
      ruleErrors.push({ ruleIndex, pattern: rule.pattern, error: compiled.error })
      continue
    }

    if (quick && !applyQuickReject(tokens, compiled.pattern.quickReject)) {
      continue
    }

    const match = matchTokens(compiled.pattern, tokens)
    if (!match.ok) {
      // A mismatch only means the next rule gets its turn
      ruleErrors.push({ ruleIndex, pattern: rule.pattern, error: match.error })
      continue
    }

    return { selected: { rule, ruleIndex, captures: match.captures }, ruleErrors }
  }

  return { ruleErrors }
}

/**
 * Run a rule's generator, turning a reported generator failure into a value.
 */
function generate<T extends MatchableToken, V>(selected: Selected<T, V>, tokens: readonly T[]): ExpandResult<V> {
  const { rule, ruleIndex, captures } = selected
  try {
    return { ok: true, value: rule.generator(tokens, captures), ruleIndex }
  } catch (error) {
    if (error instanceof GeneratorError) {
      return {
        ok: false,
        error: { code: 'GENERATOR_FAILED', message: error.message, ruleIndex, error },
      }
    }
    throw error
  }
}

function invalidRules(ruleErrors: readonly RuleFailure[], total: number): InvalidRuleError {
  return {
    code: 'INVALID_RULE_PATTERN',
    message: `${ruleErrors.length} of ${total} rule patterns failed to parse`,
    ruleErrors,
  }
}

function isParseFailure(failure: RuleFailure): boolean {
  return !isMatchError(failure.error)
}

function isMatchError(error: MatchError | PatternError): error is MatchError {
  return 'tokenIndex' in error
}
