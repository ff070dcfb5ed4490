/**
 * Human-readable rendering of engine errors.
 * @packageDocumentation
 */

import type { MacroError, RuleFailure } from '../types'

/**
 * Render an error as text.
 *
 * Pattern and match errors fit on one line. Dispatch errors add one indented
 * line per rule.
 *
 * @example
 * describeError(matchError)
 * // => "TOKEN_MISMATCH at token 1 (1:4): expected '+', got '-'"
 *
 * @param error - Any error value returned by the engine
 * @returns The rendered error
 *
 * @public
 */
export function describeError(error: MacroError): string {
  switch (error.code) {
    case 'UNCLOSED_GROUP':
    case 'UNCLOSED_OPTIONAL':
    case 'DANGLING_ESCAPE':
    case 'EMPTY_VARIABLE':
    case 'DANGLING_QUANTIFIER':
    case 'TRAILING_INPUT':
      return `${error.code} at ${error.position}: ${error.message}`

    case 'TOKEN_MISMATCH':
    case 'UNEXPECTED_END':
    case 'REPETITION_COUNT':
    case 'TRAILING_TOKENS': {
      const where = error.location === undefined ? '' : ` (${error.location.line}:${error.location.column})`
      return `${error.code} at token ${error.tokenIndex}${where}: ${error.message}`
    }

    case 'NO_MATCHING_RULE':
    case 'INVALID_RULE_PATTERN':
      return [`${error.code}: ${error.message}`, ...error.ruleErrors.map(describeRuleFailure)].join('\n')

    case 'GENERATOR_FAILED':
      return `${error.code} in rule ${error.ruleIndex}: ${error.message}`
  }
}

function describeRuleFailure(failure: RuleFailure): string {
  return `  rule ${failure.ruleIndex} '${failure.pattern}': ${describeError(failure.error)}`
}
