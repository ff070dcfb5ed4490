import type { TokenLocation } from './token'

/**
 * Error codes for pattern parse failures.
 * @public
 */
export type PatternErrorCode =
  | 'UNCLOSED_GROUP' // ( without )
  | 'UNCLOSED_OPTIONAL' // [ without ]
  | 'DANGLING_ESCAPE' // \ at end of input
  | 'EMPTY_VARIABLE' // $ not followed by an identifier
  | 'DANGLING_QUANTIFIER' // ? with nothing to repeat
  | 'TRAILING_INPUT' // ) with no open group

/**
 * A pattern parse error with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Byte offset in the pattern source where the error was detected */
  readonly position: number
}

/**
 * Error codes for match failures.
 * @public
 */
export type MatchErrorCode =
  | 'TOKEN_MISMATCH' // literal or operator did not equal the token
  | 'UNEXPECTED_END' // ran out of tokens
  | 'REPETITION_COUNT' // + with no match, ? with more than one
  | 'TRAILING_TOKENS' // pattern ended before the tokens did

/**
 * A match failure, reported by the node that rejected the input.
 * @public
 */
export interface MatchError {
  readonly code: MatchErrorCode
  readonly message: string

  /** Index of the token being examined when the match failed */
  readonly tokenIndex: number

  /** Byte offset in the pattern source of the node that rejected */
  readonly patternPosition: number

  /** Source location of the offending token, when the token carries one */
  readonly location?: TokenLocation
}

/**
 * Why a single rule did not produce a value.
 * @public
 */
export interface RuleFailure {
  /** Position of the rule in the dispatcher */
  readonly ruleIndex: number

  /** Pattern source of the rule */
  readonly pattern: string

  readonly error: MatchError | PatternError
}

/**
 * No rule of a dispatcher matched the input.
 * @public
 */
export interface DispatchError {
  readonly code: 'NO_MATCHING_RULE'
  readonly message: string

  /** One entry per rule, in declaration order */
  readonly ruleErrors: readonly RuleFailure[]
}

/**
 * Rule patterns that do not parse were reached while dispatching: before the
 * matching rule, or anywhere when `tryExpand` found no match.
 * @public
 */
export interface InvalidRuleError {
  readonly code: 'INVALID_RULE_PATTERN'
  readonly message: string

  /** The rules that do not parse, in declaration order */
  readonly ruleErrors: readonly RuleFailure[]
}

/**
 * A generator of a matching rule reported a failure.
 * @public
 */
export interface RuleGeneratorError {
  readonly code: 'GENERATOR_FAILED'
  readonly message: string
  readonly ruleIndex: number

  /** The error the generator threw, unchanged */
  readonly error: GeneratorError
}

/**
 * Any error value produced by the engine.
 * @public
 */
export type MacroError = PatternError | MatchError | DispatchError | InvalidRuleError | RuleGeneratorError

/**
 * Thrown by generators to report that they cannot build a value from a match.
 *
 * The dispatcher catches it and returns it as a {@link RuleGeneratorError};
 * any other exception thrown by a generator propagates.
 *
 * @public
 */
export class GeneratorError extends Error {
  /** Error classification code */
  readonly code = 'GENERATOR_FAILED'

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'GeneratorError'
  }
}
