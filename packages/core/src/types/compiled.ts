import type { MacroPattern, RepetitionNode } from './ast'
import type { MatchError, PatternError } from './errors'
import type { CaptureList, MatchableToken } from './token'

// =============================================================================
// COMPILED PATTERN
// =============================================================================

/**
 * A parsed pattern with the facts the matcher checks before walking the AST.
 * @public
 */
export interface CompiledPattern {
  /** Pattern source text */
  readonly source: string

  /** Parsed AST */
  readonly ast: MacroPattern

  /**
   * Quick-reject filter applied before full matching.
   * If it fails, the token sequence definitely doesn't match.
   */
  readonly quickReject: QuickRejectFilter

  /** Whether the pattern can match sequences of any length */
  readonly isUnbounded: boolean

  /** Minimum number of tokens this pattern requires */
  readonly minTokens: number

  /** Maximum number of tokens (undefined if unbounded) */
  readonly maxTokens?: number

  /** Distinct variable names, in order of first appearance */
  readonly variables: readonly string[]

  /**
   * Literal that ends each repetition it is mapped to: the repetition does
   * not consume a token with this content.
   */
  readonly repetitionStops: ReadonlyMap<RepetitionNode, string>
}

/**
 * Quick rejection filters for fast elimination of token sequences.
 * @public
 */
export interface QuickRejectFilter {
  /** Minimum token count */
  readonly minTokens: number

  /** Maximum token count, if bounded */
  readonly maxTokens?: number

  /** Content the first token must have, when the pattern starts with a literal */
  readonly requiredFirst?: {
    readonly text: string

    /** Byte offset of the literal in the pattern source */
    readonly position: number
  }
}

// =============================================================================
// RESULTS
// =============================================================================

/**
 * Outcome of {@link parsePattern}.
 * @public
 */
export type ParseResult = { readonly ok: true; readonly pattern: MacroPattern } | ParseFailure

/**
 * Outcome of parsing and compiling in one step.
 * @public
 */
export type CompileResult = { readonly ok: true; readonly pattern: CompiledPattern } | ParseFailure

/**
 * A pattern that did not parse.
 * @public
 */
export interface ParseFailure {
  readonly ok: false
  readonly error: PatternError
}

/**
 * Outcome of matching a pattern against a token sequence.
 * @public
 */
export type MatchResult<T extends MatchableToken = MatchableToken> =
  | {
      readonly ok: true
      readonly captures: CaptureList<T>

      /** Number of tokens the pattern consumed */
      readonly consumed: number
    }
  | MatchFailure

/**
 * A failed match. Failures never carry captures.
 * @public
 */
export interface MatchFailure {
  readonly ok: false
  readonly captures: readonly []
  readonly error: MatchError
}

/**
 * Options for {@link matchTokens}.
 * @public
 */
export interface MatchOptions {
  /**
   * Accept a match that leaves tokens unconsumed.
   * Dispatchers always match the whole sequence.
   */
  readonly partial?: boolean
}

/**
 * Options used when none are given.
 * @public
 */
export const DEFAULT_MATCH_OPTIONS: Required<MatchOptions> = {
  partial: false,
}

/**
 * Either form of pattern the matcher accepts.
 * @public
 */
export type MatchablePattern = MacroPattern | CompiledPattern
