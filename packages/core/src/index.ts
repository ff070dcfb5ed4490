/**
 * Token Macro Pattern Library
 *
 * A library for parsing macro patterns, matching them against token sequences
 * with named captures, and dispatching matches to generators in rule order.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // AST types
  MacroPattern,
  PatternNode,
  OperatorText,
  Quantifier,
  LiteralNode,
  OperatorNode,
  VariableNode,
  SequenceNode,
  OptionalNode,
  RepetitionNode,
  // Token types
  TokenLocation,
  TokenLike,
  MatchableToken,
  Capture,
  CaptureList,
  // Compiled pattern and result types
  CompiledPattern,
  QuickRejectFilter,
  ParseResult,
  CompileResult,
  ParseFailure,
  MatchResult,
  MatchFailure,
  MatchOptions,
  MatchablePattern,
  // Rule and dispatcher types
  Generator,
  Rule,
  ExpandResult,
  ExpandError,
  TryExpandResult,
  Dispatcher,
  // Error types
  PatternErrorCode,
  PatternError,
  MatchErrorCode,
  MatchError,
  RuleFailure,
  DispatchError,
  InvalidRuleError,
  RuleGeneratorError,
  MacroError,
} from './types'
export { DEFAULT_MATCH_OPTIONS, GeneratorError } from './types'

// =============================================================================
// Parsing
// =============================================================================

export { parsePattern, formatPattern } from './parse'
export { validatePattern, isValidPattern, collectVariables } from './parse'

// =============================================================================
// Compilation
// =============================================================================

export { compilePattern, compileSource } from './compile'
export { getMinTokens, getMaxTokens, isUnbounded } from './compile'
export { buildQuickRejectFilter, applyQuickReject, buildRepetitionStops } from './compile'

// =============================================================================
// Matching
// =============================================================================

export { matchTokens, matchPrefix } from './match'
export { tokenContent, tokenLocation, groupCaptures, capturesNamed } from './match'

// =============================================================================
// Rules and Dispatch
// =============================================================================

export { makeRule, makeDispatcher } from './macro'

// =============================================================================
// Diagnostics
// =============================================================================

export { describeError } from './diagnostics'
