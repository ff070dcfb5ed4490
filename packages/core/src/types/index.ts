/**
 * Type definitions for the macro pattern language.
 * @packageDocumentation
 */

// AST types
export type {
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
} from './ast'

// Token types
export type { TokenLocation, TokenLike, MatchableToken, Capture, CaptureList } from './token'

// Compiled pattern and result types
export type {
  CompiledPattern,
  QuickRejectFilter,
  ParseResult,
  CompileResult,
  ParseFailure,
  MatchResult,
  MatchFailure,
  MatchOptions,
  MatchablePattern,
} from './compiled'
export { DEFAULT_MATCH_OPTIONS } from './compiled'

// Error types
export type {
  PatternErrorCode,
  PatternError,
  MatchErrorCode,
  MatchError,
  RuleFailure,
  DispatchError,
  InvalidRuleError,
  RuleGeneratorError,
  MacroError,
} from './errors'
export { GeneratorError } from './errors'

// Rule and dispatcher types
export type { Generator, Rule, ExpandResult, ExpandError, TryExpandResult, Dispatcher } from './macro'
