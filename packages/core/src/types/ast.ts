// =============================================================================
// MACRO PATTERN AST
// =============================================================================

/**
 * A successfully parsed pattern - the entry point for matching and compiling.
 * @public
 */
export interface MacroPattern {
  /** Pattern text as written, for error messages and debugging */
  readonly source: string

  /** Top-level sequence of the pattern */
  readonly root: SequenceNode
}

/**
 * A node in the pattern AST.
 *
 * Every node carries the UTF-8 byte offset in the pattern source where it
 * starts. Offsets are only used for diagnostics.
 *
 * @public
 */
export type PatternNode = LiteralNode | OperatorNode | VariableNode | SequenceNode | OptionalNode | RepetitionNode

/**
 * Binary operators that stand on their own in a pattern.
 * @public
 */
export type OperatorText = '+' | '-' | '*' | '/' | '='

/**
 * Quantifiers that can follow an atom.
 * @public
 */
export type Quantifier = '*' | '+' | '?'

// =============================================================================
// LEAF NODES
// =============================================================================

/**
 * Matches a single token whose content equals `text`.
 *
 * @example "vec" matches only a token with content "vec"
 *
 * @public
 */
export interface LiteralNode {
  readonly type: 'literal'
  readonly text: string
  readonly position: number
}

/**
 * An operator written in the pattern (`+ - * / =`).
 *
 * Matches exactly like a literal; kept apart so generators and tools can tell
 * `$a + $b` from `$a \+ $b`.
 *
 * @public
 */
export interface OperatorNode {
  readonly type: 'operator'
  readonly text: OperatorText
  readonly position: number
}

/**
 * Matches any single token and captures it under `name`.
 *
 * @example "$expr" captures one token as "expr"
 *
 * @public
 */
export interface VariableNode {
  readonly type: 'variable'
  readonly name: string
  readonly position: number
}

// =============================================================================
// COMPOSITE NODES
// =============================================================================

/**
 * Children matched left to right. Also the node produced for `( ... )` groups.
 *
 * @example
 * "$a + $b" becomes:
 *   Sequence([Variable("a"), Operator("+"), Variable("b")])
 *
 * @public
 */
export interface SequenceNode {
  readonly type: 'sequence'
  readonly children: readonly PatternNode[]
  readonly position: number
}

/**
 * `[ ... ]` - tries the inner sequence, succeeds without consuming on failure.
 *
 * @example
 * "$a [, $b]" becomes:
 *   Sequence([Variable("a"), Optional(Sequence([Literal(","), Variable("b")]))])
 *
 * @public
 */
export interface OptionalNode {
  readonly type: 'optional'
  readonly child: SequenceNode
  readonly position: number
}

/**
 * A quantified atom. Matching is greedy and never gives tokens back.
 *
 * @example
 * "$x+" becomes Repetition("+", Variable("x"))
 *
 * @public
 */
export interface RepetitionNode {
  readonly type: 'repetition'
  readonly operator: Quantifier
  readonly child: PatternNode
  readonly position: number
}
