// =============================================================================
// TOKEN CONTRACT
// =============================================================================

/**
 * Line/column of a token in the text it was scanned from.
 * @public
 */
export interface TokenLocation {
  readonly line: number
  readonly column: number
}

/**
 * A token object produced by some tokenizer.
 *
 * Only `content` takes part in matching. Any other fields (kinds, spans) are
 * carried along untouched and handed back through captures.
 *
 * @public
 */
export interface TokenLike {
  readonly content: string
  readonly location?: TokenLocation
}

/**
 * Anything the matcher accepts as a token. A bare string is its own content.
 * @public
 */
export type MatchableToken = string | TokenLike

// =============================================================================
// CAPTURES
// =============================================================================

/**
 * A token recorded by a variable node.
 * @public
 */
export interface Capture<T extends MatchableToken = MatchableToken> {
  /** Variable name, without the leading `$` */
  readonly name: string

  /** The input token, by reference */
  readonly token: T
}

/**
 * Captures in the order they were recorded. Names may repeat.
 * @public
 */
export type CaptureList<T extends MatchableToken = MatchableToken> = readonly Capture<T>[]
