/**
 * Construction of match errors.
 * @packageDocumentation
 */

import type { MatchError, MatchErrorCode, MatchableToken } from '../types'
import { tokenContent, tokenLocation } from './tokens'

/**
 * A token did not have the content a literal or operator expects.
 */
export function tokenMismatch(
  expected: string,
  token: MatchableToken,
  tokenIndex: number,
  patternPosition: number,
): MatchError {
  return matchError('TOKEN_MISMATCH', `expected '${expected}', got '${tokenContent(token)}'`, tokenIndex, patternPosition, token)
}

/**
 * The tokens ran out while a node still needed one.
 *
 * @param expected - What the node wanted, already quoted
 */
export function unexpectedEnd(expected: string, tokenIndex: number, patternPosition: number): MatchError {
  return matchError('UNEXPECTED_END', `expected ${expected}, got end of input`, tokenIndex, patternPosition)
}

/**
 * A repetition matched too few (`+`) or too many (`?`) times.
 */
export function repetitionCount(
  operator: '+' | '?',
  tokenIndex: number,
  patternPosition: number,
  token?: MatchableToken,
): MatchError {
  const message = operator === '+' ? 'expected one or more matches' : 'expected zero or one match'
  return matchError('REPETITION_COUNT', message, tokenIndex, patternPosition, token)
}

/**
 * The pattern ended before the tokens did.
 */
export function trailingTokens(token: MatchableToken, tokenIndex: number, patternPosition: number): MatchError {
  return matchError(
    'TRAILING_TOKENS',
    `unexpected token '${tokenContent(token)}' after end of pattern`,
    tokenIndex,
    patternPosition,
    token,
  )
}

function matchError(
  code: MatchErrorCode,
  message: string,
  tokenIndex: number,
  patternPosition: number,
  token?: MatchableToken,
): MatchError {
  const location = token === undefined ? undefined : tokenLocation(token)
  return location === undefined
    ? { code, message, tokenIndex, patternPosition }
    : { code, message, tokenIndex, patternPosition, location }
}
