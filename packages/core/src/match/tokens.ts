/**
 * Reading the token contract.
 * @packageDocumentation
 */

import type { MatchableToken, TokenLocation } from '../types'

/**
 * Get the text a token is matched by.
 *
 * @public
 */
export function tokenContent(token: MatchableToken): string {
  return typeof token === 'string' ? token : token.content
}

/**
 * Get the source location of a token, if it carries one.
 *
 * @public
 */
export function tokenLocation(token: MatchableToken): TokenLocation | undefined {
  return typeof token === 'string' ? undefined : token.location
}
