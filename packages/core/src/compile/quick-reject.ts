/**
 * Quick-reject filter construction.
 * @packageDocumentation
 */

import type { MacroPattern, QuickRejectFilter, MatchableToken } from '../types'
import { tokenContent } from '../match/tokens'
import { getMinTokens, getMaxTokens } from './bounds'
import { leadingLiteral } from './follow'

/**
 * Build quick-reject filters for a pattern.
 *
 * Quick-reject filters enable fast elimination of token sequences before
 * walking the pattern.
 *
 * @param pattern - Pattern AST
 * @returns Quick-reject filter configuration
 *
 * @public
 */
export function buildQuickRejectFilter(pattern: MacroPattern): QuickRejectFilter {
  const maxTokens = getMaxTokens(pattern)
  const requiredFirst = leadingLiteral(pattern.root)

  return {
    minTokens: getMinTokens(pattern),
    ...(maxTokens !== undefined ? { maxTokens } : {}),
    ...(requiredFirst !== undefined ? { requiredFirst } : {}),
  }
}

/**
 * Apply quick-reject filter to a token sequence.
 *
 * Only tells whether a total match is possible; the matcher reports why a
 * sequence does not match.
 *
 * @param tokens - Token sequence to check
 * @param filter - Quick-reject filter
 * @returns false if the tokens definitely don't match, true if they might
 *
 * @public
 */
export function applyQuickReject(tokens: readonly MatchableToken[], filter: QuickRejectFilter): boolean {
  if (tokens.length < filter.minTokens) {
    return false
  }

  if (filter.maxTokens !== undefined && tokens.length > filter.maxTokens) {
    return false
  }

  const first = tokens[0]
  if (filter.requiredFirst !== undefined && first !== undefined && tokenContent(first) !== filter.requiredFirst.text) {
    return false
  }

  return true
}
