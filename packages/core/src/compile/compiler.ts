/**
 * Pattern compiler - attaches matching facts to a parsed pattern.
 * @packageDocumentation
 */

import type { MacroPattern, CompiledPattern, CompileResult } from '../types'
import { parsePattern, collectVariables } from '../parse'
import { getMinTokens, getMaxTokens, isUnbounded } from './bounds'
import { buildQuickRejectFilter } from './quick-reject'
import { buildRepetitionStops } from './follow'

/**
 * Compile a pattern to its matching form.
 *
 * The compiled pattern includes:
 * - Source text and AST for debugging/analysis
 * - Quick-reject filters for fast elimination of token sequences
 * - Token-count constraints
 * - The variable names the pattern captures
 * - The literal that ends each repetition followed by one
 *
 * @param pattern - Parsed pattern AST
 * @returns Compiled pattern ready for matching
 *
 * @public
 */
export function compilePattern(pattern: MacroPattern): CompiledPattern {
  const maxTokens = getMaxTokens(pattern)

  return {
    source: pattern.source,
    ast: pattern,
    quickReject: buildQuickRejectFilter(pattern),
    isUnbounded: isUnbounded(pattern),
    minTokens: getMinTokens(pattern),
    ...(maxTokens !== undefined ? { maxTokens } : {}),
    variables: collectVariables(pattern),
    repetitionStops: buildRepetitionStops(pattern),
  }
}

/**
 * Compile a pattern from source string.
 *
 * Convenience function that parses and compiles in one step.
 *
 * @param source - Pattern source string
 * @returns Compiled pattern, or the parse error
 *
 * @public
 */
export function compileSource(source: string): CompileResult {
  const parsed = parsePattern(source)
  if (!parsed.ok) {
    return parsed
  }
  return { ok: true, pattern: compilePattern(parsed.pattern) }
}
