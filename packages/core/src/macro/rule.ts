/**
 * Macro rules - a pattern paired with a generator.
 * @packageDocumentation
 */

import type { CompileResult, Generator, MatchableToken, Rule } from '../types'
import { compileSource } from '../compile'

/**
 * Create a rule.
 *
 * The pattern is not parsed here. It is parsed on first use and the result,
 * including a parse error, is kept for every later use.
 *
 * @example
 * const empty = makeRule('vec ! [ ]', (): number[] => [])
 *
 * @param pattern - Pattern source
 * @param generator - Builds the value when the pattern matches
 * @returns The rule
 *
 * @public
 */
export function makeRule<T extends MatchableToken, V>(pattern: string, generator: Generator<T, V>): Rule<T, V> {
  let cached: CompileResult | undefined

  return {
    pattern,
    generator,
    compiled() {
      cached ??= compileSource(pattern)
      return cached
    },
  }
}
