/**
 * Pattern validation - checks pattern sources and inspects parsed ASTs.
 * @packageDocumentation
 */

import type { MacroPattern, PatternNode, PatternError } from '../types'
import { parsePattern } from './parser'

/**
 * Validate a pattern source.
 *
 * @param source - The pattern string to validate
 * @returns Array of errors (empty if valid)
 *
 * @public
 */
export function validatePattern(source: string): readonly PatternError[] {
  const result = parsePattern(source)
  return result.ok ? [] : [result.error]
}

/**
 * Check if a pattern source is valid (parses without errors).
 *
 * @param source - The pattern string to check
 * @returns true if the pattern has no errors
 *
 * @public
 */
export function isValidPattern(source: string): boolean {
  return validatePattern(source).length === 0
}

/**
 * List the distinct variable names of a pattern, in order of first appearance.
 *
 * @example
 * // pattern parsed from '$a + $b* $a'
 * collectVariables(pattern) // => ['a', 'b']
 *
 * @public
 */
export function collectVariables(pattern: MacroPattern | PatternNode): readonly string[] {
  const names = new Set<string>()
  collectNode('root' in pattern ? pattern.root : pattern, names)
  return [...names]
}

/**
 * Recursively collect variable names of a node.
 */
function collectNode(node: PatternNode, names: Set<string>): void {
  switch (node.type) {
    case 'literal':
    case 'operator':
      // No variables
      break

    case 'variable':
      names.add(node.name)
      break

    case 'sequence':
      for (const child of node.children) {
        collectNode(child, names)
      }
      break

    case 'optional':
    case 'repetition':
      collectNode(node.child, names)
      break
  }
}
