/**
 * Token-count bounds of a pattern.
 * @packageDocumentation
 */

import type { MacroPattern, PatternNode } from '../types'

/**
 * Get the minimum number of tokens a pattern can match.
 *
 * @param pattern - Pattern AST
 * @returns Minimum token count
 *
 * @public
 */
export function getMinTokens(pattern: MacroPattern): number {
  return getNodeMinTokens(pattern.root)
}

function getNodeMinTokens(node: PatternNode): number {
  switch (node.type) {
    case 'literal':
    case 'operator':
    case 'variable':
      return 1

    case 'sequence': {
      let count = 0
      for (const child of node.children) {
        count += getNodeMinTokens(child)
      }
      return count
    }

    case 'optional':
      return 0

    case 'repetition':
      // Only + demands an iteration
      return node.operator === '+' ? getNodeMinTokens(node.child) : 0
  }
}

/**
 * Get the maximum number of tokens a pattern can match.
 *
 * @param pattern - Pattern AST
 * @returns Maximum token count, or undefined if unbounded (contains * or +)
 *
 * @public
 */
export function getMaxTokens(pattern: MacroPattern): number | undefined {
  return getNodeMaxTokens(pattern.root)
}

function getNodeMaxTokens(node: PatternNode): number | undefined {
  switch (node.type) {
    case 'literal':
    case 'operator':
    case 'variable':
      return 1

    case 'sequence': {
      let count = 0
      for (const child of node.children) {
        const max = getNodeMaxTokens(child)
        if (max === undefined) {
          return undefined // Unbounded
        }
        count += max
      }
      return count
    }

    case 'optional':
      return getNodeMaxTokens(node.child)

    case 'repetition': {
      const max = getNodeMaxTokens(node.child)
      if (node.operator === '?') {
        return max
      }
      // Repeating something that never consumes stays empty
      return max === 0 ? 0 : undefined
    }
  }
}

/**
 * Check if a pattern can match token sequences of any length.
 *
 * @param pattern - Pattern AST
 * @returns true if pattern is unbounded
 *
 * @public
 */
export function isUnbounded(pattern: MacroPattern): boolean {
  return getMaxTokens(pattern) === undefined
}
