/**
 * Leading and following literals of pattern nodes.
 * @packageDocumentation
 */

import type { MacroPattern, PatternNode, RepetitionNode } from '../types'

/**
 * A literal or operator that must be the first token a node consumes.
 */
export interface LeadingLiteral {
  readonly text: string

  /** Byte offset of the literal in the pattern source */
  readonly position: number
}

/**
 * Find the literal or operator a node must start with, if any.
 *
 * Nodes that may match nothing (optionals, `*` and `?`) and variables have
 * none.
 */
export function leadingLiteral(node: PatternNode): LeadingLiteral | undefined {
  switch (node.type) {
    case 'literal':
    case 'operator':
      return { text: node.text, position: node.position }

    case 'sequence': {
      const first = node.children[0]
      return first === undefined ? undefined : leadingLiteral(first)
    }

    case 'repetition':
      // Only + is sure to start with its child
      return node.operator === '+' ? leadingLiteral(node.child) : undefined

    case 'variable':
    case 'optional':
      return undefined
  }
}

/**
 * Map each repetition of a single variable to the literal that must come
 * right after it.
 *
 * A variable accepts any token, so the matcher ends such a repetition before
 * a token with that content: `$e+ ]` leaves the closing bracket for the
 * literal.
 *
 * @param pattern - Pattern AST
 * @returns Stop literal per repetition node that has one
 *
 * @public
 */
export function buildRepetitionStops(pattern: MacroPattern): ReadonlyMap<RepetitionNode, string> {
  const stops = new Map<RepetitionNode, string>()
  visit(pattern.root, undefined, stops)
  return stops
}

function visit(node: PatternNode, follow: string | undefined, stops: Map<RepetitionNode, string>): void {
  switch (node.type) {
    case 'literal':
    case 'operator':
    case 'variable':
      break

    case 'sequence':
      node.children.forEach((child, i) => {
        const next = node.children[i + 1]
        visit(child, next === undefined ? follow : leadingLiteral(next)?.text, stops)
      })
      break

    case 'optional':
      visit(node.child, follow, stops)
      break

    case 'repetition':
      // Longer children give the token back by failing their iteration
      if (follow !== undefined && isSingleVariable(node.child)) {
        stops.set(node, follow)
      }
      visit(node.child, follow, stops)
      break
  }
}

/**
 * Whether a node is one variable, possibly inside single-child groups.
 */
function isSingleVariable(node: PatternNode): boolean {
  if (node.type === 'variable') {
    return true
  }
  if (node.type === 'sequence' && node.children.length === 1) {
    const [only] = node.children
    return only !== undefined && isSingleVariable(only)
  }
  return false
}
