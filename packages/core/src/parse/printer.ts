/**
 * Canonical printing of pattern ASTs.
 * @packageDocumentation
 */

import type { MacroPattern, PatternNode } from '../types'

/** Characters a literal must escape to read back as the same literal. */
const ESCAPED = new Set(['$', '(', ')', '[', ']', '\\', '*', '+', '?', '-', '/', '='])

/**
 * Print a pattern in canonical form.
 *
 * Atoms are separated by a single space, quantifiers are attached to their
 * atom and literals escape every metasyntactic character. Parsing the output
 * gives back the same tree (positions aside).
 *
 * @example
 * // pattern parsed from '$a   +$b'
 * formatPattern(pattern) // => '$a + $b'
 *
 * @param pattern - A parsed pattern or any node of one
 * @returns Canonical pattern text
 *
 * @public
 */
export function formatPattern(pattern: MacroPattern | PatternNode): string {
  if ('root' in pattern) {
    return formatChildren(pattern.root.children)
  }
  return formatNode(pattern)
}

function formatNode(node: PatternNode): string {
  switch (node.type) {
    case 'literal':
      return escapeLiteral(node.text)
    case 'operator':
      return node.text
    case 'variable':
      return `$${node.name}`
    case 'sequence':
      return `(${formatChildren(node.children)})`
    case 'optional':
      return `[${formatChildren(node.child.children)}]`
    case 'repetition':
      return `${formatNode(node.child)}${node.operator}`
  }
}

function formatChildren(children: readonly PatternNode[]): string {
  return children.map(formatNode).join(' ')
}

function escapeLiteral(text: string): string {
  let result = ''
  for (const char of text) {
    result += ESCAPED.has(char) || /\s/.test(char) ? `\\${char}` : char
  }
  return result
}
