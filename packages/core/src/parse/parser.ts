/**
 * Pattern parser - converts macro pattern strings to AST.
 * @packageDocumentation
 */

import type {
  ParseResult,
  PatternNode,
  SequenceNode,
  OptionalNode,
  RepetitionNode,
  OperatorText,
  Quantifier,
  PatternError,
  PatternErrorCode,
} from '../types'

/**
 * Parser state for tracking position and the first error.
 */
interface ParserState {
  source: string
  position: number
  error?: PatternError
}

/** Characters that end a literal run. */
const METACHARACTERS = new Set(['$', '(', ')', '[', ']', '\\', '*', '+', '?', '-', '/', '='])

const OPERATORS = new Set<string>(['+', '-', '*', '/', '='])

const IDENT_START = /[A-Za-z_]/
const IDENT_CHAR = /[A-Za-z0-9_]/
const WHITESPACE = /\s/

/**
 * Parse a pattern string into an AST.
 *
 * Parsing stops at the first error; the error is returned, never thrown.
 *
 * @example
 * parsePattern('$a + $b')
 * // => { ok: true, pattern: { source: '$a + $b', root: Sequence([$a, +, $b]) } }
 *
 * @param source - The pattern string to parse
 * @returns The parsed pattern, or the first error found
 *
 * @public
 */
export function parsePattern(source: string): ParseResult {
  const state: ParserState = {
    source,
    position: 0,
  }

  const root = parseSequence(state, undefined, 0)

  if (state.error !== undefined) {
    return { ok: false, error: state.error }
  }
  if (root === null) {
    throw new Error('Parser stopped without recording an error')
  }

  return { ok: true, pattern: Object.freeze({ source, root }) }
}

/**
 * Parse atoms until `closer` (or end of input at top level).
 *
 * `opener` is the string index of the bracket that opened the sequence (0
 * at top level). Returns null once an error has been recorded on the state.
 */
function parseSequence(state: ParserState, closer: ')' | ']' | undefined, opener: number): SequenceNode | null {
  const children: PatternNode[] = []
  // Whether the last child may take a quantifier
  let quantifiable = false

  for (;;) {
    if (skipWhitespace(state)) {
      quantifiable = false
    }

    const char = peek(state)

    if (char === undefined) {
      if (closer === ')') {
        return fail(state, 'UNCLOSED_GROUP', `unclosed group '(' opened at ${offset(state, opener)}`, state.position)
      }
      if (closer === ']') {
        return fail(state, 'UNCLOSED_OPTIONAL', `unclosed optional '[' opened at ${offset(state, opener)}`, state.position)
      }
      break
    }

    if (char === closer) {
      state.position++
      break
    }

    if (char === ')') {
      return fail(state, 'TRAILING_INPUT', "unexpected ')'", state.position)
    }

    // Quantifier or standalone operator
    if (char === '*' || char === '+' || char === '?') {
      const last = children[children.length - 1]
      if (quantifiable && last !== undefined) {
        children[children.length - 1] = repetition(char, last)
        state.position++
        quantifiable = false
        continue
      }
      if (char === '?') {
        return fail(state, 'DANGLING_QUANTIFIER', "quantifier '?' has no preceding atom", state.position)
      }
    }

    const atom = parseAtom(state)
    if (atom === null) {
      return null
    }
    children.push(atom)
    quantifiable = true
  }

  return freeze({ type: 'sequence', children: Object.freeze(children), position: offset(state, opener) })
}

/**
 * Parse a single atom at the current position.
 */
function parseAtom(state: ParserState): PatternNode | null {
  const start = state.position
  const char = state.source[start]

  if (OPERATORS.has(char)) {
    state.position++
    return freeze({ type: 'operator', text: toOperator(char), position: offset(state, start) })
  }

  switch (char) {
    case '$':
      return parseVariable(state)

    case '(': {
      state.position++
      return parseSequence(state, ')', start)
    }

    case '[': {
      // "[ " is a bracket token, "[x" opens an optional
      const next = state.source[start + 1]
      if (next === undefined || WHITESPACE.test(next)) {
        state.position++
        return literal(state, '[', start)
      }
      state.position++
      return parseOptional(state, start)
    }

    case ']':
      // Only reached when `]` does not close the enclosing sequence
      state.position++
      return literal(state, ']', start)

    case '\\':
      return parseEscape(state)
  }

  return parseLiteralRun(state)
}

/**
 * Parse `$name`.
 */
function parseVariable(state: ParserState): PatternNode | null {
  const start = state.position
  state.position++ // Skip $

  if (!IDENT_START.test(peek(state) ?? '')) {
    return fail(state, 'EMPTY_VARIABLE', "expected a variable name after '$'", start)
  }

  const nameStart = state.position
  while (IDENT_CHAR.test(peek(state) ?? '')) {
    state.position++
  }

  return freeze({ type: 'variable', name: state.source.slice(nameStart, state.position), position: offset(state, start) })
}

/**
 * Parse the body of `[ ... ]` (opening bracket already consumed).
 */
function parseOptional(state: ParserState, start: number): OptionalNode | null {
  const child = parseSequence(state, ']', start)
  if (child === null) {
    return null
  }
  return freeze({ type: 'optional', child, position: offset(state, start) })
}

/**
 * Parse `\c` - always a literal of the escaped character.
 */
function parseEscape(state: ParserState): PatternNode | null {
  const start = state.position
  const codePoint = state.source.codePointAt(start + 1)

  if (codePoint === undefined) {
    return fail(state, 'DANGLING_ESCAPE', "escape '\\' at end of pattern", start)
  }

  const char = String.fromCodePoint(codePoint)
  state.position += 1 + char.length
  return literal(state, char, start)
}

/**
 * Parse a run of non-metasyntactic, non-whitespace characters.
 */
function parseLiteralRun(state: ParserState): PatternNode {
  const start = state.position

  while (state.position < state.source.length) {
    const char = state.source[state.position]
    if (METACHARACTERS.has(char) || WHITESPACE.test(char)) {
      break
    }
    state.position++
  }

  return literal(state, state.source.slice(start, state.position), start)
}

// =============================================================================
// Helpers
// =============================================================================

function freeze<T extends PatternNode>(node: T): T {
  return Object.freeze(node)
}

function literal(state: ParserState, text: string, start: number): PatternNode {
  return freeze({ type: 'literal', text, position: offset(state, start) })
}

function repetition(operator: Quantifier, child: PatternNode): RepetitionNode {
  return freeze({ type: 'repetition', operator, child, position: child.position })
}

function toOperator(char: string): OperatorText {
  switch (char) {
    case '+':
    case '-':
    case '*':
    case '/':
    case '=':
      return char
  }
  throw new Error(`Unexpected operator: ${char}`)
}

/**
 * UTF-8 byte offset of a string index in the source.
 */
function offset(state: ParserState, index: number): number {
  return Buffer.byteLength(state.source.slice(0, index))
}

function peek(state: ParserState): string | undefined {
  return state.source[state.position]
}

/**
 * Skip whitespace, reporting whether any was skipped.
 */
function skipWhitespace(state: ParserState): boolean {
  const start = state.position
  while (state.position < state.source.length && WHITESPACE.test(state.source[state.position])) {
    state.position++
  }
  return state.position > start
}

/**
 * Record an error (the first one wins) and abort the current production.
 *
 * `position` is a string index; the error reports it as a byte offset.
 */
function fail(state: ParserState, code: PatternErrorCode, message: string, position: number): null {
  state.error ??= { code, message, position: offset(state, position) }
  return null
}
