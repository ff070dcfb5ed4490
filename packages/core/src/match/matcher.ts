/**
 * Token matching - matches token sequences against macro patterns.
 * @packageDocumentation
 */

import type {
  Capture,
  MatchablePattern,
  MatchableToken,
  MatchError,
  MatchFailure,
  MatchOptions,
  MatchResult,
  PatternNode,
  OptionalNode,
  RepetitionNode,
  SequenceNode,
} from '../types'
import { DEFAULT_MATCH_OPTIONS } from '../types'
import { compilePattern } from '../compile/compiler'
import { tokenContent } from './tokens'
import { repetitionCount, tokenMismatch, trailingTokens, unexpectedEnd } from './errors'

/**
 * Transient state of one match call.
 */
interface MatchState<T extends MatchableToken> {
  readonly tokens: readonly T[]

  /** Stop literal of each repetition that has one */
  readonly stops: ReadonlyMap<RepetitionNode, string>

  /** Index of the next token to consume */
  index: number

  /** Captures recorded so far; truncated to a checkpoint on rollback */
  readonly captures: Capture<T>[]
}

/**
 * Match a token sequence against a pattern.
 *
 * The whole sequence must be consumed unless `options.partial` is set.
 * Matching is greedy and never backtracks into a node that succeeded; a
 * repetition of a single variable followed by a literal stops before a token
 * equal to it.
 *
 * @example
 * matchTokens(pattern, ['10', '+', '20'])
 * // pattern from '$a + $b' => { ok: true, captures: [a: '10', b: '20'], consumed: 3 }
 *
 * @param pattern - Parsed or compiled pattern
 * @param tokens - Token sequence to match
 * @param options - Match options
 * @returns Captures on success, the rejecting error otherwise
 *
 * @public
 */
export function matchTokens<T extends MatchableToken>(
  pattern: MatchablePattern,
  tokens: readonly T[],
  options: MatchOptions = DEFAULT_MATCH_OPTIONS,
): MatchResult<T> {
  const compiled = 'quickReject' in pattern ? pattern : compilePattern(pattern)
  const partial = options.partial ?? DEFAULT_MATCH_OPTIONS.partial

  const state: MatchState<T> = { tokens, stops: compiled.repetitionStops, index: 0, captures: [] }

  const error = matchNode(compiled.ast.root, state)
  if (error !== undefined) {
    return failure(error)
  }

  if (!partial && state.index < tokens.length) {
    return failure(trailingTokens(tokens[state.index], state.index, Buffer.byteLength(compiled.source)))
  }

  return { ok: true, captures: Object.freeze(state.captures), consumed: state.index }
}

/**
 * Match a pattern against the start of a token sequence.
 *
 * @param pattern - Parsed or compiled pattern
 * @param tokens - Token sequence to match
 * @returns Captures and the number of tokens consumed, or the rejecting error
 *
 * @public
 */
export function matchPrefix<T extends MatchableToken>(pattern: MatchablePattern, tokens: readonly T[]): MatchResult<T> {
  return matchTokens(pattern, tokens, { partial: true })
}

function failure(error: MatchError): MatchFailure {
  return { ok: false, captures: [], error }
}

/**
 * Match one node at the current index.
 *
 * @returns undefined on success, the rejecting error otherwise
 */
function matchNode<T extends MatchableToken>(node: PatternNode, state: MatchState<T>): MatchError | undefined {
  switch (node.type) {
    case 'literal':
    case 'operator':
      return matchLiteral(node.text, node.position, state)
    case 'variable':
      return matchVariable(node.name, node.position, state)
    case 'sequence':
      return matchSequence(node, state)
    case 'optional':
      return matchOptional(node, state)
    case 'repetition':
      return matchRepetition(node, state)
  }
}

function matchLiteral<T extends MatchableToken>(
  text: string,
  position: number,
  state: MatchState<T>,
): MatchError | undefined {
  if (state.index >= state.tokens.length) {
    return unexpectedEnd(`'${text}'`, state.index, position)
  }

  const token = state.tokens[state.index]
  if (tokenContent(token) !== text) {
    return tokenMismatch(text, token, state.index, position)
  }

  state.index++
  return undefined
}

function matchVariable<T extends MatchableToken>(
  name: string,
  position: number,
  state: MatchState<T>,
): MatchError | undefined {
  if (state.index >= state.tokens.length) {
    return unexpectedEnd(`a token for '$${name}'`, state.index, position)
  }

  state.captures.push({ name, token: state.tokens[state.index] })
  state.index++
  return undefined
}

/**
 * Sequences are transactional: a failing child undoes the whole sequence.
 */
function matchSequence<T extends MatchableToken>(node: SequenceNode, state: MatchState<T>): MatchError | undefined {
  const index = state.index
  const checkpoint = state.captures.length

  for (const child of node.children) {
    const error = matchNode(child, state)
    if (error !== undefined) {
      restore(state, index, checkpoint)
      return error
    }
  }

  return undefined
}

function matchOptional<T extends MatchableToken>(node: OptionalNode, state: MatchState<T>): MatchError | undefined {
  const index = state.index
  const checkpoint = state.captures.length

  if (matchNode(node.child, state) !== undefined) {
    restore(state, index, checkpoint)
  }

  return undefined
}

/**
 * Greedy repetition. Stops at the first failing iteration, at the first
 * iteration that consumes nothing, or before the stop literal.
 */
function matchRepetition<T extends MatchableToken>(node: RepetitionNode, state: MatchState<T>): MatchError | undefined {
  const start = state.index
  const startCheckpoint = state.captures.length
  const stop = state.stops.get(node)
  let count = 0

  for (;;) {
    const index = state.index
    const checkpoint = state.captures.length

    const next = currentToken(state)
    if (stop !== undefined && next !== undefined && tokenContent(next) === stop) {
      break
    }

    if (matchNode(node.child, state) !== undefined) {
      restore(state, index, checkpoint)
      break
    }

    if (state.index === index) {
      // A zero-width iteration counts once and ends the loop
      if (count === 0) {
        count = 1
      } else {
        restore(state, index, checkpoint)
      }
      break
    }

    count++

    if (node.operator === '?' && count > 1) {
      restore(state, start, startCheckpoint)
      return repetitionCount('?', index, node.position, state.tokens[index])
    }
  }

  if (node.operator === '+' && count === 0) {
    return repetitionCount('+', state.index, node.position, currentToken(state))
  }

  return undefined
}

function currentToken<T extends MatchableToken>(state: MatchState<T>): T | undefined {
  return state.index < state.tokens.length ? state.tokens[state.index] : undefined
}

/**
 * Roll back to a checkpoint: input index and capture count.
 */
function restore<T extends MatchableToken>(state: MatchState<T>, index: number, checkpoint: number): void {
  state.index = index
  state.captures.length = checkpoint
}
