/**
 * Helpers for consuming capture lists.
 * @packageDocumentation
 */

import type { CaptureList, MatchableToken } from '../types'

/**
 * Group captures by variable name, keeping recording order within each name.
 *
 * @example
 * // captures of '$k = $v*' against ['x', '=', '1', '2']
 * groupCaptures(captures) // => Map { 'k' => ['x'], 'v' => ['1', '2'] }
 *
 * @public
 */
export function groupCaptures<T extends MatchableToken>(captures: CaptureList<T>): Map<string, T[]> {
  const groups = new Map<string, T[]>()

  for (const { name, token } of captures) {
    const group = groups.get(name)
    if (group === undefined) {
      groups.set(name, [token])
    } else {
      group.push(token)
    }
  }

  return groups
}

/**
 * Get every token captured under one name.
 *
 * @public
 */
export function capturesNamed<T extends MatchableToken>(captures: CaptureList<T>, name: string): T[] {
  return captures.filter((capture) => capture.name === name).map((capture) => capture.token)
}
