/**
 * Rules and dispatchers.
 * @packageDocumentation
 */

export { makeRule } from './rule'
export { makeDispatcher } from './dispatcher'
