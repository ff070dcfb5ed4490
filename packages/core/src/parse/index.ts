/**
 * Pattern parsing utilities.
 * @packageDocumentation
 */

export { parsePattern } from './parser'
export { validatePattern, isValidPattern, collectVariables } from './validator'
export { formatPattern } from './printer'
