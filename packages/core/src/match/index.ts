/**
 * Token matching utilities.
 * @packageDocumentation
 */

export { matchTokens, matchPrefix } from './matcher'

export { tokenContent, tokenLocation } from './tokens'

export { groupCaptures, capturesNamed } from './captures'
