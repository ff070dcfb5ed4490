/**
 * Diagnostics.
 * @packageDocumentation
 */

export { describeError } from './describe'
