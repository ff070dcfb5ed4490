/**
 * Pattern compilation utilities.
 * @packageDocumentation
 */

export { compilePattern, compileSource } from './compiler'
export { getMinTokens, getMaxTokens, isUnbounded } from './bounds'
export { buildQuickRejectFilter, applyQuickReject } from './quick-reject'
export { buildRepetitionStops } from './follow'
