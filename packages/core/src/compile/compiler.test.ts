import { describe, it, expect } from 'vitest'

import { compileSource } from './compiler'
import { applyQuickReject } from './quick-reject'
import type { CompiledPattern } from '../types'

function compiled(source: string): CompiledPattern {
  const result = compileSource(source)
  if (!result.ok) {
    throw new Error(`unexpected parse error: ${result.error.message}`)
  }
  return result.pattern
}

describe('compilePattern', () => {
  it('keeps source, AST and variables', () => {
    const pattern = compiled('$a + $b')

    expect(pattern.source).toBe('$a + $b')
    expect(pattern.ast.source).toBe('$a + $b')
    expect(pattern.variables).toEqual(['a', 'b'])
  })

  describe('token bounds', () => {
    it('counts fixed-length patterns exactly', () => {
      const pattern = compiled('$a + $b')

      expect(pattern.minTokens).toBe(3)
      expect(pattern.maxTokens).toBe(3)
      expect(pattern.isUnbounded).toBe(false)
    })

    it('bounds each quantifier', () => {
      expect(compiled('$x*').minTokens).toBe(0)
      expect(compiled('$x*').maxTokens).toBeUndefined()
      expect(compiled('$x*').isUnbounded).toBe(true)

      expect(compiled('$x+').minTokens).toBe(1)
      expect(compiled('$x+').maxTokens).toBeUndefined()

      expect(compiled('$x?').minTokens).toBe(0)
      expect(compiled('$x?').maxTokens).toBe(1)
    })

    it('counts optionals as zero to their length', () => {
      const pattern = compiled('$a [, $b]')

      expect(pattern.minTokens).toBe(1)
      expect(pattern.maxTokens).toBe(3)
    })

    it('keeps repetition of an empty group bounded', () => {
      expect(compiled('()*').maxTokens).toBe(0)
      expect(compiled('()*').isUnbounded).toBe(false)
      expect(compiled('[a]*').isUnbounded).toBe(true)
    })
  })

  describe('quick-reject filter', () => {
    it('requires the leading literal', () => {
      expect(compiled('vec ! [ ]').quickReject).toEqual({
        minTokens: 4,
        maxTokens: 4,
        requiredFirst: { text: 'vec', position: 0 },
      })
    })

    it('looks through a + repetition for the leading literal', () => {
      expect(compiled('a+ $x').quickReject).toEqual({
        minTokens: 2,
        requiredFirst: { text: 'a', position: 0 },
      })
    })

    it('has no leading literal when the first atom may be skipped', () => {
      expect(compiled('[a] b').quickReject).toEqual({ minTokens: 1, maxTokens: 2 })
      expect(compiled('$a + $b').quickReject).toEqual({ minTokens: 3, maxTokens: 3 })
    })
  })

  describe('repetition stops', () => {
    it('stops a repetition at the literal after it', () => {
      const pattern = compiled('vec ! [ $e+ ]')
      const repetition = pattern.ast.root.children[3]
      if (repetition.type !== 'repetition') {
        throw new Error('expected a repetition')
      }

      expect(pattern.repetitionStops.get(repetition)).toBe(']')
      expect(pattern.repetitionStops.size).toBe(1)
    })

    it('carries the stop out of an optional', () => {
      expect([...compiled('[$e+] ]').repetitionStops.values()]).toEqual([']'])
    })

    it('has no stop without a literal after the repetition', () => {
      expect(compiled('$x*').repetitionStops.size).toBe(0)
      expect(compiled('$e* [x] ;').repetitionStops.size).toBe(0)
    })

    it('looks through single-variable groups', () => {
      expect([...compiled('($e)+ ]').repetitionStops.values()]).toEqual([']'])
    })

    it('leaves repeated groups of several atoms greedy', () => {
      expect(compiled('(; $x)* ;').repetitionStops.size).toBe(0)
      expect(compiled('($v b)* L').repetitionStops.size).toBe(0)
    })
  })
})

describe('compileSource', () => {
  it('returns the parse error', () => {
    expect(compileSource('($')).toEqual({
      ok: false,
      error: { code: 'EMPTY_VARIABLE', message: "expected a variable name after '$'", position: 1 },
    })
  })
})

describe('applyQuickReject', () => {
  it('rules out too few tokens', () => {
    expect(applyQuickReject(['a'], compiled('$a + $b').quickReject)).toBe(false)
  })

  it('rules out too many tokens', () => {
    expect(applyQuickReject(['x', 'y'], compiled('$x?').quickReject)).toBe(false)
  })

  it('rules out a wrong first token', () => {
    expect(applyQuickReject(['vex', '!', '[', ']'], compiled('vec ! [ ]').quickReject)).toBe(false)
  })

  it('lets plausible sequences through', () => {
    expect(applyQuickReject(['vec', '!', '[', ']'], compiled('vec ! [ ]').quickReject)).toBe(true)
    expect(applyQuickReject(['1', '2', '3'], compiled('$x*').quickReject)).toBe(true)
  })
})
