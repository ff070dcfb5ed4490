import { describe, it, expect } from 'vitest'

import { parsePattern } from './parser'
import type { MacroPattern, PatternError } from '../types'

function parsed(source: string): MacroPattern {
  const result = parsePattern(source)
  if (!result.ok) {
    throw new Error(`unexpected parse error: ${result.error.message}`)
  }
  return result.pattern
}

function parseError(source: string): PatternError {
  const result = parsePattern(source)
  if (result.ok) {
    throw new Error(`expected '${source}' to fail`)
  }
  return result.error
}

describe('parsePattern', () => {
  describe('basic patterns', () => {
    it('parses variables and a standalone operator', () => {
      const pattern = parsed('$a + $b')

      expect(pattern.source).toBe('$a + $b')
      expect(pattern.root).toEqual({
        type: 'sequence',
        position: 0,
        children: [
          { type: 'variable', name: 'a', position: 0 },
          { type: 'operator', text: '+', position: 3 },
          { type: 'variable', name: 'b', position: 5 },
        ],
      })
    })

    it('parses literal runs up to whitespace or a metacharacter', () => {
      const pattern = parsed('foo,bar a-b')

      expect(pattern.root.children).toEqual([
        { type: 'literal', text: 'foo,bar', position: 0 },
        { type: 'literal', text: 'a', position: 8 },
        { type: 'operator', text: '-', position: 9 },
        { type: 'literal', text: 'b', position: 10 },
      ])
    })

    it('parses all binary operators', () => {
      const pattern = parsed('- / = * +')

      expect(pattern.root.children.map((node) => node.type)).toEqual([
        'operator',
        'operator',
        'operator',
        'operator',
        'operator',
      ])
    })

    it('parses an empty pattern', () => {
      expect(parsed('').root).toEqual({ type: 'sequence', position: 0, children: [] })
      expect(parsed('   ').root.children).toEqual([])
    })

    it('accepts digits and underscores after the first name character', () => {
      expect(parsed('$_tail9').root.children).toEqual([{ type: 'variable', name: '_tail9', position: 0 }])
    })

    it('reports positions as UTF-8 byte offsets', () => {
      expect(parsed('é $x ±').root.children).toEqual([
        { type: 'literal', text: 'é', position: 0 },
        { type: 'variable', name: 'x', position: 3 },
        { type: 'literal', text: '±', position: 6 },
      ])
    })

    it('freezes the tree', () => {
      const pattern = parsed('$a [, $b]')

      expect(Object.isFrozen(pattern)).toBe(true)
      expect(Object.isFrozen(pattern.root)).toBe(true)
      expect(Object.isFrozen(pattern.root.children)).toBe(true)
      expect(Object.isFrozen(pattern.root.children[1])).toBe(true)
    })
  })

  describe('quantifiers', () => {
    it('wraps the preceding atom when attached', () => {
      expect(parsed('$x+').root.children).toEqual([
        { type: 'repetition', operator: '+', position: 0, child: { type: 'variable', name: 'x', position: 0 } },
      ])
    })

    it('treats * and + after whitespace as operators', () => {
      expect(parsed('$x *').root.children).toEqual([
        { type: 'variable', name: 'x', position: 0 },
        { type: 'operator', text: '*', position: 3 },
      ])
    })

    it('treats * at the start of a sequence as an operator', () => {
      expect(parsed('* $x').root.children).toEqual([
        { type: 'operator', text: '*', position: 0 },
        { type: 'variable', name: 'x', position: 2 },
      ])
    })

    it('quantifies literals', () => {
      expect(parsed('x?').root.children).toEqual([
        { type: 'repetition', operator: '?', position: 0, child: { type: 'literal', text: 'x', position: 0 } },
      ])
    })

    it('quantifies groups', () => {
      expect(parsed('($k = $v)*').root.children).toEqual([
        {
          type: 'repetition',
          operator: '*',
          position: 0,
          child: {
            type: 'sequence',
            position: 0,
            children: [
              { type: 'variable', name: 'k', position: 1 },
              { type: 'operator', text: '=', position: 4 },
              { type: 'variable', name: 'v', position: 6 },
            ],
          },
        },
      ])
    })

    it('reads a second quantifier character as an operator', () => {
      expect(parsed('$x++').root.children).toEqual([
        { type: 'repetition', operator: '+', position: 0, child: { type: 'variable', name: 'x', position: 0 } },
        { type: 'operator', text: '+', position: 3 },
      ])
    })
  })

  describe('groups and optionals', () => {
    it('parses an optional group', () => {
      expect(parsed('$a [, $b]').root.children).toEqual([
        { type: 'variable', name: 'a', position: 0 },
        {
          type: 'optional',
          position: 3,
          child: {
            type: 'sequence',
            position: 3,
            children: [
              { type: 'literal', text: ',', position: 4 },
              { type: 'variable', name: 'b', position: 6 },
            ],
          },
        },
      ])
    })

    it('reads a bracket followed by whitespace as a literal', () => {
      expect(parsed('vec ! [ $e ; $n ]').root.children).toEqual([
        { type: 'literal', text: 'vec', position: 0 },
        { type: 'literal', text: '!', position: 4 },
        { type: 'literal', text: '[', position: 6 },
        { type: 'variable', name: 'e', position: 8 },
        { type: 'literal', text: ';', position: 11 },
        { type: 'variable', name: 'n', position: 13 },
        { type: 'literal', text: ']', position: 16 },
      ])
    })

    it('reads a closing bracket inside a group as a literal', () => {
      expect(parsed('(a ])').root.children).toEqual([
        {
          type: 'sequence',
          position: 0,
          children: [
            { type: 'literal', text: 'a', position: 1 },
            { type: 'literal', text: ']', position: 3 },
          ],
        },
      ])
    })

    it('parses an empty optional', () => {
      expect(parsed('[]').root.children).toEqual([
        { type: 'optional', position: 0, child: { type: 'sequence', position: 0, children: [] } },
      ])
    })

    it('nests optionals', () => {
      const [outer] = parsed('[[a]]').root.children

      expect(outer).toEqual({
        type: 'optional',
        position: 0,
        child: {
          type: 'sequence',
          position: 0,
          children: [
            {
              type: 'optional',
              position: 1,
              child: { type: 'sequence', position: 1, children: [{ type: 'literal', text: 'a', position: 2 }] },
            },
          ],
        },
      })
    })
  })

  describe('escapes', () => {
    it('turns an escaped quantifier into a literal', () => {
      expect(parsed('\\+').root.children).toEqual([{ type: 'literal', text: '+', position: 0 }])
    })

    it('does not quantify with an escaped character', () => {
      expect(parsed('$x\\*').root.children).toEqual([
        { type: 'variable', name: 'x', position: 0 },
        { type: 'literal', text: '*', position: 2 },
      ])
    })

    it('escapes whitespace and brackets', () => {
      expect(parsed('\\  \\[').root.children).toEqual([
        { type: 'literal', text: ' ', position: 0 },
        { type: 'literal', text: '[', position: 3 },
      ])
    })
  })

  describe('errors', () => {
    it('reports an unclosed group at the end of input', () => {
      expect(parseError('($a')).toEqual({
        code: 'UNCLOSED_GROUP',
        message: "unclosed group '(' opened at 0",
        position: 3,
      })
    })

    it('reports an unclosed optional at the end of input', () => {
      expect(parseError('$a [$b')).toEqual({
        code: 'UNCLOSED_OPTIONAL',
        message: "unclosed optional '[' opened at 3",
        position: 6,
      })
    })

    it('reports a dangling escape', () => {
      expect(parseError('a \\')).toEqual({
        code: 'DANGLING_ESCAPE',
        message: "escape '\\' at end of pattern",
        position: 2,
      })
    })

    it('reports a missing variable name', () => {
      expect(parseError('$ x').code).toBe('EMPTY_VARIABLE')
      expect(parseError('$ x').position).toBe(0)
      expect(parseError('foo $1').position).toBe(4)
    })

    it('reports a quantifier with no atom', () => {
      expect(parseError('? $x')).toEqual({
        code: 'DANGLING_QUANTIFIER',
        message: "quantifier '?' has no preceding atom",
        position: 0,
      })
      expect(parseError('$x ?').position).toBe(3)
      expect(parseError('$x+?').position).toBe(3)
    })

    it('reports a closing parenthesis with no group', () => {
      expect(parseError('$a )')).toEqual({
        code: 'TRAILING_INPUT',
        message: "unexpected ')'",
        position: 3,
      })
    })

    it('reports error positions as byte offsets', () => {
      expect(parseError('é (')).toEqual({
        code: 'UNCLOSED_GROUP',
        message: "unclosed group '(' opened at 3",
        position: 4,
      })
    })

    it('reports the first error only', () => {
      expect(parseError('($').code).toBe('EMPTY_VARIABLE')
      expect(parseError('($').position).toBe(1)
    })

    it('keeps error positions within the source', () => {
      const sources = ['(', '[x', '\\', '$', '?', ')', '(($a) [$b', 'a ) b']

      for (const src of sources) {
        const error = parseError(src)
        expect(error.position, `position for ${src}`).toBeGreaterThanOrEqual(0)
        expect(error.position, `position for ${src}`).toBeLessThanOrEqual(src.length)
      }
    })
  })
})
