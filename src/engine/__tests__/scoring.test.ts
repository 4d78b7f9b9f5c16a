import { describe, it, expect } from 'vitest'
import { score, allGreen, allGray, isWin } from '../scoring'
import { ScoreLengthMismatchError } from '../../utils/errors'

describe('score – N=5 goldens', () => {
  it.each([
    ['belle', 'level', '-GYYY'],
    ['level', 'level', 'GGGGG'],
    ['lemon', 'level', 'GG---'],
    ['cools', 'scoop', 'YYG-Y'],
    ['scoop', 'scoop', 'GGGGG'],
    ['crane', 'crane', 'GGGGG'],
    ['raise', 'crane', 'YY--G'],
    ['stare', 'crane', '--GYG'],
  ])('score(%s, %s) = %s', (guess, answer, expected) => {
    expect(score(guess, answer)).toBe(expected)
  })
})

describe('score – N=6 samples', () => {
  it.each([
    ['settle', 'letter', '-GGGYY'],
    ['little', 'letter', 'G-GG-Y'],
    ['planet', 'palate', 'GYY-YY'],
    ['kitten', 'tinket', 'YGYYGY'],
  ])('score(%s, %s) = %s', (guess, answer, expected) => {
    expect(score(guess, answer)).toBe(expected)
  })
})

describe('score – properties', () => {
  it('a word scored against itself is all green', () => {
    for (const w of ['crane', 'eerie', 'mamma', 'letter', 'xylyl']) {
      expect(score(w, w)).toBe(allGreen(w.length))
    }
  })

  it('is deterministic', () => {
    const first = score('belle', 'level')
    for (let i = 0; i < 10; i++) expect(score('belle', 'level')).toBe(first)
  })

  it('normalizes case and surrounding whitespace', () => {
    expect(score(' CRANE', 'crane ')).toBe('GGGGG')
  })

  it('caps yellows by the answer multiplicity', () => {
    // the answer's only "e" is consumed by the green
    expect(score('eerie', 'crane')).toBe('--Y-G')
  })

  it('throws on a length mismatch', () => {
    expect(() => score('crane', 'cranes')).toThrow(ScoreLengthMismatchError)
  })
})

describe('pattern helpers', () => {
  it('builds and recognizes terminal patterns', () => {
    expect(allGreen(5)).toBe('GGGGG')
    expect(allGray(4)).toBe('----')
    expect(isWin('GGGGG')).toBe(true)
    expect(isWin('GGGG-')).toBe(false)
    expect(isWin('')).toBe(false)
  })
})
