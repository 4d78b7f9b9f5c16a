import { describe, it, expect } from 'vitest'
import { filterCandidates } from '../constraints'
import { score } from '../scoring'
import { validateGuess } from '../validation'
import { Random } from '../../utils/random'
import type { History } from '../../types'

const POOL = ['crane', 'raise', 'stare', 'trace', 'cared', 'racer', 'scoop']

describe('filterCandidates', () => {
  it('keeps words consistent with the history', () => {
    const cand = filterCandidates(POOL, [['raise', 'YY--G']], 5)
    expect(cand).toContain('crane')
    expect(cand).not.toContain('stare')
    expect(cand).not.toContain('scoop')
  })

  it('returns the whole clean pool for an empty history, order preserved', () => {
    expect(filterCandidates(POOL, [], 5)).toEqual(POOL)
  })

  it('drops tokens of the wrong length or with non-letters', () => {
    expect(filterCandidates(['crane', 'cranes', 'cr4ne', ' RAISE '], [], 5)).toEqual(['crane', 'raise'])
  })

  it('works for N=6', () => {
    const cand = filterCandidates(['letter', 'settle', 'little', 'tattle', 'better'], [['settle', '-GGGYY']], 6)
    expect(cand).toContain('letter')
    expect(cand).not.toContain('better')
  })

  it('never filters out the hidden answer when history comes from the scorer', () => {
    const words = ['crane', 'raise', 'stare', 'trace', 'cared', 'racer', 'scoop', 'level', 'belle', 'lemon', 'cools']
    const rng = new Random(11)
    for (let trial = 0; trial < 50; trial++) {
      const answer = rng.pick(words)
      const history: History = []
      let pool = words.slice()
      for (let turn = 0; turn < 4; turn++) {
        const guess = rng.pick(words)
        history.push([guess, score(guess, answer)])
        pool = filterCandidates(pool, history, 5)
        expect(pool).toContain(answer)
      }
    }
  })
})

describe('validateGuess', () => {
  it('accepts allowed words case-insensitively and rejects malformed ones', () => {
    const allowed = ['crane', 'raise', 'stare']
    expect(validateGuess('CRANE', allowed, 5)).toBe(true)
    expect(validateGuess('cranes', allowed, 5)).toBe(false)
    expect(validateGuess('???', allowed, 5)).toBe(false)
    expect(validateGuess('trace', allowed, 5)).toBe(false)
    expect(validateGuess(42, allowed, 5)).toBe(false)
  })

  it('accepts a prebuilt set', () => {
    expect(validateGuess('stare', new Set(['stare']), 5)).toBe(true)
  })
})
