import { describe, it, expect } from 'vitest'
import type { SolverState, Word } from '../../types'
import { Episode } from '../episode'
import { runBatch, runCase } from '../batch'
import { BaseSolver } from '../../solvers/solver'
import { RandomConsistentSolver } from '../../solvers/random-consistent'
import { EpisodeFinishedError, InvalidConfigError } from '../../utils/errors'

const ANSWERS = ['crane', 'raise', 'stare']
const ALLOWED = ['crane', 'raise', 'stare', 'trace', 'cared']

/** Plays the same word every turn. */
class FixedSolver extends BaseSolver {
  readonly id = 'letter_freq'
  readonly name = 'Fixed'

  constructor(private word: Word) {
    super()
  }

  nextGuess(_state: SolverState): Word {
    return this.word
  }
}

describe('Episode', () => {
  it('solves the three-word scenario with a seeded random consistent solver', () => {
    const result = runCase(new RandomConsistentSolver(), 'crane', { answers: ANSWERS, allowed: ALLOWED, N: 5, seed: 42 })
    expect(result.success).toBe(true)
    expect(result.answer).toBe('crane')
    expect(result.guesses).toBeLessThanOrEqual(3)
    expect(result.history.at(-1)).toEqual(['crane', 'GGGGG'])
    expect(result.solverIds).toEqual(new Array(result.guesses).fill('random_consistent'))
  })

  it('rejects steps before reset and after the end', () => {
    const solver = new FixedSolver('crane')
    const episode = new Episode({ answers: ANSWERS, allowed: ALLOWED, N: 5 })
    expect(() => episode.step(solver)).toThrow(EpisodeFinishedError)

    episode.reset({ answer: 'crane', solvers: [solver] })
    const outcome = episode.step(solver)
    expect(outcome).toMatchObject({ guess: 'crane', pattern: 'GGGGG', status: 'won', valid: true })
    expect(episode.isDone).toBe(true)
    expect(() => episode.step(solver)).toThrow(/already won/)
  })

  it('filters the candidates after each miss', () => {
    const solver = new FixedSolver('raise')
    const episode = new Episode({ answers: ANSWERS, allowed: ALLOWED, N: 5 }).reset({ answer: 'crane', solvers: [solver] })
    const outcome = episode.step(solver)
    expect(outcome.pattern).toBe('YY--G')
    expect(outcome.remaining).toBe(1)
    expect(episode.candidates).toEqual(['crane'])
    expect(episode.previousCandidateCount).toBe(3)
    expect(episode.turn).toBe(1)
    expect(episode.status).toBe('in_progress')
  })

  it('ends lost after six misses', () => {
    const solver = new FixedSolver('stare')
    const episode = new Episode({ answers: ANSWERS, allowed: ALLOWED, N: 5 }).reset({ answer: 'crane', solvers: [solver] })
    while (!episode.isDone) episode.step(solver)

    const result = episode.result()
    expect(episode.status).toBe('lost')
    expect(result.success).toBe(false)
    expect(result.guesses).toBe(6)
    expect(result.history.every(([, pattern]) => pattern === '--GYG')).toBe(true)
  })

  it('gives invalid guesses the all-gray pattern in strict mode', () => {
    const solver = new FixedSolver('zzzzz')
    const strict = new Episode({ answers: ANSWERS, allowed: ALLOWED, N: 5, strictGuesses: true })
    strict.reset({ answer: 'crane', solvers: [solver] })
    expect(strict.step(solver)).toMatchObject({ pattern: '-----', valid: false, remaining: 3 })

    const relaxed = new Episode({ answers: ANSWERS, allowed: ALLOWED, N: 5 })
    relaxed.reset({ answer: 'crane', solvers: [solver] })
    expect(relaxed.step(new FixedSolver('trace'))).toMatchObject({ pattern: '-GGYG', valid: true })
  })

  it('plays an empty answer pool to a loss without throwing', () => {
    const solver = new RandomConsistentSolver()
    const result = runCase(solver, 'crane', { answers: [], allowed: [], N: 5, seed: 1 })
    expect(result.success).toBe(false)
    expect(result.guesses).toBe(6)
    expect(result.history[0]).toEqual(['aaaaa', '--G--'])
  })

  it('only accepts the six-turn budget', () => {
    expect(() => new Episode({ answers: ANSWERS, allowed: ALLOWED, N: 5, maxTurns: 8 })).toThrow(InvalidConfigError)
  })
})

describe('runBatch', () => {
  it('plays the first `sample` answers in order', () => {
    const results = runBatch(new RandomConsistentSolver(), ANSWERS, { allowed: ALLOWED, N: 5, seed: 7, sample: 2 })
    expect(results.map((r) => r.answer)).toEqual(['crane', 'raise'])
    expect(results.every((r) => r.success)).toBe(true)
  })

  it('is reproducible for a fixed seed', () => {
    const run = () => runBatch(new RandomConsistentSolver(), ANSWERS, { allowed: ALLOWED, N: 5, seed: 3 })
    expect(run().map((r) => r.history)).toEqual(run().map((r) => r.history))
  })
})
