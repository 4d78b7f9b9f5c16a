/** @file batch.ts */

import type { EpisodeResult, Word } from '../types'
import type { Solver } from '../solvers/solver'
import { Conf } from '../conf/config'
import { Episode } from './episode'
import { summarize } from './summary'

export interface CaseOptions {
  allowed: readonly Word[]
  answers: readonly Word[]
  N: number
  maxTurns?: number
  seed?: number
}

export interface BatchOptions extends Omit<CaseOptions, 'answers'> {
  /** only play the first K answers */
  sample?: number
  /** log a progress line every K cases, 0 disables */
  logEvery?: number
}

/**
 * Plays one game of `solver` against `answer` until it wins or runs out of turns.
 */
export function runCase(solver: Solver, answer: Word, options: CaseOptions): EpisodeResult {
  const episode = new Episode({
    answers: options.answers,
    allowed: options.allowed,
    N: options.N,
    maxTurns: options.maxTurns ?? Conf.MAX_TURNS,
  })
  episode.reset({ answer, solvers: [solver], seed: options.seed })
  while (!episode.isDone) episode.step(solver)
  return episode.result()
}

/**
 * Runs every answer of the pool (or the first `sample`) back to back. Case
 * `i` (1-based) is seeded with `seed + i` so runs are reproducible but not
 * identical across cases.
 */
export function runBatch(solver: Solver, answers: readonly Word[], options: BatchOptions): EpisodeResult[] {
  const { sample, logEvery = 0, seed, ...rest } = options
  let pool = answers.filter((w) => w.length === options.N)
  if (sample !== undefined) pool = pool.slice(0, sample)

  const results: EpisodeResult[] = []
  pool.forEach((answer, index) => {
    const caseSeed = seed === undefined ? undefined : seed + index + 1
    results.push(runCase(solver, answer, { ...rest, answers, seed: caseSeed }))

    if (logEvery > 0 && results.length % logEvery === 0) {
      const summary = summarize(results)
      console.log(
        `[run] ${solver.id} ${results.length}/${pool.length}`,
        `win_rate=${summary.winRate.toFixed(3)} avg_guesses=${summary.averageGuesses.toFixed(3)}`
      )
    }
  })
  return results
}
