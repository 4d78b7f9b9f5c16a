/** @file solver.ts */

import type { SolverId, SolverResetProps, SolverState, Word } from '../types'
import { Conf } from '../conf/config'
import { Random } from '../utils/random'

/**
 *  ## Solver
 *
 *  A guess-selection policy. `reset` is called once per episode and may
 *  rebuild per-episode caches; `nextGuess` is called every turn and must
 *  return a word of length N even when every pool is empty.
 */
export interface Solver {
  readonly id: SolverId
  readonly name: string
  readonly version: string
  readonly rng: Random
  reset(props: SolverResetProps): void
  nextGuess(state: SolverState): Word
}

export abstract class BaseSolver implements Solver {
  abstract readonly id: SolverId
  abstract readonly name: string
  readonly version: string = '1.0.0'

  protected allowed: readonly Word[] = []
  protected answers: readonly Word[] = []
  protected N: number = Conf.WORD_LENGTH

  /** seeded in reset(), handed to nextGuess through the state */
  public rng: Random = new Random(0)

  reset({ allowed, answers, N, seed }: SolverResetProps): void {
    this.allowed = allowed
    this.answers = answers
    this.N = N
    this.rng = new Random(seed)
  }

  abstract nextGuess(state: SolverState): Word

  /**
   * Degenerate but well-formed guess for when there is nothing to pick from,
   * the episode scores it and runs out of turns.
   */
  protected placeholder(N: number = this.N): Word {
    return Conf.PLACEHOLDER_LETTER.repeat(N)
  }

  /**
   * Seeded tie-break over `best`, falling back through the pools when the
   * search produced nothing.
   */
  protected pickTie(best: readonly Word[], state: SolverState, ...fallbacks: (readonly Word[])[]): Word {
    for (const pool of [best, ...fallbacks]) {
      if (pool.length) return state.rng.pick(pool)
    }
    return this.placeholder(state.N)
  }
}
