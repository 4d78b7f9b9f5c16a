/** @file partition-solver.ts */

import type { SolverState, Word } from '../types'
import { Conf } from '../conf/config'
import { BaseSolver } from './solver'
import { collectBest, distinctScore, documentCounts, topBy } from './heuristics'

export interface PartitionScore {
  /** the solver's objective, see `maximize` */
  value: number
  /** size of the largest pattern bucket */
  worst: number
}

/**
 *  Shared search loop for solvers that bucket the current candidates by the
 *  pattern a guess would produce: evaluate every word of a capped pool, keep
 *  the best objective, break ties by the smaller worst bucket and then by
 *  the seeded random source.
 */
export abstract class PartitionSolver extends BaseSolver {
  /** true when a larger objective is better */
  protected abstract readonly maximize: boolean

  protected abstract evaluate(guess: Word, candidates: readonly Word[]): PartitionScore

  /**
   * Small candidate sets search only the candidates. Larger ones rank the
   * allowed list by distinct-letter coverage of the candidates and keep the
   * top `POOL_CAP`.
   */
  protected selectPool(candidates: readonly Word[], allowed: readonly Word[]): readonly Word[] {
    if (candidates.length <= Conf.SOLVERS.CANDIDATE_ONLY_LIMIT) return candidates
    const counts = documentCounts(candidates)
    return topBy(allowed, (w) => distinctScore(w, counts), Conf.SOLVERS.POOL_CAP)
  }

  private compare = (a: PartitionScore, b: PartitionScore): number => {
    if (a.value !== b.value) return (a.value > b.value) === this.maximize ? 1 : -1
    return Math.sign(b.worst - a.worst)
  }

  nextGuess(state: SolverState): Word {
    const { candidates, allowed } = state
    const pool = this.selectPool(candidates, allowed)
    const best = collectBest(pool, (g) => this.evaluate(g, candidates), this.compare)
    return this.pickTie(best, state, pool, allowed, candidates)
  }
}
