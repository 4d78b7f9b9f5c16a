import type { SolverState, Word } from '../types'
import { Conf } from '../conf/config'
import { BaseSolver } from './solver'
import { collectBest, distinctScore, higher, letterCounts } from './heuristics'

/**
 *  Scores each word by the candidate-set frequency of its distinct letters
 *  (prefers "slate" over "sleet"). Large candidate sets score the allowed
 *  list instead, where cheap probe words split the space better.
 */
export class LetterFreqSolver extends BaseSolver {
  readonly id = 'letter_freq'
  readonly name = 'Letter Frequency (distinct)'

  nextGuess(state: SolverState): Word {
    const { candidates, allowed } = state
    const pool = candidates.length <= Conf.SOLVERS.CANDIDATE_ONLY_LIMIT ? candidates : allowed
    const counts = letterCounts(candidates.length ? candidates : allowed)

    const best = collectBest(pool, (w) => distinctScore(w, counts), higher)
    return this.pickTie(best, state, pool, allowed, candidates)
  }
}
