import type { SolverState, Word } from '../types'
import { Conf } from '../conf/config'
import { BaseSolver } from './solver'
import { collectBest, higher, positionalCounts, positionalScore } from './heuristics'

/**
 *  Positional letter frequency: Σ over slots of how many candidates have
 *  the same letter in the same slot, with a small penalty per repeated
 *  letter to keep early coverage.
 */
export class PositionalFreqSolver extends BaseSolver {
  readonly id = 'positional_freq'
  readonly name = 'Positional Letter Frequency'

  nextGuess(state: SolverState): Word {
    const { candidates, allowed, N } = state
    const pool = candidates.length <= Conf.SOLVERS.CANDIDATE_ONLY_LIMIT ? candidates : allowed
    if (!pool.length) return this.placeholder(N)

    const counts = positionalCounts(candidates.length ? candidates : allowed, N)
    const best = collectBest(pool, (w) => positionalScore(w, counts, Conf.SOLVERS.DUPLICATE_PENALTY), higher)
    return this.pickTie(best, state)
  }
}
