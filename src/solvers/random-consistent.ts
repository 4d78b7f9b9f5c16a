import type { SolverState, Word } from '../types'
import { BaseSolver } from './solver'

/**
 *  Baseline: uniform pick from the words still consistent with the feedback,
 *  the allowed list when (unexpectedly) none are left.
 */
export class RandomConsistentSolver extends BaseSolver {
  readonly id = 'random_consistent'
  readonly name = 'Random Consistent'

  nextGuess(state: SolverState): Word {
    return this.pickTie(state.candidates, state, state.allowed)
  }
}
