import type { SolverState, Word } from '../types'
import { Conf } from '../conf/config'
import { BaseSolver } from './solver'
import { PositionalFreqSolver } from './positional-freq'
import { collectBest, distinctScore, documentCounts, higher } from './heuristics'

/**
 *  Two-stage coverage. Turn 1 plays the allowed word covering the most
 *  candidate letters; turn 2, while the space is still large, a second
 *  probe built from letters guess 1 didn't use. Afterwards positional
 *  frequency takes over for precision. No fixed opener lists.
 */
export class TwoStageProbeSolver extends BaseSolver {
  readonly id = 'two_stage_probe'
  readonly name = 'Two-Stage Coverage'

  private readonly fallback = new PositionalFreqSolver()

  private pickProbe(state: SolverState, banned?: ReadonlySet<string>): Word {
    const { candidates, allowed } = state
    const counts = documentCounts(candidates.length ? candidates : allowed)
    const best = collectBest(allowed, (w) => distinctScore(w, counts, banned), higher)
    return this.pickTie(best, state)
  }

  nextGuess(state: SolverState): Word {
    const { turn, candidates, history } = state

    if (turn === 1) return this.pickProbe(state)

    const firstGuess = history[0]?.[0]
    if (turn === 2 && firstGuess && candidates.length > Conf.SOLVERS.PROBE_LARGE_THRESHOLD) {
      return this.pickProbe(state, new Set(firstGuess.toLowerCase()))
    }

    return this.fallback.nextGuess(state)
  }
}
