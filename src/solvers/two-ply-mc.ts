/** @file two-ply-mc.ts */

import type { Pattern, SolverState, Word } from '../types'
import type { Random } from '../utils/random'
import { Conf } from '../conf/config'
import { score } from '../engine/scoring'
import { filterCandidates } from '../engine/constraints'
import { BaseSolver } from './solver'
import {
  collectBest,
  distinctScore,
  documentCounts,
  higher,
  positionalCounts,
  positionalScore,
  stableUnion,
  topBy,
} from './heuristics'

interface PlyEstimate {
  /** mean size of the candidate set left after two guesses */
  average: number
  worst: number
}

/**
 *  Two-ply Monte-Carlo lookahead, turn 1 only.
 *
 *  For every first guess of a small coverage-ranked pool, a sample of hidden
 *  answers is grouped by first pattern. Each group gets its filtered set, a
 *  cheap positional second guess on that set, and each sampled answer adds
 *  the size of its second-pattern bucket. The guess with the smallest mean
 *  wins (smaller worst on ties).
 *
 *  A guess is abandoned once its running mean reaches the best mean so far.
 *  That bound assumes the unprocessed groups could all score 0, it is a
 *  heuristic and may prune the true optimum.
 *
 *  Later turns use the candidate-only positional picker directly.
 */
export class TwoPlyMCSolver extends BaseSolver {
  readonly id = 'two_ply_mc'
  readonly name = 'Two-Ply Monte-Carlo'
  readonly version = '1.1.0'

  /**
   * Positional-frequency pick restricted to `cands`, capped to the top
   * `CAND_CAP_PLY2` by distinct coverage (never scans the allowed list).
   */
  pickOnCandidates(cands: readonly Word[], N: number, rng: Random): Word {
    if (!cands.length) return this.placeholder(N)
    const counts = documentCounts(cands)
    const pool = topBy(cands, (w) => distinctScore(w, counts), Conf.SOLVERS.CAND_CAP_PLY2)
    const pos = positionalCounts(cands, N)
    const best = collectBest(pool, (w) => positionalScore(w, pos, Conf.SOLVERS.DUPLICATE_PENALTY), higher)
    return rng.pick(best)
  }

  selectFirstPool(candidates: readonly Word[], allowed: readonly Word[]): Word[] {
    const counts = documentCounts(candidates.length ? candidates : allowed)
    const rank = (w: Word) => distinctScore(w, counts)
    const base = topBy(allowed, rank, Conf.SOLVERS.FIRST_POOL_CAP)
    const topCandidates = topBy(candidates, rank, Math.floor(Conf.SOLVERS.FIRST_POOL_CAP / 2))
    return stableUnion(topCandidates, base)
  }

  /**
   * Two-step expected-remaining estimate for `guess`, or the partial
   * estimate at the point it was pruned against `bestAverage`.
   */
  estimate(guess: Word, sample: readonly Word[], state: SolverState, bestAverage?: number): PlyEstimate {
    const { candidates, N, rng } = state

    const groups = new Map<Pattern, Word[]>()
    for (const answer of sample) {
      const key = score(guess, answer)
      const group = groups.get(key)
      if (group) group.push(answer)
      else groups.set(key, [answer])
    }

    let total = 0
    let worst = 0
    let processed = 0

    for (const [pattern1, groupAnswers] of groups) {
      const reduced = filterCandidates(candidates, [[guess, pattern1]], N)
      if (!reduced.length) continue

      const second = this.pickOnCandidates(reduced, N, rng)
      const buckets = new Map<Pattern, number>()
      for (const a of reduced) {
        const key = score(second, a)
        buckets.set(key, (buckets.get(key) ?? 0) + 1)
      }

      for (const a of groupAnswers) {
        const size = buckets.get(score(second, a)) ?? 0
        total += size
        if (size > worst) worst = size
        processed++
      }

      if (bestAverage !== undefined && processed > 0 && total / processed >= bestAverage) break
    }

    return { average: total / Math.max(1, processed), worst }
  }

  nextGuess(state: SolverState): Word {
    const { turn, candidates, allowed, N, rng } = state

    if (turn > 1) return this.pickOnCandidates(candidates, N, rng)

    const pool = this.selectFirstPool(candidates, allowed)
    if (!pool.length) return this.placeholder(N)

    const sample = rng.sample(candidates, Conf.SOLVERS.SAMPLE_SIZE)

    let best: PlyEstimate | undefined
    let bestWords: Word[] = []

    for (const g of pool) {
      const est = this.estimate(g, sample, state, best?.average)
      if (!best || est.average < best.average || (est.average === best.average && est.worst < best.worst)) {
        best = est
        bestWords = [g]
      } else if (est.average === best.average && est.worst === best.worst) {
        bestWords.push(g)
      }
    }

    return this.pickTie(bestWords, state, pool)
  }
}
