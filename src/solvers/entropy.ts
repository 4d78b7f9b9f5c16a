import type { Word } from '../types'
import { Conf } from '../conf/config'
import { PartitionSolver, type PartitionScore } from './partition-solver'
import { distinctScore, letterCounts, partition, stableUnion, topBy } from './heuristics'

/**
 * Shannon entropy (bits) of the bucket-size distribution of `candidates`
 * under `guess`, with the worst bucket size.
 */
export function entropyOfGuess(guess: Word, candidates: readonly Word[]): PartitionScore {
  const n = candidates.length
  if (n <= 1) return { value: 0, worst: 0 }

  let value = 0
  let worst = 0
  for (const c of partition(guess, candidates).values()) {
    const p = c / n
    value -= p * Math.log2(p)
    if (c > worst) worst = c
  }
  return { value, worst }
}

/**
 *  Expected information gain. Picks the guess whose feedback has the most
 *  entropy over the current candidates, smaller worst bucket on ties.
 *
 *  Large candidate sets don't scan the whole allowed list: allowed words are
 *  pre-ranked by distinct-letter coverage of the candidates, the top
 *  `POOL_CAP` kept and merged after the strongest candidates.
 */
export class EntropySolver extends PartitionSolver {
  readonly id = 'entropy'
  readonly name = 'Entropy (Expected Information Gain)'
  readonly version = '1.1.0'
  protected readonly maximize = true

  protected evaluate(guess: Word, candidates: readonly Word[]): PartitionScore {
    return entropyOfGuess(guess, candidates)
  }

  protected selectPool(candidates: readonly Word[], allowed: readonly Word[]): readonly Word[] {
    if (candidates.length <= Conf.SOLVERS.CANDIDATE_ONLY_LIMIT) return candidates

    const counts = letterCounts(candidates)
    const rank = (w: Word) => distinctScore(w, counts)
    const topAllowed = topBy(allowed, rank, Conf.SOLVERS.POOL_CAP)
    const topCandidates = topBy(candidates, rank, Conf.SOLVERS.INCLUDE_TOP_CANDIDATES)

    return stableUnion(topCandidates, topAllowed)
  }
}
