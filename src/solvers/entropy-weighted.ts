import type { SolverResetProps, Word } from '../types'
import { Conf } from '../conf/config'
import { PartitionSolver, type PartitionScore } from './partition-solver'
import { distinctScore, letterCounts, topBy } from './heuristics'
import { score } from '../engine/scoring'

/**
 * Weighted entropy of `guess`: bucket probabilities are the share of prior
 * weight, unknown answers weigh 1. Worst bucket is still a word count.
 */
export function weightedEntropyOfGuess(
  guess: Word,
  candidates: readonly Word[],
  weight: ReadonlyMap<Word, number>
): PartitionScore {
  const bucketWeight = new Map<string, number>()
  const bucketCount = new Map<string, number>()
  let total = 0

  for (const answer of candidates) {
    const key = score(guess, answer)
    const w = weight.get(answer) ?? 1
    bucketWeight.set(key, (bucketWeight.get(key) ?? 0) + w)
    bucketCount.set(key, (bucketCount.get(key) ?? 0) + 1)
    total += w
  }
  if (total <= 0) return { value: 0, worst: 0 }

  let value = 0
  let worst = 0
  for (const [key, w] of bucketWeight) {
    const p = w / total
    value -= p * Math.log2(p)
    worst = Math.max(worst, bucketCount.get(key) ?? 0)
  }
  return { value, worst }
}

/**
 *  Entropy with a prior over answers, hedges against an incomplete answer
 *  pool. The prior is rebuilt on every reset from global letter frequency
 *  over the allowed list: w(word) = max(1, Σ distinct-letter counts).
 */
export class WeightedEntropySolver extends PartitionSolver {
  readonly id = 'entropy_weighted'
  readonly name = 'Entropy (Weighted)'
  protected readonly maximize = true

  private priorWeight = new Map<Word, number>()

  reset(props: SolverResetProps): void {
    super.reset(props)
    const globalCounts = letterCounts(this.allowed)
    this.priorWeight = new Map(this.allowed.map((w) => [w, Math.max(1, distinctScore(w, globalCounts))]))
  }

  getPriorWeight(word: Word): number {
    return this.priorWeight.get(word) ?? 1
  }

  protected evaluate(guess: Word, candidates: readonly Word[]): PartitionScore {
    return weightedEntropyOfGuess(guess, candidates, this.priorWeight)
  }

  protected selectPool(candidates: readonly Word[], allowed: readonly Word[]): readonly Word[] {
    if (candidates.length <= Conf.SOLVERS.CANDIDATE_ONLY_LIMIT) return candidates
    return topBy(allowed, (w) => this.getPriorWeight(w), Conf.SOLVERS.POOL_CAP)
  }
}
