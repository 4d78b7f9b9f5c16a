import type { Word } from '../types'
import { PartitionSolver, type PartitionScore } from './partition-solver'
import { largestBucket, partition } from './heuristics'

/**
 *  Max pattern diversity: the guess producing the most distinct feedback
 *  patterns over the candidates wins.
 */
export class MaxPatternsSolver extends PartitionSolver {
  readonly id = 'max_patterns'
  readonly name = 'Max Pattern Diversity'
  protected readonly maximize = true

  protected evaluate(guess: Word, candidates: readonly Word[]): PartitionScore {
    const buckets = partition(guess, candidates)
    return { value: buckets.size, worst: largestBucket(buckets) }
  }
}
