import type { Word } from '../types'
import { PartitionSolver, type PartitionScore } from './partition-solver'
import { largestBucket, partition } from './heuristics'

/**
 * Σ c² over bucket sizes, n·E[remaining candidates | guess].
 */
export function sumSquaredBuckets(guess: Word, candidates: readonly Word[]): PartitionScore {
  const buckets = partition(guess, candidates)
  let value = 0
  for (const c of buckets.values()) value += c * c
  return { value, worst: largestBucket(buckets) }
}

/**
 *  Expected remaining candidates: minimizes (1/n)·Σ c², tracks entropy
 *  closely but needs no logs.
 */
export class ExpectedLeftSolver extends PartitionSolver {
  readonly id = 'expected_left'
  readonly name = 'Expected Remaining Candidates'
  protected readonly maximize = false

  protected evaluate(guess: Word, candidates: readonly Word[]): PartitionScore {
    return sumSquaredBuckets(guess, candidates)
  }
}
