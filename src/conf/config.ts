/** @file config.ts */

import type { SolverId } from '../types'

/**
 *  Shared constants for the engine, solvers and bandit.
 */
export namespace Conf {
  /**
   * Wordle turn budget, episodes end as lost after this many guesses.
   * @default 6
   */
  export const MAX_TURNS = 6

  /**
   * Default word length.
   * @default 5
   */
  export const WORD_LENGTH = 5

  /**
   * Letter used to build the placeholder guess when every pool is empty.
   * @default 'a'
   */
  export const PLACEHOLDER_LETTER = 'a'

  /**
   * Solver specific pool caps and scoring knobs.
   */
  export const SOLVERS = Object.freeze({
    /** at or below this many candidates solvers only search the candidates */
    CANDIDATE_ONLY_LIMIT: 200,
    /** cap on allowed words evaluated when the candidate set is large */
    POOL_CAP: 400,
    /** strongest candidates merged into the entropy pool */
    INCLUDE_TOP_CANDIDATES: 100,
    /** positional frequency: subtracted per repeated letter */
    DUPLICATE_PENALTY: 0.25,
    /** two-stage probe: fire the second probe above this many candidates */
    PROBE_LARGE_THRESHOLD: 1_200,
    /** two-ply: first-guess pool size */
    FIRST_POOL_CAP: 40,
    /** two-ply: answers sampled per first guess */
    SAMPLE_SIZE: 32,
    /** two-ply: second-ply pool, top-K candidates only */
    CAND_CAP_PLY2: 400,
  })

  /**
   * Contextual bandit defaults.
   */
  export const BANDIT = Object.freeze({
    /** exploration strength α */
    UCB_ALPHA: 0.5,
    /** ridge constant, A starts as RIDGE * I */
    RIDGE: 1.0,
    /** λ, weight of compute time in the per-turn reward */
    ALPHA_TIME: 0.2,
    /** cost of a regular turn */
    TURN_COST: 1,
    /** cost of a turn spent on an invalid guess */
    INVALID_GUESS_COST: 2,
    DEFAULT_ACTIONS: ['positional_freq', 'expected_left', 'max_patterns', 'letter_freq'] as readonly SolverId[],
  })
}
