/** @file registry.ts */

import type { SolverId } from '../types'
import type { Solver } from './solver'
import { DuplicateSolverError, UnknownSolverError } from '../utils/errors'
import { RandomConsistentSolver } from './random-consistent'
import { LetterFreqSolver } from './letter-freq'
import { PositionalFreqSolver } from './positional-freq'
import { EntropySolver } from './entropy'
import { WeightedEntropySolver } from './entropy-weighted'
import { ExpectedLeftSolver } from './expected-left'
import { MaxPatternsSolver } from './max-patterns'
import { TwoStageProbeSolver } from './two-stage-probe'
import { TwoPlyMCSolver } from './two-ply-mc'

export type SolverFactory = () => Solver

/**
 *  Maps solver ids to constructors. Filled by explicit `register` calls,
 *  a repeated id is a configuration error.
 */
export class SolverRegistry {
  private factories = new Map<string, SolverFactory>()

  register(id: SolverId, factory: SolverFactory): this {
    if (this.factories.has(id)) throw new DuplicateSolverError(id)
    this.factories.set(id, factory)
    return this
  }

  has(id: string): id is SolverId {
    return this.factories.has(id)
  }

  /**
   * Fresh instance for `id`, every episode (and every concurrent run) needs
   * its own since solvers keep per-episode caches.
   */
  create(id: string): Solver {
    const factory = this.factories.get(id)
    if (!factory) throw new UnknownSolverError(id, this.ids())
    return factory()
  }

  /** Registered ids, sorted for stable help text. */
  ids(): SolverId[] {
    return [...this.factories.keys()].filter((id): id is SolverId => this.has(id)).sort()
  }
}

export function createDefaultRegistry(): SolverRegistry {
  return new SolverRegistry()
    .register('random_consistent', () => new RandomConsistentSolver())
    .register('letter_freq', () => new LetterFreqSolver())
    .register('positional_freq', () => new PositionalFreqSolver())
    .register('entropy', () => new EntropySolver())
    .register('entropy_weighted', () => new WeightedEntropySolver())
    .register('expected_left', () => new ExpectedLeftSolver())
    .register('max_patterns', () => new MaxPatternsSolver())
    .register('two_stage_probe', () => new TwoStageProbeSolver())
    .register('two_ply_mc', () => new TwoPlyMCSolver())
}

/** Process-wide registry, built once on first import. */
export const solvers = createDefaultRegistry()

export const createSolver = (id: string): Solver => solvers.create(id)

export const getSolverIds = (): SolverId[] => solvers.ids()
