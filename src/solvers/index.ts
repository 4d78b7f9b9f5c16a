export type { Solver } from './solver'
export { BaseSolver } from './solver'
export { SolverRegistry, createDefaultRegistry, createSolver, getSolverIds, solvers } from './registry'
export { RandomConsistentSolver } from './random-consistent'
export { LetterFreqSolver } from './letter-freq'
export { PositionalFreqSolver } from './positional-freq'
export { EntropySolver } from './entropy'
export { WeightedEntropySolver } from './entropy-weighted'
export { ExpectedLeftSolver } from './expected-left'
export { MaxPatternsSolver } from './max-patterns'
export { TwoStageProbeSolver } from './two-stage-probe'
export { TwoPlyMCSolver } from './two-ply-mc'
