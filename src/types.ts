import type { Random } from './utils/random'

/**
 * Lowercase a-z string of the episode's word length.
 */
export type Word = string

/**
 * Feedback symbols: green (right letter, right slot), yellow (right letter,
 * wrong slot), gray (absent or already used up).
 */
export type PatternChar = 'G' | 'Y' | '-'

/**
 * Feedback string of length N over {@link PatternChar}, e.g. `"-GYYY"`.
 */
export type Pattern = string

export type Turn = readonly [guess: Word, pattern: Pattern]

export type History = Turn[]

export type SolverId =
  | 'random_consistent'
  | 'letter_freq'
  | 'positional_freq'
  | 'entropy'
  | 'entropy_weighted'
  | 'expected_left'
  | 'max_patterns'
  | 'two_stage_probe'
  | 'two_ply_mc'

export interface SolverResetProps {
  allowed: readonly Word[]
  answers: readonly Word[]
  N: number
  seed?: number
}

export interface SolverState {
  /** 1-based turn index */
  turn: number
  history: History
  candidates: readonly Word[]
  allowed: readonly Word[]
  N: number
  rng: Random
}

export type EpisodeStatus = 'in_progress' | 'won' | 'lost'

export interface EpisodeStep {
  guess: Word
  pattern: Pattern
  solverId: string
  timeMs: number
  remaining: number
}

export interface EpisodeResult {
  answer: Word
  success: boolean
  guesses: number
  timeMs: number
  history: History
  /** which policy produced each guess (varies per turn for bandit runs) */
  solverIds: string[]
}
