/** @file episode.ts */

import type { EpisodeResult, EpisodeStatus, EpisodeStep, History, SolverState, Word } from '../types'
import type { Solver } from '../solvers/solver'
import { Conf } from '../conf/config'
import { allGray, isWin, score } from '../engine/scoring'
import { filterCandidates } from '../engine/constraints'
import { validateGuess } from '../engine/validation'
import { EpisodeFinishedError, InvalidConfigError } from '../utils/errors'

export interface EpisodeConfig {
  answers: readonly Word[]
  allowed: readonly Word[]
  N: number
  /**
   * Turn budget, fixed by the Wordle rules.
   * @default 6
   */
  maxTurns?: number
  /**
   * When set, a guess that isn't an allowed N-letter word is not scored and
   * gets the all-gray "no information" pattern instead.
   * @default false
   */
  strictGuesses?: boolean
}

export interface EpisodeResetProps {
  answer: Word
  /** solvers that may be asked for guesses during this episode */
  solvers?: readonly Solver[]
  seed?: number
}

export interface StepOutcome extends EpisodeStep {
  valid: boolean
  status: EpisodeStatus
}

/**
 *  ## Episode
 *
 *  One game as a small state machine: `in_progress` until a guess comes back
 *  all green (`won`) or the turn budget runs out (`lost`). Terminal episodes
 *  reject further steps until the next `reset`.
 */
export class Episode {
  readonly N: number
  readonly maxTurns: number
  readonly answers: readonly Word[]
  readonly allowed: readonly Word[]

  private readonly allowedSet: ReadonlySet<Word>
  private readonly strictGuesses: boolean

  public status: EpisodeStatus = 'in_progress'
  public turn = 0
  public history: History = []
  public candidates: Word[] = []
  public steps: EpisodeStep[] = []
  /** candidate count before the latest guess, undefined on turn 0 */
  public previousCandidateCount?: number

  private answer?: Word

  constructor(config: EpisodeConfig) {
    this.N = config.N
    this.maxTurns = config.maxTurns ?? Conf.MAX_TURNS
    if (this.maxTurns !== Conf.MAX_TURNS) {
      throw new InvalidConfigError(`maxTurns must be ${Conf.MAX_TURNS} for Wordle rules, got ${this.maxTurns}`)
    }
    this.answers = config.answers.filter((w) => w.length === config.N)
    this.allowed = config.allowed.filter((w) => w.length === config.N)
    this.allowedSet = new Set(this.allowed)
    this.strictGuesses = config.strictGuesses ?? false
  }

  get hiddenAnswer(): Word | undefined {
    return this.answer
  }

  get isDone(): boolean {
    return this.status !== 'in_progress'
  }

  get lastPattern(): string | undefined {
    return this.history.at(-1)?.[1]
  }

  reset({ answer, solvers = [], seed }: EpisodeResetProps): this {
    this.answer = answer.trim().toLowerCase()
    this.status = 'in_progress'
    this.turn = 0
    this.history = []
    this.steps = []
    this.candidates = this.answers.slice()
    this.previousCandidateCount = undefined

    for (const solver of solvers) {
      solver.reset({ allowed: this.allowed, answers: this.answers, N: this.N, seed })
    }
    return this
  }

  /** Snapshot handed to a solver for the coming turn. */
  stateFor(solver: Solver): SolverState {
    return {
      turn: this.turn + 1,
      history: this.history.slice(),
      candidates: this.candidates,
      allowed: this.allowed,
      N: this.N,
      rng: solver.rng,
    }
  }

  /**
   * Asks `solver` for a guess (timed), scores it, and advances the state.
   */
  step(solver: Solver): StepOutcome {
    if (this.isDone || this.answer === undefined) {
      throw new EpisodeFinishedError(this.answer === undefined ? 'not started' : this.status)
    }

    const state = this.stateFor(solver)
    const t0 = performance.now()
    const guess = solver.nextGuess(state).trim().toLowerCase()
    const timeMs = performance.now() - t0

    const valid = validateGuess(guess, this.allowedSet, this.N)
    const pattern =
      (this.strictGuesses && !valid) || guess.length !== this.N ? allGray(this.N) : score(guess, this.answer)

    this.history.push([guess, pattern])
    this.previousCandidateCount = this.candidates.length

    if (isWin(pattern)) {
      this.status = 'won'
    } else {
      this.candidates = filterCandidates(this.candidates, [[guess, pattern]], this.N)
    }

    this.turn++
    if (this.status === 'in_progress' && this.turn >= this.maxTurns) this.status = 'lost'

    const outcome: StepOutcome = {
      guess,
      pattern,
      solverId: solver.id,
      timeMs,
      remaining: this.candidates.length,
      valid,
      status: this.status,
    }
    this.steps.push(outcome)
    return outcome
  }

  result(): EpisodeResult {
    return {
      answer: this.answer ?? '',
      success: this.status === 'won',
      guesses: this.history.length,
      timeMs: this.steps.reduce((total, s) => total + s.timeMs, 0),
      history: this.history.slice(),
      solverIds: this.steps.map((s) => s.solverId),
    }
  }
}
