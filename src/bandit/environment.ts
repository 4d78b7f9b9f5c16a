/** @file environment.ts */

import type { EpisodeResult, History, Pattern, SolverId, Word } from '../types'
import type { Solver } from '../solvers/solver'
import type { StepOutcome } from '../harness/episode'
import { Conf } from '../conf/config'
import { Episode } from '../harness/episode'
import { SolverRegistry, solvers as defaultRegistry } from '../solvers/registry'
import { InvalidConfigError, UnknownActionError } from '../utils/errors'
import { Random } from '../utils/random'
import { makeFeatures } from './features'

export interface BanditEnvConfig {
  answers: readonly Word[]
  allowed: readonly Word[]
  N: number
  /**
   * Solver ids the bandit chooses between.
   * @default Conf.BANDIT.DEFAULT_ACTIONS
   */
  actions?: readonly SolverId[]
  /**
   * λ, weight of compute time in the reward.
   * @default 0.2
   */
  alphaTime?: number
  seed?: number
  registry?: SolverRegistry
}

export interface Observation {
  turn: number
  N: number
  candidates: readonly Word[]
  history: History
  features: number[]
}

export interface StepInfo {
  guess: Word
  pattern: Pattern
  timeMs: number
  solverId: SolverId
  valid: boolean
  /** revealed once the episode is over */
  answer?: Word
}

export interface EnvStep {
  observation: Observation
  reward: number
  done: boolean
  info: StepInfo
}

/**
 * Per-turn reward: a fixed turn cost (heavier for an invalid guess) plus the
 * compute-time penalty `λ·ms/100`.
 */
export function turnReward(timeMs: number, valid: boolean, alphaTime: number = Conf.BANDIT.ALPHA_TIME): number {
  const cost = valid ? Conf.BANDIT.TURN_COST : Conf.BANDIT.INVALID_GUESS_COST
  return -cost - alphaTime * (timeMs / 100)
}

/**
 *  ## WordleBanditEnv
 *
 *  One episode is one game, each action is a solver id. The chosen solver
 *  proposes the guess for the turn, invalid guesses are scored as an
 *  all-gray pattern and penalized instead of aborting the game.
 */
export class WordleBanditEnv {
  readonly N: number
  readonly actions: readonly SolverId[]
  readonly alphaTime: number

  private readonly episode: Episode
  private readonly solvers = new Map<string, Solver>()
  private rng: Random

  constructor(config: BanditEnvConfig) {
    const registry = config.registry ?? defaultRegistry
    this.N = config.N
    this.actions = (config.actions ?? Conf.BANDIT.DEFAULT_ACTIONS).slice()
    this.alphaTime = config.alphaTime ?? Conf.BANDIT.ALPHA_TIME
    this.rng = new Random(config.seed)

    if (!this.actions.length) throw new InvalidConfigError('bandit needs at least one action')
    for (const id of this.actions) this.solvers.set(id, registry.create(id))

    this.episode = new Episode({
      answers: config.answers,
      allowed: config.allowed,
      N: config.N,
      strictGuesses: true,
    })
  }

  get answers(): readonly Word[] {
    return this.episode.answers
  }

  /**
   * Starts a game against `answer`, or a seeded random answer from the pool.
   */
  reset({ answer, seed }: { answer?: Word; seed?: number } = {}): Observation {
    if (seed !== undefined) this.rng = new Random(seed)
    const pool = this.episode.answers
    if (answer === undefined && !pool.length) {
      throw new InvalidConfigError(`no answers of length ${this.N} to draw from`)
    }
    this.episode.reset({ answer: answer ?? this.rng.pick(pool) })
    // one child seed per solver, drawn in action order
    for (const solver of this.solvers.values()) {
      solver.reset({ allowed: this.episode.allowed, answers: pool, N: this.N, seed: this.rng.nextSeed() })
    }
    return this.observe()
  }

  step(action: string): EnvStep {
    const solver = this.solvers.get(action)
    if (!solver) throw new UnknownActionError(action, this.actions.slice())

    const outcome: StepOutcome = this.episode.step(solver)
    const done = outcome.status !== 'in_progress'

    return {
      observation: this.observe(),
      reward: turnReward(outcome.timeMs, outcome.valid, this.alphaTime),
      done,
      info: {
        guess: outcome.guess,
        pattern: outcome.pattern,
        timeMs: outcome.timeMs,
        solverId: solver.id,
        valid: outcome.valid,
        answer: done ? this.episode.hiddenAnswer : undefined,
      },
    }
  }

  result(): EpisodeResult {
    return this.episode.result()
  }

  private observe(): Observation {
    const { turn, candidates, history, previousCandidateCount, lastPattern } = this.episode
    return {
      turn: turn + 1,
      N: this.N,
      candidates,
      history: history.slice(),
      features: makeFeatures({ turn: turn + 1, N: this.N, candidates, previousCandidateCount, lastPattern }),
    }
  }
}
