/** @file training.ts */

import type { EpisodeResult, Word } from '../types'
import type { WordleBanditEnv } from './environment'
import { Conf } from '../conf/config'
import { featureSize } from './features'
import { LinUCB } from './lin-ucb'

export interface TrainingConfig {
  /**
   * Exploration strength for a freshly created model.
   * @default 0.5
   */
  ucbAlpha: number
  /** log a progress line every K episodes, 0 disables */
  logEvery: number
}

export interface TrainingStats {
  episodes: number
  steps: number
  wins: number
  totalReward: number
  avgRewardPerStep: number
  winRate: number
  avgTimeMsPerStep: number
}

export interface EpisodeRun {
  result: EpisodeResult
  reward: number
}

/**
 *  ## BanditTrainer
 *
 *  Plays episodes sequentially: each turn the model picks a solver from the
 *  current features, the env plays it, and the reward updates that action.
 */
export class BanditTrainer {
  readonly model: LinUCB
  private config: TrainingConfig

  private steps = 0
  private wins = 0
  private episodes = 0
  private totalReward = 0
  private totalTimeMs = 0

  constructor(
    private env: WordleBanditEnv,
    model?: LinUCB,
    config?: Partial<TrainingConfig>
  ) {
    this.config = {
      ucbAlpha: Conf.BANDIT.UCB_ALPHA,
      logEvery: 1_000,
      ...config,
    }
    this.model = model ?? new LinUCB(env.actions, featureSize(env.N), { alpha: this.config.ucbAlpha })

    const missing = this.model.actions.filter((a) => !env.actions.some((id) => id === a))
    if (missing.length) throw new Error(`Model actions [${missing.join(', ')}] are not available in the environment`)
    if (this.model.d !== featureSize(env.N)) {
      throw new Error(`Model dimension ${this.model.d} doesn't match feature size ${featureSize(env.N)} for N=${env.N}`)
    }
  }

  /**
   * Plays one full game. With `learn` the model is updated after every turn.
   */
  playEpisode({ answer, learn }: { answer?: Word; learn: boolean }): EpisodeRun {
    let observation = this.env.reset({ answer })
    let done = false
    let reward = 0

    while (!done) {
      const x = observation.features
      const action = this.model.select(x)
      const step = this.env.step(action)
      if (learn) this.model.update(action, x, step.reward)

      reward += step.reward
      this.steps++
      this.totalReward += step.reward
      this.totalTimeMs += step.info.timeMs
      observation = step.observation
      done = step.done
    }

    const result = this.env.result()
    this.episodes++
    if (result.success) this.wins++
    return { result, reward }
  }

  train(episodes: number): TrainingStats {
    if (this.config.logEvery > 0) {
      console.log(`[train] ${episodes} episodes, actions=[${this.model.actions.join(', ')}] d=${this.model.d}`)
    }

    for (let ep = 1; ep <= episodes; ep++) {
      this.playEpisode({ learn: true })

      if (this.config.logEvery > 0 && ep % this.config.logEvery === 0) {
        const s = this.stats()
        console.log(
          `[train] ep ${ep}/${episodes}`,
          `avg_reward/step=${s.avgRewardPerStep.toFixed(4)} win_rate=${s.winRate.toFixed(3)}`,
          `avg_time_ms/step=${s.avgTimeMsPerStep.toFixed(2)}`
        )
      }
    }
    return this.stats()
  }

  /**
   * Greedy-by-UCB games against fixed answers, no model updates.
   */
  evaluate(answers: readonly Word[]): EpisodeResult[] {
    const results: EpisodeResult[] = []
    for (const answer of answers) {
      results.push(this.playEpisode({ answer, learn: false }).result)
      if (this.config.logEvery > 0 && results.length % this.config.logEvery === 0) {
        console.log(`[eval] ${results.length}/${answers.length} wins=${results.filter((r) => r.success).length}`)
      }
    }
    return results
  }

  stats(): TrainingStats {
    return {
      episodes: this.episodes,
      steps: this.steps,
      wins: this.wins,
      totalReward: this.totalReward,
      avgRewardPerStep: this.steps ? this.totalReward / this.steps : 0,
      winRate: this.episodes ? this.wins / this.episodes : 0,
      avgTimeMsPerStep: this.steps ? this.totalTimeMs / this.steps : 0,
    }
  }
}
