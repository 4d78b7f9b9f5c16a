import type { EpisodeResult } from '../types'
import { Conf } from '../conf/config'

/**
 *  Small statistics helpers for batch summaries.
 */
export namespace Stats {
  /**
   * Average of an array, 0 when empty.
   */
  export function average(items: readonly number[]): number {
    if (!items.length) return 0
    return items.reduce((total, current) => total + current, 0) / items.length
  }

  /**
   * Middle value when sorted, mean of the two middle values for even lengths.
   */
  export function median(nums: readonly number[]): number {
    if (!nums.length) return 0
    const sorted = [...nums].sort((a, b) => a - b)
    const mid = Math.floor(sorted.length / 2)
    return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid]
  }

  /**
   * Population standard deviation.
   */
  export function stdDev(nums: readonly number[]): number {
    if (!nums.length) return 0
    const avg = average(nums)
    return Math.sqrt(nums.reduce((sum, x) => sum + (x - avg) ** 2, 0) / nums.length)
  }
}

export interface BatchSummary {
  cases: number
  wins: number
  winRate: number
  /** mean guess count over won games, 0 when none were won */
  averageGuesses: number
  medianGuesses: number
  stdDevGuesses: number
  averageTimeMs: number
  /** index i counts wins in i + 1 guesses */
  distribution: number[]
}

export function summarize(results: readonly EpisodeResult[], maxTurns: number = Conf.MAX_TURNS): BatchSummary {
  const won = results.filter((r) => r.success)
  const guesses = won.map((r) => r.guesses)
  const distribution = new Array<number>(maxTurns).fill(0)
  for (const g of guesses) if (g >= 1 && g <= maxTurns) distribution[g - 1]++

  return {
    cases: results.length,
    wins: won.length,
    winRate: results.length ? won.length / results.length : 0,
    averageGuesses: Stats.average(guesses),
    medianGuesses: Stats.median(guesses),
    stdDevGuesses: Stats.stdDev(guesses),
    averageTimeMs: Stats.average(results.map((r) => r.timeMs)),
    distribution,
  }
}

export const prettySummary = (id: string, s: BatchSummary): string =>
  `${id}: ${s.wins}/${s.cases} solved (${(s.winRate * 100).toFixed(1)}%), ` +
  `avg ${s.averageGuesses.toFixed(3)} guesses, dist [${s.distribution.join(' ')}], ` +
  `${s.averageTimeMs.toFixed(2)} ms/game`
