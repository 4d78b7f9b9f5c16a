/** @file scoring.ts */

import type { Pattern, PatternChar, Word } from '../types'
import { ScoreLengthMismatchError } from '../utils/errors'

export const GREEN: PatternChar = 'G'
export const YELLOW: PatternChar = 'Y'
export const GRAY: PatternChar = '-'

/**
 * Wordle feedback for `guess` against `answer`, e.g.
 *
 * ```ts
 * score('belle', 'level') // '-GYYY'
 * score('lemon', 'level') // 'GG---'
 * ```
 *
 * Greens are marked first while the unmatched answer letters are counted,
 * then non-green slots are walked left to right and turn yellow only while
 * that letter still has a count left. Excess repeats in the guess stay gray.
 */
export function score(guessRaw: Word, answerRaw: Word): Pattern {
  const guess = guessRaw.trim().toLowerCase()
  const answer = answerRaw.trim().toLowerCase()
  if (guess.length !== answer.length) throw new ScoreLengthMismatchError(guess, answer)

  const n = guess.length
  const res: PatternChar[] = new Array<PatternChar>(n).fill(GRAY)
  const remaining = new Map<string, number>()

  for (let i = 0; i < n; i++) {
    if (guess[i] === answer[i]) {
      res[i] = GREEN
    } else {
      remaining.set(answer[i], (remaining.get(answer[i]) ?? 0) + 1)
    }
  }

  for (let i = 0; i < n; i++) {
    if (res[i] === GREEN) continue
    const left = remaining.get(guess[i]) ?? 0
    if (left > 0) {
      res[i] = YELLOW
      remaining.set(guess[i], left - 1)
    }
  }

  return res.join('')
}

export const allGreen = (N: number): Pattern => GREEN.repeat(N)

/** The neutral "no information" pattern. */
export const allGray = (N: number): Pattern => GRAY.repeat(N)

export const isWin = (pattern: Pattern): boolean => pattern.length > 0 && pattern === allGreen(pattern.length)
