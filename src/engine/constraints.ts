/** @file constraints.ts */

import type { History, Word } from '../types'
import { score } from './scoring'

const ALPHA = /^[a-z]+$/

/**
 * Lowercase a-z token of exactly `N` letters.
 */
export const isCleanWord = (word: string, N: number): boolean => word.length === N && ALPHA.test(word)

/**
 * Keeps the words of `pool` that would have produced exactly the recorded
 * pattern for every `(guess, pattern)` in `history`. Pool order is kept;
 * anything that isn't a clean N-letter word is dropped.
 */
export function filterCandidates(pool: Iterable<Word>, history: History, N: number): Word[] {
  const out: Word[] = []

  for (const raw of pool) {
    const word = raw.trim().toLowerCase()
    if (!isCleanWord(word, N)) continue

    let consistent = true
    for (const [guess, pattern] of history) {
      if (score(guess, word) !== pattern) {
        consistent = false
        break
      }
    }

    if (consistent) out.push(word)
  }

  return out
}
