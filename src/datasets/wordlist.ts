/** @file wordlist.ts */

import type { Word } from '../types'
import { isCleanWord } from '../engine/constraints'
import { Disk } from '../utils/disk'

/**
 * Trims and lower-cases tokens, drops blanks and anything that isn't a clean
 * N-letter word, then dedupes keeping first occurrences (answer order drives
 * sampling, so it is preserved).
 */
export function normalizeWords(tokens: Iterable<string>, N: number): Word[] {
  const seen = new Set<Word>()
  const out: Word[] = []
  for (const token of tokens) {
    const w = token.trim().toLowerCase()
    if (!isCleanWord(w, N) || seen.has(w)) continue
    seen.add(w)
    out.push(w)
  }
  return out
}

/**
 * Loads a one-word-per-line list for word length `N`.
 */
export async function loadWordList(filePath: string, N: number): Promise<Word[]> {
  const words = normalizeWords(await Disk.readLines(filePath), N)
  console.log(`[words] loaded ${words.length} words (N=${N}) from "${filePath}"`)
  return words
}
