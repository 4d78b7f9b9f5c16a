/** @file heuristics.ts */

import type { Pattern, Word } from '../types'
import { score } from '../engine/scoring'

export type LetterCounts = Map<string, number>

/**
 * Total occurrences of every letter across `words` (repeats count).
 */
export const letterCounts = (words: readonly Word[]): LetterCounts => {
  const counts: LetterCounts = new Map()
  for (const w of words) for (const ch of w) counts.set(ch, (counts.get(ch) ?? 0) + 1)
  return counts
}

/**
 * Number of words containing each letter at least once.
 */
export const documentCounts = (words: readonly Word[]): LetterCounts => {
  const counts: LetterCounts = new Map()
  for (const w of words) for (const ch of new Set(w)) counts.set(ch, (counts.get(ch) ?? 0) + 1)
  return counts
}

/**
 * Sum of letter counts with each distinct letter of `word` counted once,
 * letters in `banned` contribute nothing.
 */
export const distinctScore = (word: Word, counts: LetterCounts, banned?: ReadonlySet<string>): number => {
  const seen = new Set<string>()
  let s = 0
  for (const ch of word) {
    if (banned?.has(ch) || seen.has(ch)) continue
    seen.add(ch)
    s += counts.get(ch) ?? 0
  }
  return s
}

/**
 * Per-slot letter histograms over `words`.
 */
export const positionalCounts = (words: readonly Word[], N: number): LetterCounts[] => {
  const counts: LetterCounts[] = Array.from({ length: N }, () => new Map<string, number>())
  for (const w of words) {
    for (let i = 0; i < N && i < w.length; i++) {
      counts[i].set(w[i], (counts[i].get(w[i]) ?? 0) + 1)
    }
  }
  return counts
}

/**
 * Σ over slots of how many words share this letter in this slot, minus
 * `penalty` for every repeat of a letter after its first occurrence.
 */
export const positionalScore = (word: Word, counts: LetterCounts[], penalty: number): number => {
  const seen = new Set<string>()
  let s = 0
  for (let i = 0; i < word.length; i++) {
    const ch = word[i]
    s += counts[i]?.get(ch) ?? 0
    if (seen.has(ch)) s -= penalty
    else seen.add(ch)
  }
  return s
}

/**
 * Bucket sizes of `candidates` keyed by the pattern each produces against `guess`.
 */
export const partition = (guess: Word, candidates: readonly Word[]): Map<Pattern, number> => {
  const buckets = new Map<Pattern, number>()
  for (const answer of candidates) {
    const key = score(guess, answer)
    buckets.set(key, (buckets.get(key) ?? 0) + 1)
  }
  return buckets
}

export const largestBucket = (buckets: Map<Pattern, number>): number => {
  let worst = 0
  for (const size of buckets.values()) if (size > worst) worst = size
  return worst
}

/**
 * Stable descending ranking by `rank`, truncated to `k` words.
 */
export const topBy = (words: readonly Word[], rank: (w: Word) => number, k: number): Word[] => {
  return words
    .map((word, index) => ({ word, index, value: rank(word) }))
    .sort((a, b) => b.value - a.value || a.index - b.index)
    .slice(0, Math.max(0, k))
    .map((entry) => entry.word)
}

/**
 * Concatenates lists keeping the first occurrence of every word.
 */
export const stableUnion = (...lists: (readonly Word[])[]): Word[] => {
  const seen = new Set<Word>()
  const out: Word[] = []
  for (const list of lists) {
    for (const w of list) {
      if (seen.has(w)) continue
      seen.add(w)
      out.push(w)
    }
  }
  return out
}

/**
 * Evaluates every word of `pool` and returns all words tied for the best
 * objective. `compare(a, b) > 0` means `a` is strictly better than `b`.
 */
export function collectBest<S>(
  pool: readonly Word[],
  evaluate: (word: Word) => S,
  compare: (a: S, b: S) => number
): Word[] {
  let best: S | undefined
  let words: Word[] = []
  for (const w of pool) {
    const s = evaluate(w)
    if (best === undefined || compare(s, best) > 0) {
      best = s
      words = [w]
    } else if (compare(s, best) === 0) {
      words.push(w)
    }
  }
  return words
}

/** Higher number wins. */
export const higher = (a: number, b: number): number => Math.sign(a - b)
