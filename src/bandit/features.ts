import type { Pattern, Word } from '../types'

export const PATTERN_TYPES = ['all_gray', 'some_green', 'some_yellow', 'mix_GY', 'other'] as const

export type PatternType = (typeof PATTERN_TYPES)[number]

export interface FeatureInput {
  /** 1-based turn about to be played */
  turn: number
  N: number
  candidates: readonly Word[]
  /** candidate count before the previous guess */
  previousCandidateCount?: number
  lastPattern?: Pattern
}

/**
 * Qualitative class of a feedback pattern, "other" when there is none yet.
 */
export function patternType(pattern?: Pattern): PatternType {
  if (!pattern) return 'other'
  let greens = 0
  let yellows = 0
  for (const ch of pattern) {
    if (ch === 'G') greens++
    else if (ch === 'Y') yellows++
  }
  if (greens === 0 && yellows === 0) return 'all_gray'
  if (yellows === 0) return 'some_green'
  if (greens === 0) return 'some_yellow'
  return 'mix_GY'
}

/**
 * Shannon entropy (nats) of the letter distribution in each slot.
 */
export function perSlotEntropy(candidates: readonly Word[], N: number): number[] {
  const entropy = new Array<number>(N).fill(0)
  if (!candidates.length) return entropy

  const slots = Array.from({ length: N }, () => new Map<string, number>())
  for (const word of candidates) {
    for (let i = 0; i < N && i < word.length; i++) {
      slots[i].set(word[i], (slots[i].get(word[i]) ?? 0) + 1)
    }
  }

  const total = candidates.length
  slots.forEach((counts, i) => {
    let h = 0
    for (const c of counts.values()) {
      const p = c / total
      h -= p * Math.log(p)
    }
    entropy[i] = h
  })
  return entropy
}

/** Fraction of candidates with at least one repeated letter. */
export function dupRatio(candidates: readonly Word[]): number {
  if (!candidates.length) return 0
  const dups = candidates.filter((w) => new Set(w).size < w.length).length
  return dups / candidates.length
}

export const featureSize = (N: number): number => 5 + N + PATTERN_TYPES.length

/** Names in the same order {@link makeFeatures} fills the vector. */
export function featureNames(N: number): string[] {
  return [
    'turn',
    'N',
    'log2_c',
    'shrink',
    'dup_ratio',
    ...Array.from({ length: N }, (_, i) => `H${i}`),
    ...PATTERN_TYPES.map((t) => `pt_${t}`),
  ]
}

/**
 * Encodes the episode state as a fixed-size vector of length `featureSize(N)`.
 */
export function makeFeatures({ turn, N, candidates, previousCandidateCount, lastPattern }: FeatureInput): number[] {
  const size = candidates.length
  const shrink = previousCandidateCount ? (previousCandidateCount - size) / previousCandidateCount : 0
  const type = patternType(lastPattern)

  return [
    turn, // 1
    N, // 1
    Math.log2(Math.max(size, 1)), // 1
    shrink, // 1
    dupRatio(candidates), // 1
    ...perSlotEntropy(candidates, N), // N
    ...PATTERN_TYPES.map((t) => (t === type ? 1 : 0)), // 5
  ]
}
