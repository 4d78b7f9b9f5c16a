import type { Word } from '../types'
import { isCleanWord } from './constraints'

/**
 * True when `word` is a clean N-letter guess that appears in `allowed`.
 * Pass a `Set` when calling in a loop, arrays are converted on every call.
 */
export function validateGuess(word: unknown, allowed: ReadonlySet<Word> | readonly Word[], N: number): boolean {
  if (typeof word !== 'string') return false
  const w = word.trim().toLowerCase()
  if (!isCleanWord(w, N)) return false
  const allowedSet = allowed instanceof Set ? allowed : new Set(Array.from(allowed, (a) => a.trim().toLowerCase()))
  return allowedSet.has(w)
}
