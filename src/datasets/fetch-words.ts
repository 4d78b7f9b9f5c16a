/** @file fetch-words.ts */

import axios from 'axios'
import type { Word } from '../types'
import { normalizeWords } from './wordlist'

export class WordListRequestFailed extends Error {
  constructor(status: number, statusText: string, url: string) {
    super(`WORDLIST REQUEST FAILED (${status}): ${statusText} for ${url}`)
    this.name = 'WordListRequestFailed'
  }
}

/**
 * Accepts either a JSON array of strings or plain text with one word per
 * line (commas and whitespace also separate words).
 */
export function parseWordListBody(body: unknown): string[] {
  if (Array.isArray(body)) return body.filter((item): item is string => typeof item === 'string')
  if (typeof body !== 'string') return []
  const text = body.trim()
  if (text.startsWith('[')) {
    try {
      return parseWordListBody(JSON.parse(text))
    } catch (e) {
      console.warn('[words] body looked like JSON but did not parse:', e instanceof Error ? e.message : e)
    }
  }
  return text.split(/[\s,]+/)
}

/**
 * Downloads a word list and normalizes it for word length `N`.
 */
export async function fetchWordList(url: string, N: number): Promise<Word[]> {
  const resp = await axios.get<unknown>(url, {
    responseType: 'text',
    timeout: 30_000,
    validateStatus: () => true,
    headers: { Accept: 'text/plain, application/json' },
  })

  if (resp.status >= 300 || resp.status < 200) {
    throw new WordListRequestFailed(resp.status, resp.statusText, url)
  }

  const words = normalizeWords(parseWordListBody(resp.data), N)
  console.log(`[words] fetched ${words.length} words (N=${N}) from ${url}`)
  return words
}
