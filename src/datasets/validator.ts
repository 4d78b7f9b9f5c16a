/** @file validator.ts */

import { createHash } from 'node:crypto'
import * as fs from 'node:fs/promises'
import { isCleanWord } from '../engine/constraints'
import { Disk } from '../utils/disk'

export interface FileReport {
  path: string
  exists: boolean
  /** valid words, duplicates included */
  count: number
  uniqueCount: number
  invalidLines: number
  /** SHA-256 of the raw bytes, empty when the file is missing */
  sha256: string
}

export interface ValidationReport {
  N: number
  answers: FileReport
  allowed: FileReport
  answersSubsetAllowed: boolean
  passed: boolean
  issues: string[]
}

interface CheckedFile {
  report: FileReport
  words: string[]
}

async function checkFile(filePath: string, N: number): Promise<CheckedFile> {
  if (!(await Disk.exists(filePath))) {
    return {
      report: { path: filePath, exists: false, count: 0, uniqueCount: 0, invalidLines: 0, sha256: '' },
      words: [],
    }
  }

  const raw = await fs.readFile(filePath)
  const sha256 = createHash('sha256').update(raw).digest('hex')

  const words: string[] = []
  let invalidLines = 0
  for (const line of await Disk.readLines(filePath)) {
    // lines must already be clean: no case folding or trimming here
    if (isCleanWord(line, N)) words.push(line)
    else invalidLines++
  }

  return {
    report: { path: filePath, exists: true, count: words.length, uniqueCount: new Set(words).size, invalidLines, sha256 },
    words,
  }
}

function fileIssues(label: string, r: FileReport): string[] {
  if (!r.exists) return [`${label}: file not found (${r.path})`]
  const issues: string[] = []
  if (r.invalidLines > 0) issues.push(`${label}: ${r.invalidLines} invalid line(s)`)
  if (r.uniqueCount < r.count) issues.push(`${label}: ${r.count - r.uniqueCount} duplicate word(s)`)
  if (r.count === 0) issues.push(`${label}: no valid words`)
  return issues
}

/**
 * Checks an (answers, allowed) pair: one lowercase a-z word of length N per
 * line, no duplicates, and every answer also allowed.
 */
export async function validateWordlists(N: number, answersPath: string, allowedPath: string): Promise<ValidationReport> {
  const answers = await checkFile(answersPath, N)
  const allowed = await checkFile(allowedPath, N)

  const allowedSet = new Set(allowed.words)
  const missing = answers.words.filter((w) => !allowedSet.has(w))
  const answersSubsetAllowed = answers.report.exists && allowed.report.exists && missing.length === 0

  const issues = [...fileIssues('answers', answers.report), ...fileIssues('allowed', allowed.report)]
  if (answers.report.exists && allowed.report.exists && missing.length) {
    issues.push(`answers not a subset of allowed: ${missing.length} missing (e.g. ${missing.slice(0, 5).join(', ')})`)
  }

  return {
    N,
    answers: answers.report,
    allowed: allowed.report,
    answersSubsetAllowed,
    passed: issues.length === 0,
    issues,
  }
}

export const validationSummary = (rep: ValidationReport): string =>
  `N=${rep.N} | answers=${rep.answers.count} (${rep.answers.sha256.slice(0, 8) || 'missing'}) | ` +
  `allowed=${rep.allowed.count} (${rep.allowed.sha256.slice(0, 8) || 'missing'}) | ` +
  `answers⊆allowed=${rep.answersSubsetAllowed} | passed=${rep.passed}`
