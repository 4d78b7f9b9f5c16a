/** @file report.ts */

import { execFileSync } from 'node:child_process'
import type { EpisodeResult } from '../types'
import { Disk } from '../utils/disk'

export interface ReportRow extends EpisodeResult {
  /** solver id stamped on the row, "meta_linucb" for bandit runs */
  solver: string
}

/**
 * Prefixes an apostrophe so spreadsheet apps keep patterns such as "-GYY-"
 * as text instead of parsing them as formulas.
 */
export const excelSafePattern = (pattern: string): string => (pattern ? `'${pattern}` : pattern)

const csvCell = (value: string | number | boolean): string => {
  const s = String(value)
  return /[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s
}

export function csvHeader(maxTurns: number): string[] {
  const fields = ['solver', 'N', 'answer', 'success', 'guesses', 'time_ms']
  for (let i = 1; i <= maxTurns; i++) fields.push(`guess_${i}`, `patt_${i}`, `solver_${i}`)
  return fields
}

/**
 * One CSV line per game; history is expanded into fixed guess/pattern/solver
 * columns up to `maxTurns`.
 */
export function toCsv(rows: readonly ReportRow[], maxTurns: number, N: number): string {
  const lines = [csvHeader(maxTurns).join(',')]
  for (const r of rows) {
    const cells: (string | number | boolean)[] = [r.solver, N, r.answer, r.success, r.guesses, +r.timeMs.toFixed(3)]
    for (let i = 0; i < maxTurns; i++) {
      const turn = r.history[i]
      cells.push(turn?.[0] ?? '', excelSafePattern(turn?.[1] ?? ''), r.solverIds[i] ?? '')
    }
    lines.push(cells.map(csvCell).join(','))
  }
  return lines.join('\n') + '\n'
}

export async function writeCsv(rows: readonly ReportRow[], filePath: string, maxTurns: number, N: number) {
  return Disk.writeText(filePath, toCsv(rows, maxTurns, N))
}

export async function writeManifest<T extends {}>(manifest: T, filePath: string) {
  return Disk.saveJsonFile(filePath, manifest)
}

/**
 * Compact UTC run id, e.g. `20250820T024121Z`.
 */
export const timestampId = (date: Date = new Date()): string =>
  date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '')

/**
 * Short hash of the current checkout, "unknown" outside a git repository.
 */
export function gitCommitOrUnknown(): string {
  try {
    return execFileSync('git', ['rev-parse', '--short', 'HEAD'], { stdio: ['ignore', 'pipe', 'ignore'] })
      .toString()
      .trim()
  } catch (e) {
    console.warn('[report] git commit unavailable:', e instanceof Error ? e.message : e)
    return 'unknown'
  }
}
