/** @file commands.ts */

import * as path from 'node:path'
import type { SolverId } from '../types'
import type { ValidRunConfig } from '../conf/run-config'
import { parseActions } from '../conf/run-config'
import { Conf } from '../conf/config'
import { loadWordList, fetchWordList, validateWordlists, validationSummary } from '../datasets'
import { solvers } from '../solvers'
import {
  gitCommitOrUnknown,
  prettySummary,
  runBatch,
  summarize,
  timestampId,
  writeCsv,
  writeManifest,
  type ReportRow,
} from '../harness'
import { BanditTrainer, LinUCB, WordleBanditEnv } from '../bandit'
import { Disk } from '../utils/disk'
import { InvalidConfigError, UnknownSolverError } from '../utils/errors'
import { Random } from '../utils/random'

/** Solver id stamped on bandit evaluation rows. */
export const META_SOLVER_ID = 'meta_linucb'

/** Exit code for the process, 0 on success. */
export type CommandResult = Promise<number>

export function toSolverIds(ids: readonly string[]): SolverId[] {
  return ids.map((id) => {
    if (!solvers.has(id)) throw new UnknownSolverError(id, solvers.ids())
    return id
  })
}

async function loadPools(config: ValidRunConfig) {
  const [answers, allowed] = await Promise.all([
    loadWordList(config.ANSWERS, config.N),
    loadWordList(config.ALLOWED, config.N),
  ])
  if (!answers.length) throw new InvalidConfigError(`no ${config.N}-letter answers in "${config.ANSWERS}"`)
  return { answers, allowed }
}

/**
 * Plays one solver over the answer pool and writes a CSV plus manifest.
 */
export async function runCommand(config: ValidRunConfig): CommandResult {
  const solver = solvers.create(config.SOLVER)
  const { answers, allowed } = await loadPools(config)
  const runId = timestampId()

  const results = runBatch(solver, answers, {
    allowed,
    N: config.N,
    seed: config.SEED,
    sample: config.SAMPLE || undefined,
    logEvery: config.LOG_EVERY,
  })
  const summary = summarize(results)
  console.log('[run]', prettySummary(solver.id, summary))

  const rows: ReportRow[] = results.map((r) => ({ ...r, solver: solver.id }))
  const csvPath = path.join(config.OUTDIR, `${solver.id}_N${config.N}_${runId}.csv`)
  await writeCsv(rows, csvPath, Conf.MAX_TURNS, config.N)
  await writeManifest(
    {
      runId,
      solver: solver.id,
      version: solver.version,
      N: config.N,
      seed: config.SEED,
      answers: config.ANSWERS,
      allowed: config.ALLOWED,
      commit: gitCommitOrUnknown(),
      message: config.MESSAGE,
      csv: csvPath,
      summary,
    },
    path.join(config.OUTDIR, `${solver.id}_N${config.N}_${runId}.manifest.json`)
  )
  return 0
}

/**
 * Trains a LinUCB model and saves `linucb_model.json` plus a manifest.
 */
export async function trainCommand(config: ValidRunConfig): CommandResult {
  const actions = toSolverIds(parseActions(config.ACTIONS))
  const { answers, allowed } = await loadPools(config)

  const env = new WordleBanditEnv({
    answers,
    allowed,
    N: config.N,
    actions,
    alphaTime: config.ALPHA_TIME,
    seed: config.SEED,
  })
  const trainer = new BanditTrainer(env, undefined, { ucbAlpha: config.UCB_ALPHA, logEvery: config.LOG_EVERY })
  const stats = trainer.train(config.EPISODES)

  const modelPath = await Disk.saveJsonFile(path.join(config.OUTDIR, 'linucb_model.json'), trainer.model.toJSON())
  await writeManifest(
    {
      episodes: config.EPISODES,
      N: config.N,
      actions,
      alphaTime: config.ALPHA_TIME,
      ucbAlpha: config.UCB_ALPHA,
      answers: config.ANSWERS,
      allowed: config.ALLOWED,
      seed: config.SEED,
      avgRewardPerStep: stats.avgRewardPerStep,
      trainSteps: stats.steps,
      winRateEstimate: stats.winRate,
      avgTimeMsPerStep: stats.avgTimeMsPerStep,
      modelPath,
      commit: gitCommitOrUnknown(),
      message: config.MESSAGE,
    },
    path.join(config.OUTDIR, 'train_manifest.json')
  )
  return 0
}

/**
 * Evaluates a saved model on a seeded sample of answers without learning.
 */
export async function evalCommand(config: ValidRunConfig): CommandResult {
  const model = LinUCB.fromJSON(await Disk.getJsonFile(config.MODEL))
  const { answers, allowed } = await loadPools(config)

  const env = new WordleBanditEnv({
    answers,
    allowed,
    N: config.N,
    actions: toSolverIds(model.actions),
    alphaTime: config.ALPHA_TIME,
    seed: config.SEED,
  })
  const trainer = new BanditTrainer(env, model, { logEvery: config.LOG_EVERY })

  const pool = env.answers
  const evalAnswers = config.SAMPLE && config.SAMPLE < pool.length ? new Random(config.SEED).sample(pool, config.SAMPLE) : pool
  const results = trainer.evaluate(evalAnswers)
  console.log('[eval]', prettySummary(META_SOLVER_ID, summarize(results)))

  const rows: ReportRow[] = results.map((r) => ({ ...r, solver: META_SOLVER_ID }))
  await writeCsv(rows, path.join(config.OUTDIR, 'bandit_eval.csv'), Conf.MAX_TURNS, config.N)
  return 0
}

/**
 * Checks both word lists, a failed check exits non-zero.
 */
export async function validateCommand(config: ValidRunConfig): CommandResult {
  const report = await validateWordlists(config.N, config.ANSWERS, config.ALLOWED)
  console.log('[validate]', validationSummary(report))
  for (const issue of report.issues) console.warn('[validate]', issue)
  await Disk.saveJsonFile(path.join(config.OUTDIR, `validation_N${config.N}.json`), report)
  return report.passed ? 0 : 1
}

export async function fetchCommand(config: ValidRunConfig): CommandResult {
  if (!config.URL) throw new InvalidConfigError('fetch needs --url')
  const words = await fetchWordList(config.URL, config.N)
  const out = await Disk.writeLines(path.join(config.OUTDIR, `wordlist_N${config.N}.txt`), words)
  console.log(`[words] wrote ${words.length} words to "${out}"`)
  return 0
}

export async function solversCommand(): CommandResult {
  for (const id of solvers.ids()) console.log(id)
  return 0
}
