import { z } from 'zod'
import { Conf } from './config'
import { InvalidConfigError } from '../utils/errors'

export const COMMANDS = ['run', 'train', 'eval', 'validate', 'fetch', 'solvers'] as const

export type Command = (typeof COMMANDS)[number]

/**
 * Settings every CLI command reads, each key can be overridden with the
 * lower-case flag of the same name (e.g. `--solver entropy`).
 */
export interface RunConfig {
  /**
   * Subcommand, also accepted as the first positional argument.
   * @default 'run'
   */
  COMMAND: string

  /**
   * Solver id for `run`.
   * @default 'entropy'
   */
  SOLVER: string

  /**
   * Word length.
   * @default 5
   */
  N: number

  /** answer pool, one word per line */
  ANSWERS: string

  /** allowed guesses, one word per line */
  ALLOWED: string

  /**
   * Play only the first K answers for `run`, or a seeded sample of K for
   * `eval`; 0 means all.
   * @default 0
   */
  SAMPLE: number

  /**
   * @default 123
   */
  SEED: number

  /**
   * Reports, models and manifests are written here.
   * @default 'reports'
   */
  OUTDIR: string

  /**
   * Training episodes.
   * @default 50000
   */
  EPISODES: number

  /**
   * λ, compute-time weight in the per-turn reward.
   * @default 0.2
   */
  ALPHA_TIME: number

  /**
   * LinUCB exploration strength α.
   * @default 0.5
   */
  UCB_ALPHA: number

  /**
   * Comma-separated solver ids the bandit picks between.
   */
  ACTIONS: string

  /** trained model snapshot for `eval` */
  MODEL: string

  /** source for `fetch` */
  URL: string

  /**
   * Free text stored in manifests, useful for tracking experiments.
   */
  MESSAGE: string

  /**
   * Progress line every K episodes, 0 disables.
   * @default 1000
   */
  LOG_EVERY: number
}

export const BASE_CONFIG: RunConfig = {
  COMMAND: 'run',
  SOLVER: 'entropy',
  N: Conf.WORD_LENGTH,
  ANSWERS: 'data/answers.txt',
  ALLOWED: 'data/allowed.txt',
  SAMPLE: 0,
  SEED: 123,
  OUTDIR: 'reports',
  EPISODES: 50_000,
  ALPHA_TIME: Conf.BANDIT.ALPHA_TIME,
  UCB_ALPHA: Conf.BANDIT.UCB_ALPHA,
  ACTIONS: Conf.BANDIT.DEFAULT_ACTIONS.join(','),
  MODEL: 'reports/bandit_train/linucb_model.json',
  URL: '',
  MESSAGE: '',
  LOG_EVERY: 1_000,
}

export const RunConfigSchema = z.object({
  COMMAND: z.enum(COMMANDS),
  SOLVER: z.string().min(1),
  N: z.number().int().min(1).max(32),
  ANSWERS: z.string(),
  ALLOWED: z.string(),
  SAMPLE: z.number().int().nonnegative(),
  SEED: z.number().int(),
  OUTDIR: z.string().min(1),
  EPISODES: z.number().int().positive(),
  ALPHA_TIME: z.number().finite().nonnegative(),
  UCB_ALPHA: z.number().finite().nonnegative(),
  ACTIONS: z.string().min(1),
  MODEL: z.string(),
  URL: z.string(),
  MESSAGE: z.string(),
  LOG_EVERY: z.number().int().nonnegative(),
})

export type ValidRunConfig = z.infer<typeof RunConfigSchema>

/**
 * Validates a merged config, NaN from a bad numeric flag fails here.
 */
export function validateRunConfig(config: RunConfig): ValidRunConfig {
  const parsed = RunConfigSchema.safeParse(config)
  if (parsed.success) return parsed.data
  const reasons = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
  throw new InvalidConfigError(reasons.join('; '))
}

/** Splits the `ACTIONS` list, dropping blanks. */
export const parseActions = (actions: string): string[] =>
  actions
    .split(',')
    .map((a) => a.trim())
    .filter(Boolean)
