/** @file lin-ucb.ts */

import { z } from 'zod'
import { Conf } from '../conf/config'
import { DimensionMismatchError, InvalidSnapshotError, UnknownActionError } from '../utils/errors'
import { Matrix, dotVec } from './matrix'

export const LinUCBSnapshotSchema = z.object({
  actions: z.array(z.string().min(1)).min(1),
  d: z.number().int().positive(),
  alpha: z.number().finite().nonnegative(),
  A: z.record(z.string(), z.array(z.array(z.number().finite()))),
  b: z.record(z.string(), z.array(z.number().finite())),
})

export type LinUCBSnapshot = z.infer<typeof LinUCBSnapshotSchema>

export interface LinUCBOptions {
  /**
   * Exploration strength α.
   * @default 0.5
   */
  alpha?: number
  /**
   * Ridge constant, every A starts as `ridge * I`.
   * @default 1.0
   */
  ridge?: number
}

interface ArmState {
  A: Matrix
  AInv: Matrix
  b: Float64Array
}

/**
 *  ## LinUCB
 *
 *  Per-action linear upper confidence bound. Each action keeps `A` (d×d),
 *  `b` (d) and `A⁻¹`, the inverse is kept current with Sherman–Morrison
 *  updates so selection never inverts a matrix.
 *
 *  score(a) = xᵀθₐ + α·sqrt(xᵀAₐ⁻¹x) with θₐ = Aₐ⁻¹bₐ
 */
export class LinUCB {
  readonly actions: readonly string[]
  readonly d: number
  readonly alpha: number

  private arms = new Map<string, ArmState>()

  constructor(
    actions: readonly string[],
    d: number,
    { alpha = Conf.BANDIT.UCB_ALPHA, ridge = Conf.BANDIT.RIDGE }: LinUCBOptions = {}
  ) {
    if (!actions.length) throw new Error('LinUCB needs at least one action')
    if (new Set(actions).size !== actions.length) throw new Error(`Duplicate actions: [${actions.join(', ')}]`)
    if (ridge <= 0) throw new Error(`Ridge must be positive, got ${ridge}`)

    this.actions = actions.slice()
    this.d = d
    this.alpha = alpha
    for (const action of actions) {
      this.arms.set(action, {
        A: Matrix.identity(d, ridge),
        AInv: Matrix.identity(d, 1 / ridge),
        b: new Float64Array(d),
      })
    }
  }

  /**
   * UCB score of every action for `x`, in action order.
   */
  scores(x: readonly number[]): Map<string, number> {
    this.assertDimension(x)
    const out = new Map<string, number>()
    for (const action of this.actions) {
      const { AInv, b } = this.arm(action)
      const theta = AInv.mulVec(b)
      const mean = dotVec(x, theta)
      const bonus = this.alpha * Math.sqrt(Math.max(AInv.quadForm(x), 0))
      out.set(action, mean + bonus)
    }
    return out
  }

  /**
   * Action with the highest UCB score, the earliest action wins ties.
   */
  select(x: readonly number[]): string {
    let best = this.actions[0]
    let bestScore = -Infinity
    for (const [action, score] of this.scores(x)) {
      if (score > bestScore) {
        best = action
        bestScore = score
      }
    }
    return best
  }

  update(action: string, x: readonly number[], reward: number): void {
    this.assertDimension(x)
    const arm = this.arm(action)
    arm.A.addOuterInPlace(x)
    arm.AInv.shermanMorrisonInPlace(x)
    for (let i = 0; i < this.d; i++) arm.b[i] += reward * x[i]
  }

  /** θ = A⁻¹b for `action`. */
  theta(action: string): number[] {
    const { AInv, b } = this.arm(action)
    return Array.from(AInv.mulVec(b))
  }

  toJSON(): LinUCBSnapshot {
    const A: Record<string, number[][]> = {}
    const b: Record<string, number[]> = {}
    for (const action of this.actions) {
      const arm = this.arm(action)
      A[action] = arm.A.to2D()
      b[action] = Array.from(arm.b)
    }
    return { actions: this.actions.slice(), d: this.d, alpha: this.alpha, A, b }
  }

  /**
   * Rebuilds a model from a snapshot, `A⁻¹` is recomputed from `A`.
   */
  static fromJSON(json: unknown): LinUCB {
    const parsed = LinUCBSnapshotSchema.safeParse(json)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new InvalidSnapshotError(`${issue.path.join('.') || '(root)'}: ${issue.message}`)
    }
    const snapshot = parsed.data

    let model: LinUCB
    try {
      model = new LinUCB(snapshot.actions, snapshot.d, { alpha: snapshot.alpha })
    } catch (e) {
      throw new InvalidSnapshotError(e instanceof Error ? e.message : String(e))
    }
    for (const action of snapshot.actions) {
      const rows = snapshot.A[action]
      const b = snapshot.b[action]
      if (!rows || !b) throw new InvalidSnapshotError(`missing A or b for action "${action}"`)
      if (rows.length !== snapshot.d || rows.some((row) => row.length !== snapshot.d)) {
        throw new InvalidSnapshotError(`A["${action}"] is not ${snapshot.d}x${snapshot.d}`)
      }
      if (b.length !== snapshot.d) throw new InvalidSnapshotError(`b["${action}"] is not of length ${snapshot.d}`)

      const A = Matrix.from2D(rows)
      // Sherman–Morrison updates are only exact for a symmetric positive-definite A
      if (!A.isSymmetric()) throw new InvalidSnapshotError(`A["${action}"] is not symmetric`)
      if (!A.isPositiveDefinite()) throw new InvalidSnapshotError(`A["${action}"] is not positive definite`)
      let AInv: Matrix
      try {
        AInv = A.inverse()
      } catch (e) {
        throw new InvalidSnapshotError(`A["${action}"] is not invertible: ${e instanceof Error ? e.message : e}`)
      }
      model.arms.set(action, { A, AInv, b: Float64Array.from(b) })
    }
    return model
  }

  private arm(action: string): ArmState {
    const state = this.arms.get(action)
    if (!state) throw new UnknownActionError(action, this.actions.slice())
    return state
  }

  private assertDimension(x: readonly number[]): void {
    if (x.length !== this.d) throw new DimensionMismatchError(this.d, x.length)
  }
}
