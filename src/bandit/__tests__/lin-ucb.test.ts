import { describe, it, expect } from 'vitest'
import { LinUCB } from '../lin-ucb'
import { Matrix } from '../matrix'
import { DimensionMismatchError, InvalidSnapshotError, UnknownActionError } from '../../utils/errors'

const ACTIONS = ['a', 'b', 'c']
const x = [1, 2, 3, 4]

describe('LinUCB – selection', () => {
  it('with identity A and zero b only the exploration bonus counts', () => {
    const model = new LinUCB(ACTIONS, 4, { alpha: 0.5 })
    const bonus = 0.5 * Math.sqrt(30)
    for (const score of model.scores(x).values()) expect(score).toBeCloseTo(bonus, 12)

    const flipped = x.map((v) => -v)
    expect(model.select(x)).toBe('a')
    expect(model.select(flipped)).toBe(model.select(x))
    expect([...model.scores(flipped).values()]).toEqual([...model.scores(x).values()])
  })

  it('learns from rewards', () => {
    const model = new LinUCB(ACTIONS, 4, { alpha: 0.5 })
    model.update('b', x, 1)
    // A = I + xxᵀ so A⁻¹x = x / 31 and xᵀA⁻¹x = 30 / 31
    expect(model.scores(x).get('b')).toBeCloseTo(30 / 31 + 0.5 * Math.sqrt(30 / 31), 10)
    model.theta('b').forEach((t, i) => expect(t).toBeCloseTo(x[i] / 31, 12))

    model.update('a', x, -1)
    expect(model.scores(x).get('a')).toBeCloseTo(-30 / 31 + 0.5 * Math.sqrt(30 / 31), 10)
    expect(model.select(x)).toBe('c')
  })

  it('keeps θ in line with the explicit inverse', () => {
    const model = new LinUCB(['a'], 3, { alpha: 1, ridge: 2 })
    const updates: [number[], number][] = [
      [[1, 0, 2], -1.2],
      [[0.5, 1, 0], -1],
      [[2, 2, 1], -2.05],
    ]
    for (const [v, r] of updates) model.update('a', v, r)

    const snapshot = model.toJSON()
    const explicit = Matrix.from2D(snapshot.A.a).inverse().mulVec(snapshot.b.a)
    model.theta('a').forEach((t, i) => expect(t).toBeCloseTo(explicit[i], 10))
  })

  it('throws on bad input', () => {
    const model = new LinUCB(ACTIONS, 4)
    expect(() => model.select([1, 2])).toThrow(DimensionMismatchError)
    expect(() => model.update('z', x, 1)).toThrow(UnknownActionError)
    expect(() => new LinUCB([], 4)).toThrow('LinUCB needs at least one action')
  })
})

describe('LinUCB – snapshot', () => {
  it('round-trips to the same selection scores', () => {
    const model = new LinUCB(ACTIONS, 4, { alpha: 0.7 })
    model.update('a', [1, 0, 1, 0], -1)
    model.update('b', [0, 1, 1, 2], -1.4)
    model.update('c', [3, 1, 0, 1], -2)
    model.update('a', [1, 1, 1, 1], -1.1)

    const restored = LinUCB.fromJSON(JSON.parse(JSON.stringify(model.toJSON())))
    expect(restored.actions).toEqual(ACTIONS)
    expect(restored.alpha).toBe(0.7)

    const probe = [0.5, 1, -1, 2]
    const before = model.scores(probe)
    const after = restored.scores(probe)
    for (const action of ACTIONS) expect(after.get(action)).toBeCloseTo(before.get(action) ?? NaN, 10)
    expect(restored.select(probe)).toBe(model.select(probe))
  })

  it('snapshot has the documented shape', () => {
    const snapshot = new LinUCB(['a'], 2, { alpha: 0.5, ridge: 1 }).toJSON()
    expect(snapshot).toEqual({
      actions: ['a'],
      d: 2,
      alpha: 0.5,
      A: {
        a: [
          [1, 0],
          [0, 1],
        ],
      },
      b: { a: [0, 0] },
    })
  })

  it('rejects malformed snapshots', () => {
    const good = new LinUCB(['a'], 2).toJSON()
    expect(() => LinUCB.fromJSON({ ...good, d: 'two' })).toThrow(InvalidSnapshotError)
    expect(() => LinUCB.fromJSON({ ...good, b: {} })).toThrow(/missing A or b for action "a"/)
    expect(() => LinUCB.fromJSON({ ...good, A: { a: [[1, 0]] } })).toThrow(/is not 2x2/)
    expect(() => LinUCB.fromJSON({ ...good, b: { a: [0] } })).toThrow(/is not of length 2/)
    expect(() =>
      LinUCB.fromJSON({
        ...good,
        A: {
          a: [
            [1, 1],
            [1, 1],
          ],
        },
      })
    ).toThrow(/not positive definite/)
    expect(() =>
      LinUCB.fromJSON({
        ...good,
        A: {
          a: [
            [2, 1],
            [0, 1],
          ],
        },
      })
    ).toThrow(/A\["a"\] is not symmetric/)
    expect(() =>
      LinUCB.fromJSON({
        ...good,
        A: {
          a: [
            [-1, 0],
            [0, 1],
          ],
        },
      })
    ).toThrow(/not positive definite/)
    expect(() => LinUCB.fromJSON(null)).toThrow(InvalidSnapshotError)
  })

  it('reports duplicate actions as an invalid snapshot', () => {
    const good = new LinUCB(['a'], 2).toJSON()
    const load = () => LinUCB.fromJSON({ ...good, actions: ['a', 'a'] })
    expect(load).toThrow(InvalidSnapshotError)
    expect(load).toThrow(/Duplicate actions: \[a, a\]/)
  })

  it('keeps the inverse exact when updating a loaded non-identity A', () => {
    const model = LinUCB.fromJSON({
      actions: ['a'],
      d: 2,
      alpha: 0,
      A: {
        a: [
          [2, 1],
          [1, 2],
        ],
      },
      b: { a: [1, 1] },
    })
    model.update('a', [1, 2], 1)
    // A = [[3, 3], [3, 6]], b = [2, 3], θ = A⁻¹b
    const [t0, t1] = model.theta('a')
    expect(t0).toBeCloseTo(1 / 3, 10)
    expect(t1).toBeCloseTo(1 / 3, 10)
  })
})
