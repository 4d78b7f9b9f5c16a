import { describe, it, expect } from 'vitest'
import { Matrix, dotVec } from '../matrix'
import { DimensionMismatchError } from '../../utils/errors'

const close = (a: ArrayLike<number>, b: ArrayLike<number>, digits = 10) => {
  expect(a.length).toBe(b.length)
  for (let i = 0; i < a.length; i++) expect(a[i]).toBeCloseTo(b[i], digits)
}

describe('Matrix – basics', () => {
  it('get, set and row-major export', () => {
    const a = Matrix.from2D([
      [1, 2, 3],
      [4, 5, 6],
    ])
    expect(a.get(1, 2)).toBe(6)
    a.set(0, 1, 9)
    expect(a.toArray()).toEqual([1, 9, 3, 4, 5, 6])
    expect(a.to2D()).toEqual([
      [1, 9, 3],
      [4, 5, 6],
    ])
  })

  it('matrix-vector product and quadratic form', () => {
    const m = Matrix.from2D([
      [2, 1],
      [1, 3],
    ])
    expect(Array.from(m.mulVec([1, 2]))).toEqual([4, 7])
    expect(m.quadForm([1, 2])).toBe(18)
    expect(dotVec([1, 2, 3], [4, 5, 6])).toBe(32)
    expect(() => m.mulVec([1, 2, 3])).toThrow(DimensionMismatchError)
  })

  it('rejects ragged or empty input', () => {
    expect(() => Matrix.from2D([])).toThrow('from2D: empty array')
    expect(() => Matrix.from2D([[1, 2], [3]])).toThrow('from2D: ragged rows')
  })

  it('scaled identity', () => {
    expect(Matrix.identity(2, 3).to2D()).toEqual([
      [3, 0],
      [0, 3],
    ])
  })
})

describe('Matrix – inversion', () => {
  it('Gauss–Jordan inverse times the matrix is the identity', () => {
    const m = Matrix.from2D([
      [0, 2, 1],
      [1, 1, 0],
      [3, 0, 4],
    ])
    const inv = m.inverse()
    for (let j = 0; j < 3; j++) {
      const column = [0, 1, 2].map((i) => inv.get(i, j))
      close(m.mulVec(column), [0, 1, 2].map((i) => (i === j ? 1 : 0)))
    }
  })

  it('inverts a known 2x2 matrix', () => {
    const inv = Matrix.from2D([
      [4, 7],
      [2, 6],
    ]).inverse()
    close(inv.toArray(), [0.6, -0.7, -0.2, 0.4])
  })

  it('detects positive-definite matrices', () => {
    expect(Matrix.identity(3, 2).isPositiveDefinite()).toBe(true)
    expect(
      Matrix.from2D([
        [2, 1],
        [1, 2],
      ]).isPositiveDefinite()
    ).toBe(true)
    expect(
      Matrix.from2D([
        [1, 2],
        [2, 1],
      ]).isPositiveDefinite()
    ).toBe(false)
    expect(
      Matrix.from2D([
        [1, 1],
        [1, 1],
      ]).isPositiveDefinite()
    ).toBe(false)
  })

  it('throws on a singular matrix', () => {
    expect(() =>
      Matrix.from2D([
        [1, 2],
        [2, 4],
      ]).inverse()
    ).toThrow('Matrix is singular')
  })

  it('Sherman–Morrison matches the explicit inverse after rank-1 updates', () => {
    const A = Matrix.identity(3)
    const AInv = Matrix.identity(3)
    const updates = [
      [1, 2, 0],
      [0.5, -1, 3],
      [2, 0, 1],
    ]
    for (const x of updates) {
      A.addOuterInPlace(x)
      AInv.shermanMorrisonInPlace(x)
    }
    expect(A.isSymmetric()).toBe(true)
    close(AInv.toArray(), A.inverse().toArray())
  })
})
