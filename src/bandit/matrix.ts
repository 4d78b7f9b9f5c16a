/** @file matrix.ts */

import { DimensionMismatchError } from '../utils/errors'

export class Matrix {
  readonly rows: number
  readonly cols: number
  readonly data: Float64Array

  constructor(rows: number, cols: number, data?: ArrayLike<number>) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new Error(`Invalid matrix shape ${rows}x${cols}`)
    }
    this.rows = rows
    this.cols = cols

    if (data) {
      if (data.length !== rows * cols) {
        throw new Error(`Data length ${data.length} doesn't match dimensions ${rows}x${cols}`)
      }
      this.data = Float64Array.from(data)
    } else {
      this.data = new Float64Array(rows * cols)
    }
  }

  get(row: number, col: number): number {
    return this.data[row * this.cols + col]
  }

  set(row: number, col: number, value: number): void {
    this.data[row * this.cols + col] = value
  }

  /** Matrix-vector product `M v`. */
  mulVec(v: ArrayLike<number>): Float64Array {
    if (v.length !== this.cols) throw new DimensionMismatchError(this.cols, v.length)
    const out = new Float64Array(this.rows)
    for (let i = 0; i < this.rows; i++) {
      const ai = i * this.cols
      let sum = 0
      for (let k = 0; k < this.cols; k++) sum += this.data[ai + k] * v[k]
      out[i] = sum
    }
    return out
  }

  /** Quadratic form `xᵀ M x`. */
  quadForm(x: ArrayLike<number>): number {
    return dotVec(x, this.mulVec(x))
  }

  /** In place `M += x xᵀ`. */
  addOuterInPlace(x: ArrayLike<number>, scale = 1): this {
    if (this.rows !== this.cols || x.length !== this.rows) throw new DimensionMismatchError(this.rows, x.length)
    const n = this.rows
    for (let i = 0; i < n; i++) {
      const xi = x[i] * scale
      for (let j = 0; j < n; j++) this.data[i * n + j] += xi * x[j]
    }
    return this
  }

  /**
   * In place Sherman–Morrison rank-1 update: if this is `A⁻¹`, it becomes
   * `(A + x xᵀ)⁻¹ = A⁻¹ − (A⁻¹x)(A⁻¹x)ᵀ / (1 + xᵀA⁻¹x)`. Requires a
   * symmetric inverse, which holds for symmetric positive-definite `A`.
   */
  shermanMorrisonInPlace(x: ArrayLike<number>): this {
    const u = this.mulVec(x)
    const denom = 1 + dotVec(x, u)
    return this.addOuterInPlace(u, -1 / denom)
  }

  /**
   * Inverse by Gauss–Jordan elimination with partial pivoting.
   */
  inverse(): Matrix {
    if (this.rows !== this.cols) throw new Error(`Cannot invert a ${this.rows}x${this.cols} matrix`)
    const n = this.rows
    const a = this.copy().data
    const inv = Matrix.identity(n).data

    for (let col = 0; col < n; col++) {
      let pivot = col
      for (let r = col + 1; r < n; r++) {
        if (Math.abs(a[r * n + col]) > Math.abs(a[pivot * n + col])) pivot = r
      }
      const p = a[pivot * n + col]
      if (Math.abs(p) < 1e-12) throw new Error('Matrix is singular')

      if (pivot !== col) {
        for (let k = 0; k < n; k++) {
          ;[a[col * n + k], a[pivot * n + k]] = [a[pivot * n + k], a[col * n + k]]
          ;[inv[col * n + k], inv[pivot * n + k]] = [inv[pivot * n + k], inv[col * n + k]]
        }
      }

      for (let k = 0; k < n; k++) {
        a[col * n + k] /= p
        inv[col * n + k] /= p
      }

      for (let r = 0; r < n; r++) {
        if (r === col) continue
        const f = a[r * n + col]
        if (f === 0) continue
        for (let k = 0; k < n; k++) {
          a[r * n + k] -= f * a[col * n + k]
          inv[r * n + k] -= f * inv[col * n + k]
        }
      }
    }

    return new Matrix(n, n, inv)
  }

  isSymmetric(tolerance = 1e-9): boolean {
    if (this.rows !== this.cols) return false
    for (let i = 0; i < this.rows; i++) {
      for (let j = i + 1; j < this.cols; j++) {
        if (Math.abs(this.get(i, j) - this.get(j, i)) > tolerance) return false
      }
    }
    return true
  }

  /**
   * Cholesky test: every pivot of `L Lᵀ = M` must stay positive. Assumes a
   * symmetric matrix, check `isSymmetric` first.
   */
  isPositiveDefinite(): boolean {
    if (this.rows !== this.cols) return false
    const n = this.rows
    const L = new Float64Array(n * n)
    for (let j = 0; j < n; j++) {
      let diag = this.get(j, j)
      for (let k = 0; k < j; k++) diag -= L[j * n + k] ** 2
      if (!(diag > 0)) return false
      const pivot = Math.sqrt(diag)
      L[j * n + j] = pivot
      for (let i = j + 1; i < n; i++) {
        let sum = this.get(i, j)
        for (let k = 0; k < j; k++) sum -= L[i * n + k] * L[j * n + k]
        L[i * n + j] = sum / pivot
      }
    }
    return true
  }

  copy(): Matrix {
    return new Matrix(this.rows, this.cols, this.data)
  }

  toArray(): number[] {
    return Array.from(this.data)
  }

  /** Row-major nested arrays. */
  to2D(): number[][] {
    const out: number[][] = []
    for (let i = 0; i < this.rows; i++) out.push(Array.from(this.data.subarray(i * this.cols, (i + 1) * this.cols)))
    return out
  }

  static identity(size: number, scale = 1): Matrix {
    const m = new Matrix(size, size)
    for (let i = 0; i < size; i++) m.set(i, i, scale)
    return m
  }

  static from2D(arr: readonly (readonly number[])[]): Matrix {
    const rows = arr.length
    if (rows === 0) throw new Error('from2D: empty array')
    const cols = arr[0].length
    if (!Number.isInteger(cols) || cols <= 0) throw new Error('from2D: empty inner array')
    for (let i = 1; i < rows; i++) {
      if (arr[i].length !== cols) throw new Error('from2D: ragged rows')
    }
    const data = new Float64Array(rows * cols)
    for (let i = 0; i < rows; i++) {
      const row = arr[i]
      for (let j = 0; j < cols; j++) data[i * cols + j] = row[j]
    }
    return new Matrix(rows, cols, data)
  }
}

export function dotVec(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) throw new DimensionMismatchError(a.length, b.length)
  let sum = 0
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i]
  return sum
}
