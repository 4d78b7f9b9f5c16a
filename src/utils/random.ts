/** @file random.ts */

/**
 *  Seeded pseudo-random source (mulberry32). Every episode owns one and
 *  threads it through solver state, there is no global random state.
 */
export const DEFAULT_SEED = 0

export class Random {
  private state: number

  constructor(seed: number = DEFAULT_SEED) {
    this.state = seed >>> 0
  }

  /** Uniform float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0
    let t = this.state
    t = Math.imul(t ^ (t >>> 15), 1 | t)
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  /** Uniform integer in [0, n). */
  int(n: number): number {
    if (!Number.isInteger(n) || n <= 0) throw new RangeError(`Random.int: expected a positive integer, got ${n}`)
    return Math.floor(this.next() * n)
  }

  /** Picks one element uniformly, the array must be non-empty. */
  pick<T>(items: readonly T[]): T {
    return items[this.int(items.length)]
  }

  /**
   *  Draws `k` distinct elements (partial Fisher-Yates), keeps the whole
   *  array when it has `k` elements or fewer.
   */
  sample<T>(items: readonly T[], k: number): T[] {
    const copy = items.slice()
    if (copy.length <= k) return copy
    for (let i = 0; i < k; i++) {
      const j = i + this.int(copy.length - i)
      const tmp = copy[i]
      copy[i] = copy[j]
      copy[j] = tmp
    }
    return copy.slice(0, k)
  }

  /** Derives a 31-bit seed for a child source. */
  nextSeed(): number {
    return this.int(2 ** 31 - 1)
  }
}
