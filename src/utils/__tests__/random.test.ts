import { describe, it, expect } from 'vitest'
import { DEFAULT_SEED, Random } from '../random'

describe('Random', () => {
  it('falls back to a fixed seed instead of global random state', () => {
    const a = new Random()
    const b = new Random(DEFAULT_SEED)
    const draws = (rng: Random) => Array.from({ length: 5 }, () => rng.next())
    expect(draws(a)).toEqual(draws(b))
  })

  it('repeats the same sequence for the same seed', () => {
    expect(new Random(42).sample(['a', 'b', 'c', 'd', 'e'], 3)).toEqual(new Random(42).sample(['a', 'b', 'c', 'd', 'e'], 3))
  })

  it('keeps values in range', () => {
    const rng = new Random(7)
    for (let i = 0; i < 100; i++) {
      const x = rng.next()
      expect(x).toBeGreaterThanOrEqual(0)
      expect(x).toBeLessThan(1)
      expect(rng.int(3)).toBeLessThan(3)
    }
    expect(() => rng.int(0)).toThrow(RangeError)
  })
})
