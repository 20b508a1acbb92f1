import { describe, expect, it } from 'vitest'
import { SeededRandom, nextInt, randomSeed, shuffle } from './seedRandom'

describe('SeededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    const a = new SeededRandom(12345)
    const b = new SeededRandom(12345)
    const seqA = Array.from({ length: 20 }, () => a.next())
    const seqB = Array.from({ length: 20 }, () => b.next())
    expect(seqA).toEqual(seqB)
  })

  it('diverges for different seeds', () => {
    const a = new SeededRandom(1)
    const b = new SeededRandom(2)
    expect(a.next()).not.toBe(b.next())
  })

  it('stays in [0, 1)', () => {
    const rng = new SeededRandom(99)
    for (let i = 0; i < 1000; i++) {
      const n = rng.next()
      expect(n).toBeGreaterThanOrEqual(0)
      expect(n).toBeLessThan(1)
    }
  })
})

describe('nextInt', () => {
  it('maps the source onto [min, max)', () => {
    expect(nextInt({ next: () => 0 }, 3, 7)).toBe(3)
    expect(nextInt({ next: () => 0.999 }, 3, 7)).toBe(6)
    expect(nextInt({ next: () => 0.5 }, 0, 4)).toBe(2)
  })
})

describe('shuffle', () => {
  it('keeps every element', () => {
    const items = [1, 2, 3, 4, 5, 6, 7, 8]
    const shuffled = shuffle([...items], new SeededRandom(4))
    expect([...shuffled].sort((x, y) => x - y)).toEqual(items)
  })

  it('swaps with index 0 when the source always returns 0', () => {
    expect(shuffle(['a', 'b', 'c'], { next: () => 0 })).toEqual(['b', 'c', 'a'])
  })

  it('leaves the order alone when the source stays near 1', () => {
    expect(shuffle(['a', 'b', 'c'], { next: () => 0.99 })).toEqual(['a', 'b', 'c'])
  })

  it('shuffles in place', () => {
    const items = ['x', 'y']
    expect(shuffle(items, { next: () => 0 })).toBe(items)
  })
})

describe('randomSeed', () => {
  it('returns an unsigned 32-bit integer', () => {
    const seed = randomSeed()
    expect(Number.isInteger(seed)).toBe(true)
    expect(seed).toBeGreaterThanOrEqual(0)
    expect(seed).toBeLessThan(2 ** 32)
  })
})
