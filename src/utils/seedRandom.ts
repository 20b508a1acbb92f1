import type { RandomSource } from '../types'

// Mulberry32 - simple seeded PRNG
export class SeededRandom implements RandomSource {
  private state: number

  constructor(seed: number) {
    this.state = seed
  }

  next(): number {
    this.state |= 0
    this.state = (this.state + 0x6d2b79f5) | 0
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

// Random integer between min (inclusive) and max (exclusive)
export function nextInt(random: RandomSource, min: number, max: number): number {
  return Math.floor(random.next() * (max - min)) + min
}

// Fisher-Yates, in place
export function shuffle<T>(arr: T[], random: RandomSource): T[] {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = nextInt(random, 0, i + 1)
    ;[arr[i], arr[j]] = [arr[j], arr[i]]
  }
  return arr
}

export function randomSeed(): number {
  return (Date.now() ^ Math.floor(Math.random() * 0x100000000)) >>> 0
}
