export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number
  /** Uniform integer in [min, max). */
  nextInt(min: number, max: number): number
}

/** mulberry32: small 32-bit generator, fully determined by its seed. */
export class SeededRandom implements RandomSource {
  private state: number

  constructor(seed: number) {
    this.state = seed >>> 0
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0
    let t = this.state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min))
  }
}

export const systemRandom: RandomSource = {
  next: () => Math.random(),
  nextInt: (min, max) => min + Math.floor(Math.random() * (max - min)),
}
