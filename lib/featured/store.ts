import { selectRandomVideos, DEFAULT_RECENT_WINDOW } from './picker'
import { systemRandom, type RandomSource } from './random'
import type { FeaturedVideo } from './types'

export const DEFAULT_FEATURED_COUNT = 4

export type FeaturedVideoStoreOptions = {
  random?: RandomSource
  defaultCount?: number
  recentWindow?: number
}

/** Holds the current pool of featured videos and draws selections from it. */
export class FeaturedVideoStore {
  private pool: readonly FeaturedVideo[] = []
  private lastUpdate: Date | null = null
  private readonly random: RandomSource
  private readonly defaultCount: number
  private readonly recentWindow: number

  constructor(options: FeaturedVideoStoreOptions = {}) {
    this.random = options.random ?? systemRandom
    this.defaultCount = options.defaultCount ?? DEFAULT_FEATURED_COUNT
    this.recentWindow = options.recentWindow ?? DEFAULT_RECENT_WINDOW
  }

  setPool(videos: readonly FeaturedVideo[], updatedAt: Date = new Date()): void {
    this.pool = Object.freeze([...videos])
    this.lastUpdate = updatedAt
  }

  getPool(): readonly FeaturedVideo[] {
    return this.pool
  }

  /**
   * An omitted count falls back to the default, clamped to the pool size.
   * An explicit count is not clamped.
   */
  getFeatured(count?: number): FeaturedVideo[] {
    const pool = this.pool
    if (!pool.length) return []
    const requested = count ?? Math.min(this.defaultCount, pool.length)
    return selectRandomVideos(this.random, pool, requested, { recentWindow: this.recentWindow })
  }

  get size(): number {
    return this.pool.length
  }

  get updatedAt(): Date | null {
    return this.lastUpdate
  }

  reset(): void {
    this.pool = []
    this.lastUpdate = null
  }
}
