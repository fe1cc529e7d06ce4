import type { FeaturedPoolRepository } from './repository'
import type { FeaturedVideoStore } from './store'
import type { FeaturedVideo, PoolSource } from './types'

/** Returns null when fetching is not configured (no API key, no playlist). */
export type VideoSource = () => Promise<FeaturedVideo[]> | null

export type RefreshResult =
  | { status: 'updated'; count: number }
  | { status: 'skipped'; reason: string }

export type FeaturedVideoBackendOptions = {
  store: FeaturedVideoStore
  repository: FeaturedPoolRepository
  fetchVideos: VideoSource
  refreshIntervalMs?: number
}

const DEFAULT_REFRESH_INTERVAL_MS = 60 * 60 * 1000

export class FeaturedVideoBackend {
  readonly store: FeaturedVideoStore
  private readonly repository: FeaturedPoolRepository
  private readonly fetchVideos: VideoSource
  private readonly refreshIntervalMs: number
  private timer: ReturnType<typeof setInterval> | null = null
  private restoring: Promise<void> | null = null
  private refreshing: Promise<RefreshResult> | null = null

  constructor(options: FeaturedVideoBackendOptions) {
    this.store = options.store
    this.repository = options.repository
    this.fetchVideos = options.fetchVideos
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS
  }

  /** Replaces the pool in memory first, then persists it. */
  async replacePool(videos: readonly FeaturedVideo[], source: PoolSource): Promise<void> {
    const updatedAt = new Date()
    this.store.setPool(videos, updatedAt)
    await this.repository.save({ videos: [...videos], updatedAt, source })
  }

  /** Loads the persisted pool into an empty store. Runs at most once. */
  restore(): Promise<void> {
    if (!this.restoring) this.restoring = this.loadSnapshot()
    return this.restoring
  }

  private async loadSnapshot(): Promise<void> {
    try {
      const snapshot = await this.repository.load()
      if (!snapshot || !snapshot.videos.length) return
      if (this.store.updatedAt) return
      this.store.setPool(snapshot.videos, snapshot.updatedAt)
      console.info('[featured:restore] restored', snapshot.videos.length, 'videos from', snapshot.source)
    } catch (error) {
      console.error('[featured:restore] failed to load persisted pool', error)
    }
  }

  refresh(): Promise<RefreshResult> {
    if (!this.refreshing) {
      this.refreshing = this.runRefresh().finally(() => {
        this.refreshing = null
      })
    }
    return this.refreshing
  }

  private async runRefresh(): Promise<RefreshResult> {
    const pending = this.fetchVideos()
    if (!pending) return { status: 'skipped', reason: 'video source not configured' }
    const videos = await pending
    if (!videos.length) {
      console.warn('[featured:refresh] playlist returned no videos, keeping', this.store.size)
      return { status: 'skipped', reason: 'empty playlist' }
    }
    await this.replacePool(videos, 'youtube')
    console.info('[featured:refresh] updated pool with', videos.length, 'videos')
    return { status: 'updated', count: videos.length }
  }

  private async refreshLogged(): Promise<void> {
    try {
      await this.refresh()
    } catch (error) {
      console.error('[featured:refresh] failed', error)
    }
  }

  async start(): Promise<void> {
    await this.restore()
    await this.refreshLogged()
    if (this.timer) return
    this.timer = setInterval(() => {
      void this.refreshLogged()
    }, this.refreshIntervalMs)
    this.timer.unref()
  }

  stop(): void {
    if (!this.timer) return
    clearInterval(this.timer)
    this.timer = null
  }

  get running(): boolean {
    return this.timer !== null
  }
}
