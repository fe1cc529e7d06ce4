import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { readFeaturedConfig } from '@/lib/config'
import {
  getFeaturedBackend,
  registerFeaturedBackend,
  resetFeaturedBackend,
  youtubeVideoSource,
} from '@/lib/featured/services'
import { createTestBackend, makeVideos } from '../helpers'

describe('featured services', () => {
  beforeEach(() => {
    vi.stubEnv('MONGO_URI', '')
    vi.stubEnv('MONGODB_URI', '')
    vi.stubEnv('YOUTUBE_API_KEY', '')
    vi.stubEnv('FEATURED_PLAYLIST_ID', '')
  })

  afterEach(() => {
    resetFeaturedBackend()
    vi.unstubAllEnvs()
  })

  it('builds one backend and reuses it', () => {
    expect(getFeaturedBackend()).toBe(getFeaturedBackend())
  })

  it('drops the state on reset', async () => {
    const backend = getFeaturedBackend()
    await backend.replacePool(makeVideos(3), 'admin')

    resetFeaturedBackend()

    const fresh = getFeaturedBackend()
    expect(fresh).not.toBe(backend)
    expect(fresh.store.size).toBe(0)
  })

  it('serves a registered backend and stops the one it replaces', () => {
    const previous = getFeaturedBackend()
    const stop = vi.spyOn(previous, 'stop')
    const { backend } = createTestBackend()

    registerFeaturedBackend(backend)

    expect(getFeaturedBackend()).toBe(backend)
    expect(stop).toHaveBeenCalledTimes(1)
  })

  it('has no video source without an API key and playlist', () => {
    const source = youtubeVideoSource(readFeaturedConfig({ YOUTUBE_API_KEY: 'test-key' }))
    expect(source()).toBeNull()
  })

  it('skips the refresh of an unconfigured default backend', async () => {
    await expect(getFeaturedBackend().refresh()).resolves.toEqual({
      status: 'skipped',
      reason: 'video source not configured',
    })
  })
})
