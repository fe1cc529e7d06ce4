import { getDb } from '@/lib/db'
import { readFeaturedConfig, type FeaturedConfig } from '@/lib/config'
import { fetchPlaylistVideos } from '@/lib/ingest/youtubePlaylist'
import { FeaturedVideoBackend, type VideoSource } from './backend'
import { InMemoryFeaturedPoolRepository, MongoFeaturedPoolRepository } from './repository'
import { FeaturedVideoStore } from './store'

let active: FeaturedVideoBackend | null = null

export function youtubeVideoSource(config: FeaturedConfig): VideoSource {
  const { youtubeApiKey, playlistId } = config
  return () => {
    if (!youtubeApiKey || !playlistId) return null
    return fetchPlaylistVideos({
      apiKey: youtubeApiKey,
      playlistId,
      maxVideos: config.maxVideos,
      timeoutMs: config.fetchTimeoutMs,
    })
  }
}

export function createFeaturedBackend(config: FeaturedConfig = readFeaturedConfig()): FeaturedVideoBackend {
  return new FeaturedVideoBackend({
    store: new FeaturedVideoStore({ defaultCount: config.defaultCount, recentWindow: config.recentWindow }),
    repository: config.mongoUri
      ? new MongoFeaturedPoolRepository(config.collectionName, () => getDb(config.mongoDbName))
      : new InMemoryFeaturedPoolRepository(),
    fetchVideos: youtubeVideoSource(config),
    refreshIntervalMs: config.refreshIntervalMs,
  })
}

/** The process-wide backend, built from the environment on first use. */
export function getFeaturedBackend(): FeaturedVideoBackend {
  if (!active) active = createFeaturedBackend()
  return active
}

export function registerFeaturedBackend(backend: FeaturedVideoBackend): void {
  if (active && active !== backend) active.stop()
  active = backend
}

/** Stops and forgets the active backend; the next lookup builds a fresh one. */
export function resetFeaturedBackend(): void {
  active?.stop()
  active = null
}
