import { ConfigurationError } from '@/lib/errors'

type Env = Record<string, string | undefined>

export type FeaturedConfig = {
  youtubeApiKey: string | null
  playlistId: string | null
  defaultCount: number
  recentWindow: number
  maxVideos: number
  refreshIntervalMs: number
  fetchTimeoutMs: number
  collectionName: string
  mongoUri: string | null
  mongoDbName: string
  adminKey: string | null
}

export const DEFAULT_DB_NAME = 'featured'

const trimmed = (value?: string | null): string | null => {
  const output = (value || '').trim()
  return output ? output : null
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = trimmed(env[name])
  if (raw === null) return fallback
  const parsed = Number(raw)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`)
  }
  return parsed
}

export function readMongoUri(env: Env = process.env): string | null {
  return trimmed(env.MONGO_URI) ?? trimmed(env.MONGODB_URI)
}

export function readMongoDbName(env: Env = process.env): string {
  return trimmed(env.MONGODB_DB) ?? trimmed(env.MONGO_DB) ?? DEFAULT_DB_NAME
}

export function readAdminKey(env: Env = process.env): string | null {
  return trimmed(env.ADMIN_KEY)
}

export function readFeaturedConfig(env: Env = process.env): FeaturedConfig {
  return {
    youtubeApiKey: trimmed(env.YOUTUBE_API_KEY),
    playlistId: trimmed(env.FEATURED_PLAYLIST_ID),
    defaultCount: positiveInt(env, 'FEATURED_DEFAULT_COUNT', 4),
    recentWindow: positiveInt(env, 'FEATURED_RECENT_WINDOW', 3),
    maxVideos: positiveInt(env, 'FEATURED_MAX_VIDEOS', 50),
    refreshIntervalMs: positiveInt(env, 'FEATURED_REFRESH_INTERVAL_MS', 60 * 60 * 1000),
    fetchTimeoutMs: positiveInt(env, 'FEATURED_FETCH_TIMEOUT_MS', 10000),
    collectionName: trimmed(env.FEATURED_COLLECTION) ?? 'featured_videos',
    mongoUri: readMongoUri(env),
    mongoDbName: readMongoDbName(env),
    adminKey: readAdminKey(env),
  }
}
