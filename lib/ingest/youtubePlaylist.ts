import { UpstreamError } from '@/lib/errors'
import type { FeaturedVideo } from '@/lib/featured/types'
import { fetchJson, type Fetcher } from './http'

const YT_ENDPOINT = 'https://www.googleapis.com/youtube/v3'
const PAGE_SIZE = 50

type YoutubeThumbnail = { url?: unknown }

type YoutubeThumbnails = {
  default?: YoutubeThumbnail
  medium?: YoutubeThumbnail
  high?: YoutubeThumbnail
  standard?: YoutubeThumbnail
  maxres?: YoutubeThumbnail
}

// Leaf fields stay unknown: the API body is never validated beyond its shape.
type YoutubePlaylistItem = {
  contentDetails?: { videoId?: unknown }
  snippet?: {
    title?: unknown
    description?: unknown
    thumbnails?: YoutubeThumbnails
    resourceId?: { videoId?: unknown }
  }
}

type YoutubePlaylistResponse = {
  items?: Array<YoutubePlaylistItem | null>
  nextPageToken?: unknown
}

export type PlaylistFetchOptions = {
  apiKey: string
  playlistId: string
  maxVideos?: number
  timeoutMs?: number
  fetcher?: Fetcher
}

const text = (value: unknown): string => (typeof value === 'string' ? value.trim() : '')

function pickThumbnail(thumbnails?: YoutubeThumbnails): string | null {
  if (!thumbnails) return null
  const candidates = [thumbnails.high, thumbnails.default, thumbnails.maxres, thumbnails.standard, thumbnails.medium]
  for (const thumbnail of candidates) {
    const url = text(thumbnail?.url)
    if (url) return url
  }
  return null
}

export function mapPlaylistItem(item: YoutubePlaylistItem | null | undefined): FeaturedVideo | null {
  const snippet = item?.snippet
  const videoId = text(item?.contentDetails?.videoId) || text(snippet?.resourceId?.videoId)
  if (!videoId) return null
  const thumbnailUrl = pickThumbnail(snippet?.thumbnails)
  if (!thumbnailUrl) return null
  const description = text(snippet?.description).split('\n')[0].trim()
  return {
    videoId,
    title: text(snippet?.title),
    description,
    thumbnailUrl,
  }
}

function isPlaylistResponse(value: unknown): value is YoutubePlaylistResponse {
  if (typeof value !== 'object' || value === null) return false
  const items = (value as { items?: unknown }).items
  return items === undefined || Array.isArray(items)
}

/** Reads a playlist newest-first, following page tokens until `maxVideos` are collected. */
export async function fetchPlaylistVideos(options: PlaylistFetchOptions): Promise<FeaturedVideo[]> {
  const { apiKey, playlistId, maxVideos = 50, timeoutMs, fetcher } = options
  const videos: FeaturedVideo[] = []
  let pageToken: string | undefined

  do {
    const url = new URL(`${YT_ENDPOINT}/playlistItems`)
    url.searchParams.set('part', 'snippet,contentDetails')
    url.searchParams.set('maxResults', String(PAGE_SIZE))
    url.searchParams.set('playlistId', playlistId)
    url.searchParams.set('key', apiKey)
    if (pageToken) url.searchParams.set('pageToken', pageToken)

    const body = await fetchJson(url, { timeoutMs, fetcher })
    if (!isPlaylistResponse(body)) throw new UpstreamError('unexpected playlistItems response')

    for (const item of body.items ?? []) {
      const video = mapPlaylistItem(item)
      if (video) videos.push(video)
      else console.warn('[youtube:playlist] skipped item without video id or thumbnail', playlistId)
    }
    pageToken = text(body.nextPageToken) || undefined
  } while (pageToken && videos.length < maxVideos)

  return videos.slice(0, maxVideos)
}
