export type FeaturedVideo = {
  videoId: string
  title: string
  description: string
  thumbnailUrl: string
}

export type PoolSource = 'youtube' | 'admin'

export type FeaturedPoolSnapshot = {
  videos: FeaturedVideo[]
  updatedAt: Date
  source: PoolSource
}

export type FeaturedVideoView = FeaturedVideo & { videoUrl: string }

export function videoUrl(videoId: string): string {
  return `https://youtube.com/watch?v=${encodeURIComponent(videoId)}`
}

export function toVideoView(video: FeaturedVideo): FeaturedVideoView {
  return { ...video, videoUrl: videoUrl(video.videoId) }
}

const toStringValue = (value: unknown): string | null => (typeof value === 'string' ? value : null)

export function parseFeaturedVideo(value: unknown): FeaturedVideo | null {
  if (typeof value !== 'object' || value === null) return null
  const record = value as Record<string, unknown>
  const videoId = toStringValue(record.videoId)?.trim()
  const thumbnailUrl = toStringValue(record.thumbnailUrl)?.trim()
  if (!videoId || !thumbnailUrl) return null
  return {
    videoId,
    title: toStringValue(record.title)?.trim() ?? '',
    description: toStringValue(record.description)?.trim() ?? '',
    thumbnailUrl,
  }
}

export type ParsedVideoList =
  | { ok: true; videos: FeaturedVideo[] }
  | { ok: false; index: number }

export function parseFeaturedVideoList(values: readonly unknown[]): ParsedVideoList {
  const videos: FeaturedVideo[] = []
  for (const [index, value] of values.entries()) {
    const video = parseFeaturedVideo(value)
    if (!video) return { ok: false, index }
    videos.push(video)
  }
  return { ok: true, videos }
}
