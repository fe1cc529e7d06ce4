import { FeaturedVideoBackend, type VideoSource } from '@/lib/featured/backend'
import type { RandomSource } from '@/lib/featured/random'
import { SeededRandom } from '@/lib/featured/random'
import { InMemoryFeaturedPoolRepository } from '@/lib/featured/repository'
import { FeaturedVideoStore } from '@/lib/featured/store'
import type { FeaturedPoolSnapshot, FeaturedVideo } from '@/lib/featured/types'

export function makeVideos(count: number, prefix = 'v'): FeaturedVideo[] {
  return Array.from({ length: count }, (_, index) => ({
    videoId: `${prefix}${index}`,
    title: `title ${index}`,
    description: 'description',
    thumbnailUrl: `https://img.example.test/${prefix}${index}.jpg`,
  }))
}

/** Pool position encoded in the ids produced by `makeVideos`. */
export const positionOf = (video: FeaturedVideo): number => Number(video.videoId.replace(/^\D+/, ''))

/** Replays a fixed list of integers and records the bounds it was asked for. */
export class ScriptedRandom implements RandomSource {
  readonly calls: Array<[number, number]> = []

  constructor(private readonly values: number[]) {}

  next(): number {
    return 0
  }

  nextInt(min: number, max: number): number {
    this.calls.push([min, max])
    const value = this.values.shift()
    if (value === undefined) throw new Error('scripted values exhausted')
    return value
  }
}

type TestBackendOptions = {
  fetchVideos?: VideoSource
  snapshot?: FeaturedPoolSnapshot | null
  seed?: number
  refreshIntervalMs?: number
}

export function createTestBackend(options: TestBackendOptions = {}) {
  const repository = new InMemoryFeaturedPoolRepository(options.snapshot ?? null)
  const backend = new FeaturedVideoBackend({
    store: new FeaturedVideoStore({ random: new SeededRandom(options.seed ?? 123) }),
    repository,
    fetchVideos: options.fetchVideos ?? (() => null),
    refreshIntervalMs: options.refreshIntervalMs ?? 1000,
  })
  return { backend, repository }
}
