import type { Db } from 'mongodb'
import { getDb } from '@/lib/db'
import { parseFeaturedVideo, type FeaturedPoolSnapshot, type FeaturedVideo, type PoolSource } from './types'

export interface FeaturedPoolRepository {
  load(): Promise<FeaturedPoolSnapshot | null>
  save(snapshot: FeaturedPoolSnapshot): Promise<void>
}

const POOL_DOC_ID = 'current'

type FeaturedPoolDocument = {
  _id: string
  videos: unknown[]
  updatedAt: Date
  source: PoolSource
}

export class MongoFeaturedPoolRepository implements FeaturedPoolRepository {
  constructor(
    private readonly collectionName: string,
    private readonly database: () => Promise<Db> = () => getDb(),
  ) {}

  private async collection() {
    const db = await this.database()
    return db.collection<FeaturedPoolDocument>(this.collectionName)
  }

  async load(): Promise<FeaturedPoolSnapshot | null> {
    const coll = await this.collection()
    const doc = await coll.findOne({ _id: POOL_DOC_ID })
    if (!doc) return null
    const videos = (Array.isArray(doc.videos) ? doc.videos : [])
      .map(parseFeaturedVideo)
      .filter((video): video is FeaturedVideo => video !== null)
    return {
      videos,
      updatedAt: doc.updatedAt instanceof Date ? doc.updatedAt : new Date(doc.updatedAt),
      source: doc.source === 'admin' ? 'admin' : 'youtube',
    }
  }

  async save(snapshot: FeaturedPoolSnapshot): Promise<void> {
    const coll = await this.collection()
    await coll.updateOne(
      { _id: POOL_DOC_ID },
      { $set: { videos: snapshot.videos, updatedAt: snapshot.updatedAt, source: snapshot.source } },
      { upsert: true },
    )
  }
}

export class InMemoryFeaturedPoolRepository implements FeaturedPoolRepository {
  private snapshot: FeaturedPoolSnapshot | null

  constructor(initial: FeaturedPoolSnapshot | null = null) {
    this.snapshot = initial
  }

  async load(): Promise<FeaturedPoolSnapshot | null> {
    return this.snapshot ? { ...this.snapshot, videos: [...this.snapshot.videos] } : null
  }

  async save(snapshot: FeaturedPoolSnapshot): Promise<void> {
    this.snapshot = { ...snapshot, videos: [...snapshot.videos] }
  }
}
