export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

import { NextResponse } from 'next/server'
import { readFeaturedConfig } from '@/lib/config'
import { getDb, isDbConfigured } from '@/lib/db'
import { errorMessage } from '@/lib/errors'
import { getFeaturedBackend } from '@/lib/featured/services'

async function pingDb(): Promise<number | null> {
  if (!isDbConfigured()) return null
  try {
    const db = await getDb()
    const pingResult: unknown = await db.command({ ping: 1 })
    const ok = typeof pingResult === 'object' && pingResult !== null ? (pingResult as { ok?: unknown }).ok : null
    return typeof ok === 'number' ? ok : 0
  } catch (error) {
    console.error('[health] db ping failed', error)
    return 0
  }
}

export async function GET() {
  try {
    const config = readFeaturedConfig()
    const { store } = getFeaturedBackend()
    return NextResponse.json({
      ping: await pingDb(),
      hasDb: Boolean(config.mongoUri),
      hasYoutubeKey: Boolean(config.youtubeApiKey && config.playlistId),
      featured: {
        size: store.size,
        updatedAt: store.updatedAt?.toISOString() ?? null,
      },
    })
  } catch (error: unknown) {
    return NextResponse.json({ error: errorMessage(error, 'health check failed') }, { status: 500 })
  }
}
