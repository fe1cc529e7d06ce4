export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

import { NextResponse } from 'next/server'
import { requireAdminKey } from '@/lib/adminAuth'
import { errorMessage } from '@/lib/errors'
import { getFeaturedBackend } from '@/lib/featured/services'
import { parseFeaturedVideoList, toVideoView } from '@/lib/featured/types'

type ReplacePoolRequest = {
  videos?: unknown
}

export async function GET(req: Request) {
  const denied = requireAdminKey(req)
  if (denied) return denied

  try {
    const backend = getFeaturedBackend()
    await backend.restore()
    const { store } = backend
    return NextResponse.json({
      ok: true,
      size: store.size,
      updatedAt: store.updatedAt?.toISOString() ?? null,
      videos: store.getPool().map(toVideoView),
    })
  } catch (error: unknown) {
    console.error('[featured:admin] reading pool failed', error)
    return NextResponse.json({ error: errorMessage(error, 'read failed') }, { status: 500 })
  }
}

export async function PUT(req: Request) {
  const denied = requireAdminKey(req)
  if (denied) return denied

  const rawBody = await req.json().catch(() => null)
  const body: ReplacePoolRequest = typeof rawBody === 'object' && rawBody !== null
    ? (rawBody as ReplacePoolRequest)
    : {}
  if (!Array.isArray(body.videos)) {
    return NextResponse.json({ error: 'body must be { videos: [...] }' }, { status: 400 })
  }

  const parsed = parseFeaturedVideoList(body.videos)
  if (!parsed.ok) {
    return NextResponse.json(
      { error: `videos[${parsed.index}] needs a non-empty videoId and thumbnailUrl` },
      { status: 400 },
    )
  }

  try {
    const backend = getFeaturedBackend()
    await backend.replacePool(parsed.videos, 'admin')
    return NextResponse.json({
      ok: true,
      size: backend.store.size,
      updatedAt: backend.store.updatedAt?.toISOString() ?? null,
    })
  } catch (error: unknown) {
    console.error('[featured:admin] persisting pool failed', error)
    return NextResponse.json({ error: errorMessage(error, 'persist failed') }, { status: 500 })
  }
}
