export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

import { NextResponse } from 'next/server'
import { InvalidArgumentError, errorMessage } from '@/lib/errors'
import { getFeaturedBackend } from '@/lib/featured/services'
import { toVideoView } from '@/lib/featured/types'

function parseCount(raw: string | null): number | undefined | null {
  if (raw === null || raw === '') return undefined
  return /^\d+$/.test(raw) ? Number(raw) : null
}

export async function GET(req: Request) {
  const count = parseCount(new URL(req.url).searchParams.get('count'))
  if (count === null) {
    return NextResponse.json({ error: 'count must be an integer' }, { status: 400 })
  }

  try {
    const backend = getFeaturedBackend()
    await backend.restore()
    const videos = backend.store.getFeatured(count)
    return NextResponse.json(
      {
        ok: true,
        count: videos.length,
        updatedAt: backend.store.updatedAt?.toISOString() ?? null,
        videos: videos.map(toVideoView),
      },
      { headers: { 'Cache-Control': 'no-store' } },
    )
  } catch (error: unknown) {
    if (error instanceof InvalidArgumentError) {
      return NextResponse.json({ error: error.message }, { status: 400 })
    }
    console.error('[featured:api] selection failed', error)
    return NextResponse.json({ error: errorMessage(error, 'selection failed') }, { status: 500 })
  }
}
