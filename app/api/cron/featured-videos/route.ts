export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

import { NextResponse } from 'next/server'
import { requireAdminKey } from '@/lib/adminAuth'
import { UpstreamError, errorMessage } from '@/lib/errors'
import type { FeaturedVideoBackend } from '@/lib/featured/backend'
import { getFeaturedBackend } from '@/lib/featured/services'
import { logCronRun } from '@/lib/metrics/cron'

const CRON_NAME = 'cron:featured-videos'

export async function GET(req: Request) {
  const denied = requireAdminKey(req)
  if (denied) return denied

  const startedAt = new Date()
  const triggeredBy = req.headers.get('x-vercel-cron') ? 'cron' : 'manual'
  let backend: FeaturedVideoBackend
  try {
    backend = getFeaturedBackend()
  } catch (error: unknown) {
    console.error('[featured:refresh] backend unavailable', error)
    return NextResponse.json({ error: errorMessage(error, 'backend unavailable') }, { status: 500 })
  }

  try {
    await backend.restore()
    const result = await backend.refresh()
    await logCronRun({
      name: CRON_NAME,
      status: result.status === 'updated' ? 'success' : 'skipped',
      startedAt,
      finishedAt: new Date(),
      triggeredBy,
      details: { result, poolSize: backend.store.size },
    })
    return NextResponse.json({ ok: true, result })
  } catch (error: unknown) {
    const message = errorMessage(error, 'refresh failed')
    console.error('[featured:refresh] cron refresh failed', error)
    await logCronRun({
      name: CRON_NAME,
      status: 'failure',
      startedAt,
      finishedAt: new Date(),
      triggeredBy,
      error: message,
      details: { poolSize: backend.store.size },
    })
    const status = error instanceof UpstreamError ? 502 : 500
    return NextResponse.json({ error: message }, { status })
  }
}
