import { NextResponse } from 'next/server'
import { readAdminKey } from '@/lib/config'

/** Returns an error response when the request does not carry the admin key. */
export function requireAdminKey(req: Request): NextResponse | null {
  const expectedKey = readAdminKey()
  if (!expectedKey) return NextResponse.json({ error: 'missing ADMIN_KEY' }, { status: 500 })

  const url = new URL(req.url)
  const providedKey = (req.headers.get('x-admin-key') || url.searchParams.get('key') || '').trim()
  if (providedKey !== expectedKey) {
    return NextResponse.json({ error: 'Unauthorized' }, { status: 401 })
  }
  return null
}
