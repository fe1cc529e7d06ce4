import { UpstreamError } from '@/lib/errors'

export type Fetcher = (input: string | URL, init?: RequestInit) => Promise<Response>

export type FetchOptions = RequestInit & { timeoutMs?: number; fetcher?: Fetcher }

export const DEFAULT_INGEST_HEADERS: HeadersInit = {
  'User-Agent': 'FeaturedVideosBot/1.0',
  Accept: 'application/json',
}

function mergeHeaders(headers?: HeadersInit): Headers {
  const merged = new Headers(DEFAULT_INGEST_HEADERS)
  if (headers) {
    const extra = new Headers(headers)
    extra.forEach((value, key) => merged.set(key, value))
  }
  return merged
}

export async function fetchWithTimeout(
  input: string | URL,
  options: FetchOptions = {},
): Promise<Response> {
  const { timeoutMs = 10000, headers, signal, fetcher = fetch, ...rest } = options
  const controller = signal ? null : new AbortController()
  const timer = controller ? setTimeout(() => controller.abort(), timeoutMs) : null

  try {
    return await fetcher(input, {
      ...rest,
      headers: mergeHeaders(headers),
      signal: controller ? controller.signal : signal,
    })
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new UpstreamError(`request timed out after ${timeoutMs}ms`)
    }
    throw new UpstreamError(error instanceof Error ? error.message : 'request failed')
  } finally {
    if (timer) clearTimeout(timer)
  }
}

export async function fetchJson(url: string | URL, options: FetchOptions = {}): Promise<unknown> {
  const res = await fetchWithTimeout(url, options)
  if (!res.ok) {
    const body = await res.text().catch(() => '')
    throw new UpstreamError(`HTTP ${res.status}${body ? `: ${body.slice(0, 200)}` : ''}`, res.status)
  }
  try {
    return await res.json()
  } catch {
    throw new UpstreamError('invalid JSON body', res.status)
  }
}
