import { getDb, isDbConfigured } from '@/lib/db'

export type CronStatus = 'success' | 'failure' | 'skipped'
export type CronTrigger = 'cron' | 'manual' | 'unknown'

const cronCollection = () => process.env.REPORT_CRON_COLLECTION || 'cron_runs'

export type CronRunEntry = {
  name: string
  status: CronStatus
  startedAt: Date
  finishedAt: Date
  triggeredBy?: CronTrigger
  durationMs?: number
  details?: Record<string, unknown>
  error?: string | null
}

function safeDetails(details: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {}
  const entries = Object.entries(details)
  for (const [key, value] of entries.slice(0, 20)) {
    if (typeof value === 'object' && value !== null) {
      try {
        result[key] = JSON.parse(JSON.stringify(value))
      } catch {
        result[key] = String(value)
      }
    } else {
      result[key] = value
    }
  }
  if (entries.length > 20) result._truncated = entries.length - 20
  return result
}

export function buildCronDocument(entry: CronRunEntry, now: Date = new Date()): Record<string, unknown> {
  const doc: Record<string, unknown> = {
    name: entry.name,
    status: entry.status,
    startedAt: entry.startedAt,
    finishedAt: entry.finishedAt,
    durationMs: entry.durationMs ?? Math.max(0, entry.finishedAt.getTime() - entry.startedAt.getTime()),
    triggeredBy: entry.triggeredBy || 'unknown',
    createdAt: now,
  }
  if (entry.details) doc.details = safeDetails(entry.details)
  if (entry.error) doc.error = entry.error
  return doc
}

/** Records a cron run. Never throws: a failed write is only logged. */
export async function logCronRun(entry: CronRunEntry): Promise<void> {
  if (!isDbConfigured()) {
    console.info('[cron]', entry.name, entry.status, entry.error ?? '')
    return
  }
  try {
    const db = await getDb()
    await db.collection(cronCollection()).insertOne(buildCronDocument(entry))
  } catch (error) {
    console.error('[cron] logCronRun failed', error)
  }
}
