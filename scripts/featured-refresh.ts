// Run with: npx tsx scripts/featured-refresh.ts [--once]

import { pathToFileURL } from 'node:url'
import { closeDb } from '../lib/db'
import { getFeaturedBackend, resetFeaturedBackend } from '../lib/featured/services'

export async function runOnce(): Promise<void> {
  const backend = getFeaturedBackend()
  await backend.restore()
  const result = await backend.refresh()
  console.log(JSON.stringify({ result, poolSize: backend.store.size }, null, 2))
}

export async function runForever(): Promise<void> {
  const backend = getFeaturedBackend()
  await backend.start()
  console.info('[featured:refresh] runner started with', backend.store.size, 'videos')

  // the refresh timer is unref'd, so keep the process up until a signal arrives
  const keepAlive = setInterval(() => undefined, 1 << 30)
  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => resolve())
    process.once('SIGTERM', () => resolve())
  })
  clearInterval(keepAlive)
  resetFeaturedBackend()
}

async function main(argv: string[]): Promise<void> {
  try {
    if (argv.includes('--once')) await runOnce()
    else await runForever()
  } finally {
    await closeDb()
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    console.error('[featured:refresh] runner failed', error)
    process.exitCode = 1
  })
}
