// lib/db.ts
import { MongoClient, type Db } from 'mongodb'
import { readMongoDbName, readMongoUri } from '@/lib/config'
import { ConfigurationError } from '@/lib/errors'

declare global {
  // eslint-disable-next-line no-var
  var _mongoClientPromise: Promise<MongoClient> | undefined
}

export function isDbConfigured(): boolean {
  return readMongoUri() !== null
}

function connect(): Promise<MongoClient> {
  const uri = readMongoUri()
  if (!uri) throw new ConfigurationError('Missing MONGO_URI / MONGODB_URI')
  // reused across hot reloads in development
  const existing = global._mongoClientPromise
  if (existing) return existing
  const promise = new MongoClient(uri).connect()
  global._mongoClientPromise = promise
  promise.catch(() => {
    if (global._mongoClientPromise === promise) global._mongoClientPromise = undefined
  })
  return promise
}

export async function getDb(dbName?: string): Promise<Db> {
  const client = await connect()
  return client.db(dbName ?? readMongoDbName())
}

export async function closeDb(): Promise<void> {
  const pending = global._mongoClientPromise
  if (!pending) return
  global._mongoClientPromise = undefined
  const client = await pending
  await client.close()
}
