import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres'
import { Pool } from 'pg'
import * as schema from './schema/index.js'

export * from './schema/index.js'
export { generateId, type IdTag } from './id.js'

export type PairupDatabase = NodePgDatabase<typeof schema>

const connectionString = process.env.DATABASE_URL

if (!connectionString) {
  throw new Error('DATABASE_URL is required to initialize @pairup/db')
}

export const pool = new Pool({ connectionString })
export const db: PairupDatabase = drizzle(pool, { schema })
