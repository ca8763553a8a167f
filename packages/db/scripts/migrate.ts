import 'dotenv/config'
import { fileURLToPath } from 'node:url'
import { migrate } from 'drizzle-orm/node-postgres/migrator'
import { db, pool } from '../src/index.js'

// drizzle-kit writes here (`npm run db:generate`); resolved from this file so
// the script works from the repo root as well as from packages/db.
const migrationsFolder = fileURLToPath(new URL('../migrations', import.meta.url))

async function applyPairingMigrations() {
  try {
    await migrate(db, { migrationsFolder })
    console.log(`Pairing schema is up to date (${migrationsFolder}).`)
  } finally {
    await pool.end()
  }
}

applyPairingMigrations().catch((error: unknown) => {
  console.error('Pairing schema migration failed:', error)
  process.exit(1)
})
