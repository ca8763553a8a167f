import 'dotenv/config'
import { eq } from 'drizzle-orm'
import { db, pairingSessions, pool, sessionParticipants } from '../src/index.js'

const DEMO_SESSION_ID = 'session_demo_team_event'
const DEMO_PASSWORD_HASH_NOTE = 'seeded-without-credentials'

const DEMO_ROSTER = ['Alice', 'Bob', 'Charlie', 'Diana'] as const

/**
 * Seeds a demo session so local API surfaces have something to show.
 *
 * Seeded participants cannot log in (their hash is a marker, not a scrypt
 * hash); create real sessions through `POST /api/v1/sessions`.
 */
async function seed() {
  await db
    .insert(pairingSessions)
    .values({ id: DEMO_SESSION_ID, name: 'Team Event (demo)' })
    .onConflictDoUpdate({
      target: pairingSessions.id,
      set: { name: 'Team Event (demo)', isActive: true },
    })

  await db.delete(sessionParticipants).where(eq(sessionParticipants.sessionId, DEMO_SESSION_ID))

  await db.insert(sessionParticipants).values(
    DEMO_ROSTER.map((username, position) => ({
      sessionId: DEMO_SESSION_ID,
      username,
      passwordHash: DEMO_PASSWORD_HASH_NOTE,
      position,
    })),
  )

  console.log(`Seeded ${DEMO_ROSTER.length} participants into ${DEMO_SESSION_ID}.`)
}

seed()
  .catch((error: unknown) => {
    console.error('Seed failed:', error)
    process.exitCode = 1
  })
  .finally(() => pool.end())
