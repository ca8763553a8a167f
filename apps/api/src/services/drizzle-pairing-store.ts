/**
 * Postgres-backed `PairingStore` on top of `@pairup/db`.
 *
 * Only the table objects are imported at runtime; the connected `db` is
 * injected so this module loads without `DATABASE_URL`.
 */

import { and, asc, eq, sql } from 'drizzle-orm'
import type { PairupDatabase } from '@pairup/db'
import { directedRatings, pairingSessions, sessionParticipants } from '@pairup/db/schema'
import type { PairingSession } from '@pairup/db/schema'
import { PAIRING_ERROR_CODES, PairingError } from '../lib/errors.js'
import { toRatingMatrix, type RatingMatrix } from './pairing-engine.js'
import type {
  NewRosterEntry,
  PairingSessionRecord,
  PairingStore,
  ParticipantRecord,
  RosterEntry,
  SubmissionCounts,
} from './pairing-store.js'

const PG_UNIQUE_VIOLATION = '23505'

/** Walks the `cause` chain since drivers and ORMs wrap the pg error differently. */
export function isUniqueViolation(error: unknown): boolean {
  let current: unknown = error
  for (let depth = 0; depth < 4; depth += 1) {
    if (typeof current !== 'object' || current === null) {
      return false
    }
    if ('code' in current && current.code === PG_UNIQUE_VIOLATION) {
      return true
    }
    current = 'cause' in current ? current.cause : undefined
  }
  return false
}

function toSessionRecord(row: PairingSession): PairingSessionRecord {
  return {
    id: row.id,
    name: row.name,
    isActive: row.isActive,
    createdAt: row.createdAt,
  }
}

export class DrizzlePairingStore implements PairingStore {
  constructor(private readonly db: PairupDatabase) {}

  async createSession(input: { name: string; roster: NewRosterEntry[] }): Promise<PairingSessionRecord> {
    try {
      return await this.db.transaction(async (tx) => {
        const [session] = await tx.insert(pairingSessions).values({ name: input.name }).returning()
        if (!session) {
          throw new Error('Session insert returned no row')
        }

        await tx.insert(sessionParticipants).values(
          input.roster.map((entry, position) => ({
            sessionId: session.id,
            username: entry.username,
            passwordHash: entry.passwordHash,
            position,
          })),
        )

        return toSessionRecord(session)
      })
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new PairingError(PAIRING_ERROR_CODES.CONFLICT, 'Usernames must be unique within a session', {
          cause: error,
        })
      }
      throw error
    }
  }

  async findSession(sessionId: string): Promise<PairingSessionRecord | null> {
    const [row] = await this.db
      .select()
      .from(pairingSessions)
      .where(eq(pairingSessions.id, sessionId))
      .limit(1)

    return row ? toSessionRecord(row) : null
  }

  async loadRoster(sessionId: string): Promise<RosterEntry[]> {
    return this.db
      .select({
        username: sessionParticipants.username,
        hasSubmitted: sessionParticipants.hasSubmitted,
      })
      .from(sessionParticipants)
      .where(eq(sessionParticipants.sessionId, sessionId))
      .orderBy(asc(sessionParticipants.position))
  }

  async findParticipant(sessionId: string, username: string): Promise<ParticipantRecord | null> {
    const [row] = await this.db
      .select({
        username: sessionParticipants.username,
        hasSubmitted: sessionParticipants.hasSubmitted,
        passwordHash: sessionParticipants.passwordHash,
      })
      .from(sessionParticipants)
      .where(and(eq(sessionParticipants.sessionId, sessionId), eq(sessionParticipants.username, username)))
      .limit(1)

    return row ?? null
  }

  async loadDirectedRatings(sessionId: string): Promise<RatingMatrix> {
    const rows = await this.db
      .select({
        fromUsername: directedRatings.fromUsername,
        toUsername: directedRatings.toUsername,
        score: directedRatings.score,
      })
      .from(directedRatings)
      .where(eq(directedRatings.sessionId, sessionId))

    return toRatingMatrix(rows)
  }

  async replaceRatings(sessionId: string, fromUser: string, ratings: ReadonlyMap<string, number>): Promise<void> {
    const participantWhere = and(
      eq(sessionParticipants.sessionId, sessionId),
      eq(sessionParticipants.username, fromUser),
    )

    await this.db.transaction(async (tx) => {
      // Row lock serializes concurrent resubmissions from the same participant.
      await tx.select({ id: sessionParticipants.id }).from(sessionParticipants).where(participantWhere).for('update')

      await tx
        .delete(directedRatings)
        .where(and(eq(directedRatings.sessionId, sessionId), eq(directedRatings.fromUsername, fromUser)))

      if (ratings.size > 0) {
        await tx.insert(directedRatings).values(
          Array.from(ratings, ([toUsername, score]) => ({
            sessionId,
            fromUsername: fromUser,
            toUsername,
            score,
          })),
        )
      }

      await tx.update(sessionParticipants).set({ hasSubmitted: true }).where(participantWhere)
    })
  }

  async submissionCounts(sessionId: string): Promise<SubmissionCounts> {
    const [row] = await this.db
      .select({
        total: sql<number>`count(*)`.mapWith(Number),
        submitted: sql<number>`count(*) filter (where ${sessionParticipants.hasSubmitted})`.mapWith(Number),
      })
      .from(sessionParticipants)
      .where(eq(sessionParticipants.sessionId, sessionId))

    return { submitted: row?.submitted ?? 0, total: row?.total ?? 0 }
  }
}
