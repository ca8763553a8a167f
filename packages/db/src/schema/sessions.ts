import { boolean, index, integer, pgTable, uniqueIndex, varchar } from 'drizzle-orm/pg-core'
import { createdAt, idRef, idWithTag } from './_common.js'

/**
 * pairing_sessions
 *
 * One pairing event. The id is handed to participants as the join token.
 */
export const pairingSessions = pgTable('pairing_sessions', {
  id: idWithTag('session'),

  /** Display name chosen by the coordinator. */
  name: varchar('name', { length: 255 }).notNull(),

  /** Stored for operators; pairing never reads it. */
  isActive: boolean('is_active').default(true).notNull(),

  createdAt: createdAt(),
})

/**
 * session_participants
 *
 * Roster of a session. Usernames are unique per session only, so the same
 * name can join many sessions as different participants.
 */
export const sessionParticipants = pgTable('session_participants', {
  id: idWithTag('participant'),

  sessionId: idRef('session_id')
    .notNull()
    .references(() => pairingSessions.id, { onDelete: 'cascade' }),

  username: varchar('username', { length: 100 }).notNull(),

  /** scrypt hash; see `apps/api/src/services/credentials.ts`. */
  passwordHash: varchar('password_hash', { length: 255 }).notNull(),

  /** Flips to true on the first accepted rating row and never back. */
  hasSubmitted: boolean('has_submitted').default(false).notNull(),

  /** Order the coordinator listed the roster in. */
  position: integer('position').notNull(),

  createdAt: createdAt(),
}, (table) => ({
  sessionParticipantsUsernameUnique: uniqueIndex('session_participants_session_username_unique').on(
    table.sessionId,
    table.username,
  ),
  sessionParticipantsSubmittedIdx: index('session_participants_session_submitted_idx').on(
    table.sessionId,
    table.hasSubmitted,
  ),
}))

export type PairingSession = typeof pairingSessions.$inferSelect
