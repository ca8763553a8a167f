import { sql } from 'drizzle-orm'
import { check, index, integer, pgTable, timestamp, uniqueIndex, varchar } from 'drizzle-orm/pg-core'
import { idRef, idWithTag } from './_common.js'
import { pairingSessions } from './sessions.js'

/**
 * directed_ratings
 *
 * One participant's 0-100 score for another participant in the same session.
 * A resubmission deletes every row from that rater before inserting the new
 * set, so rows are only ever replaced wholesale per rater.
 */
export const directedRatings = pgTable(
  'directed_ratings',
  {
    id: idWithTag('rating'),

    sessionId: idRef('session_id')
      .notNull()
      .references(() => pairingSessions.id, { onDelete: 'cascade' }),

    fromUsername: varchar('from_username', { length: 100 }).notNull(),
    toUsername: varchar('to_username', { length: 100 }).notNull(),

    score: integer('score').notNull(),

    submittedAt: timestamp('submitted_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    directedRatingsPairUnique: uniqueIndex('directed_ratings_session_from_to_unique').on(
      table.sessionId,
      table.fromUsername,
      table.toUsername,
    ),
    directedRatingsSessionIdx: index('directed_ratings_session_idx').on(table.sessionId),
    directedRatingsScoreBoundsCheck: check(
      'directed_ratings_score_bounds_check',
      sql`${table.score} >= 0 AND ${table.score} <= 100`,
    ),
    directedRatingsNoSelfCheck: check(
      'directed_ratings_no_self_check',
      sql`${table.fromUsername} <> ${table.toUsername}`,
    ),
  }),
)
