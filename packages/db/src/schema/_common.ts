import { text, timestamp } from 'drizzle-orm/pg-core'
import { generateId, type IdTag } from '../id.js'

/** Row creation timestamp (UTC timestamptz). */
export const createdAt = () => timestamp('created_at', { withTimezone: true }).defaultNow().notNull()

/** Text FK helper for tagged KSUID ids. */
export const idRef = (name: string) => text(name)

/** Primary key filled with a tagged KSUID on insert. */
export const idWithTag = (tag: IdTag) => idRef('id').primaryKey().$defaultFn(() => generateId(tag))
