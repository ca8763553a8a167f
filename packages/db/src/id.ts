import KSUID from 'ksuid'

/** Prefix per table, so an id says what it points at. */
export type IdTag = 'session' | 'participant' | 'rating'

/**
 * `session_2VfUX3bG0z3XSwhBgaBz0ZrXjdk`: tag, underscore, 27-char KSUID.
 *
 * Session ids double as the join token handed to participants, so they rely
 * on the 128-bit random KSUID payload being unguessable.
 */
export function generateId(tag: IdTag): string {
  return `${tag}_${KSUID.randomSync().string}`
}
