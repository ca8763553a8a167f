import type { RatingMatrix } from './pairing-engine.js'

export type PairingSessionRecord = {
  id: string
  name: string
  isActive: boolean
  createdAt: Date
}

export type RosterEntry = {
  username: string
  hasSubmitted: boolean
}

export type ParticipantRecord = RosterEntry & {
  passwordHash: string
}

export type NewRosterEntry = {
  username: string
  passwordHash: string
}

export type SubmissionCounts = {
  submitted: number
  total: number
}

/**
 * Persistence seam for the pairing core.
 *
 * Implementations own atomicity: `createSession` writes the session and its
 * roster as one unit, and `replaceRatings` swaps a rater's rows and flips
 * their submitted flag as one unit, so no reader sees the flag set with a
 * partial rating set.
 */
export interface PairingStore {
  createSession(input: { name: string; roster: NewRosterEntry[] }): Promise<PairingSessionRecord>
  findSession(sessionId: string): Promise<PairingSessionRecord | null>
  /** Roster in the order it was created. */
  loadRoster(sessionId: string): Promise<RosterEntry[]>
  findParticipant(sessionId: string, username: string): Promise<ParticipantRecord | null>
  loadDirectedRatings(sessionId: string): Promise<RatingMatrix>
  /** Full replace of `fromUser`'s ratings plus marking them submitted. */
  replaceRatings(sessionId: string, fromUser: string, ratings: ReadonlyMap<string, number>): Promise<void>
  submissionCounts(sessionId: string): Promise<SubmissionCounts>
}
