import { PAIRING_ERROR_CODES, PairingError } from '../../../lib/errors.js'
import type { RatingMatrix } from '../../pairing-engine.js'
import type {
  NewRosterEntry,
  PairingSessionRecord,
  PairingStore,
  ParticipantRecord,
  RosterEntry,
  SubmissionCounts,
} from '../../pairing-store.js'

type StoredSession = {
  record: PairingSessionRecord
  participants: ParticipantRecord[]
  ratings: Map<string, Map<string, number>>
}

/**
 * In-process stand-in for the Postgres store. Each method runs to completion
 * without awaiting, which gives the same all-or-nothing view the
 * transactions give in `DrizzlePairingStore`.
 */
export class MemoryPairingStore implements PairingStore {
  private readonly sessions = new Map<string, StoredSession>()
  private nextId = 1

  async createSession(input: { name: string; roster: NewRosterEntry[] }): Promise<PairingSessionRecord> {
    const usernames = new Set(input.roster.map((entry) => entry.username))
    if (usernames.size !== input.roster.length) {
      throw new PairingError(PAIRING_ERROR_CODES.CONFLICT, 'Usernames must be unique within a session')
    }

    const record: PairingSessionRecord = {
      id: `session_test_${this.nextId}`,
      name: input.name,
      isActive: true,
      createdAt: new Date('2026-01-01T00:00:00.000Z'),
    }
    this.nextId += 1

    this.sessions.set(record.id, {
      record,
      participants: input.roster.map((entry) => ({
        username: entry.username,
        passwordHash: entry.passwordHash,
        hasSubmitted: false,
      })),
      ratings: new Map(),
    })

    return { ...record }
  }

  async findSession(sessionId: string): Promise<PairingSessionRecord | null> {
    const stored = this.sessions.get(sessionId)
    return stored ? { ...stored.record } : null
  }

  async loadRoster(sessionId: string): Promise<RosterEntry[]> {
    const stored = this.sessions.get(sessionId)
    return (stored?.participants ?? []).map((entry) => ({
      username: entry.username,
      hasSubmitted: entry.hasSubmitted,
    }))
  }

  async findParticipant(sessionId: string, username: string): Promise<ParticipantRecord | null> {
    const participant = this.sessions.get(sessionId)?.participants.find((entry) => entry.username === username)
    return participant ? { ...participant } : null
  }

  async loadDirectedRatings(sessionId: string): Promise<RatingMatrix> {
    const stored = this.sessions.get(sessionId)
    const copy = new Map<string, Map<string, number>>()
    for (const [from, targets] of stored?.ratings ?? []) {
      copy.set(from, new Map(targets))
    }
    return copy
  }

  async replaceRatings(sessionId: string, fromUser: string, ratings: ReadonlyMap<string, number>): Promise<void> {
    const stored = this.sessions.get(sessionId)
    if (!stored) {
      return
    }
    stored.ratings.set(fromUser, new Map(ratings))
    for (const participant of stored.participants) {
      if (participant.username === fromUser) {
        participant.hasSubmitted = true
      }
    }
  }

  async submissionCounts(sessionId: string): Promise<SubmissionCounts> {
    const participants = this.sessions.get(sessionId)?.participants ?? []
    return {
      submitted: participants.filter((entry) => entry.hasSubmitted).length,
      total: participants.length,
    }
  }
}
