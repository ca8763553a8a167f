/**
 * Session lifecycle around the pairing core: create a roster, let
 * participants log in, and compute results once the tracker allows it.
 */

import type { CreateSessionInput, PairingResults, PairingStrategy } from '@pairup/schema'
import { PAIRING_ERROR_CODES, PairingError } from '../lib/errors.js'
import { createLogger, type Logger } from '../lib/logger.js'
import { hashPassword, verifyPassword } from './credentials.js'
import { computePairingResults } from './pairing-engine.js'
import type { PairingStore } from './pairing-store.js'
import { SubmissionTracker } from './submission-tracker.js'

export type CreatedSession = {
  sessionId: string
  sessionName: string
  /** Plain credentials, returned once so the coordinator can hand them out. */
  users: Array<{ username: string; password: string }>
}

export type LoginResult = {
  sessionId: string
  username: string
  hasSubmitted: boolean
  otherUsers: string[]
}

function toRosterCredentials(input: CreateSessionInput): Array<{ username: string; password: string }> {
  if ('usernames' in input) {
    return input.usernames.map((username) => ({ username, password: input.password }))
  }
  return input.users.map((user) => ({ username: user.username, password: user.password }))
}

function findDuplicates(usernames: string[]): string[] {
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  for (const username of usernames) {
    if (seen.has(username)) {
      duplicates.add(username)
    }
    seen.add(username)
  }
  return [...duplicates]
}

export class PairingSessionService {
  readonly tracker: SubmissionTracker
  private readonly log: Logger

  constructor(
    private readonly store: PairingStore,
    options: { tracker?: SubmissionTracker; logger?: Logger } = {},
  ) {
    this.log = options.logger ?? createLogger('sessions')
    this.tracker = options.tracker ?? new SubmissionTracker(store, this.log)
  }

  async createSession(input: CreateSessionInput): Promise<CreatedSession> {
    const credentials = toRosterCredentials(input)
    if (credentials.length < 2) {
      throw new PairingError(PAIRING_ERROR_CODES.INVALID_INPUT, 'At least 2 users required')
    }

    const duplicates = findDuplicates(credentials.map((entry) => entry.username))
    if (duplicates.length > 0) {
      throw new PairingError(PAIRING_ERROR_CODES.CONFLICT, 'Usernames must be unique within a session', {
        details: { duplicates },
      })
    }

    const roster = await Promise.all(
      credentials.map(async (entry) => ({
        username: entry.username,
        passwordHash: await hashPassword(entry.password),
      })),
    )

    const session = await this.store.createSession({ name: input.sessionName, roster })
    this.log.info('session created', { sessionId: session.id, participants: roster.length })

    return {
      sessionId: session.id,
      sessionName: session.name,
      users: credentials,
    }
  }

  async login(sessionId: string, username: string, password: string): Promise<LoginResult> {
    const participant = await this.store.findParticipant(sessionId, username)
    const valid = participant ? await verifyPassword(password, participant.passwordHash) : false
    if (!participant || !valid) {
      throw new PairingError(PAIRING_ERROR_CODES.UNAUTHORIZED, 'Invalid credentials')
    }

    const roster = await this.store.loadRoster(sessionId)

    return {
      sessionId,
      username,
      hasSubmitted: participant.hasSubmitted,
      otherUsers: roster.map((entry) => entry.username).filter((name) => name !== username),
    }
  }

  /**
   * Recomputed from a fresh snapshot on every call. A resubmission after
   * results were shown is allowed and simply changes the next computation.
   */
  async computeResults(sessionId: string, strategy: PairingStrategy = 'greedy'): Promise<PairingResults> {
    await this.tracker.assertReadyForPairing(sessionId)

    const [roster, ratings] = await Promise.all([
      this.store.loadRoster(sessionId),
      this.store.loadDirectedRatings(sessionId),
    ])

    const results = computePairingResults(
      { people: roster.map((entry) => entry.username), ratings },
      { strategy },
    )

    this.log.info('results computed', {
      sessionId,
      strategy,
      numPairs: results.numPairs,
      averageCompatibility: results.averageCompatibility,
    })

    return results
  }
}
