/**
 * Submission tracking for a pairing session.
 *
 * Answers "how many of the roster have submitted" and gates pairing: results
 * may only be computed once every participant has submitted at least once.
 */

import type { SubmissionStatus } from '@pairup/schema'
import { PAIRING_ERROR_CODES, PairingError, sessionNotFound } from '../lib/errors.js'
import { createLogger, type Logger } from '../lib/logger.js'
import type { PairingStore, SubmissionCounts } from './pairing-store.js'

export const MIN_SCORE = 0
export const MAX_SCORE = 100

export type SubmissionReceipt = {
  submittedCount: number
  totalCount: number
  allSubmitted: boolean
}

export function isReady(counts: SubmissionCounts): boolean {
  return counts.total > 0 && counts.submitted === counts.total
}

/**
 * Drops self-ratings, targets outside the roster and scores that are not
 * integers in [0, 100]. Dropped entries are not errors; the rest of the
 * submission still counts.
 */
export function filterSubmittedRatings(
  submitter: string,
  ratings: Readonly<Record<string, number>>,
  roster: ReadonlySet<string>,
): Map<string, number> {
  const accepted = new Map<string, number>()
  for (const [target, score] of Object.entries(ratings)) {
    if (target === submitter || !roster.has(target)) continue
    if (!Number.isInteger(score) || score < MIN_SCORE || score > MAX_SCORE) continue
    accepted.set(target, score)
  }
  return accepted
}

export class SubmissionTracker {
  private readonly log: Logger

  constructor(
    private readonly store: PairingStore,
    logger: Logger = createLogger('submissions'),
  ) {
    this.log = logger
  }

  async recordSubmission(
    sessionId: string,
    username: string,
    ratings: Readonly<Record<string, number>>,
  ): Promise<SubmissionReceipt> {
    await this.requireSession(sessionId)

    if (Object.keys(ratings).length === 0) {
      throw new PairingError(PAIRING_ERROR_CODES.INVALID_INPUT, 'At least one rating is required')
    }

    const participant = await this.store.findParticipant(sessionId, username)
    if (!participant) {
      throw new PairingError(PAIRING_ERROR_CODES.NOT_FOUND, 'Participant not found in session', {
        details: { sessionId, username },
      })
    }

    const roster = await this.store.loadRoster(sessionId)
    const accepted = filterSubmittedRatings(
      username,
      ratings,
      new Set(roster.map((entry) => entry.username)),
    )
    await this.store.replaceRatings(sessionId, username, accepted)

    const counts = await this.store.submissionCounts(sessionId)
    this.log.info('ratings submitted', {
      sessionId,
      username,
      accepted: accepted.size,
      dropped: Object.keys(ratings).length - accepted.size,
      submitted: counts.submitted,
      total: counts.total,
    })

    return {
      submittedCount: counts.submitted,
      totalCount: counts.total,
      allSubmitted: isReady(counts),
    }
  }

  async status(sessionId: string): Promise<SubmissionStatus> {
    const session = await this.requireSession(sessionId)
    const roster = await this.store.loadRoster(sessionId)
    const submittedUsers = roster.filter((entry) => entry.hasSubmitted).length

    return {
      sessionId: session.id,
      sessionName: session.name,
      totalUsers: roster.length,
      submittedUsers,
      allSubmitted: isReady({ submitted: submittedUsers, total: roster.length }),
      users: roster.map((entry) => ({ username: entry.username, hasSubmitted: entry.hasSubmitted })),
    }
  }

  async isReadyForPairing(sessionId: string): Promise<boolean> {
    await this.requireSession(sessionId)
    return isReady(await this.store.submissionCounts(sessionId))
  }

  /** Throws NOT_READY with the current counts so callers can show progress. */
  async assertReadyForPairing(sessionId: string): Promise<void> {
    await this.requireSession(sessionId)
    const counts = await this.store.submissionCounts(sessionId)
    if (!isReady(counts)) {
      throw new PairingError(PAIRING_ERROR_CODES.NOT_READY, 'Not all preferences submitted', {
        details: counts,
      })
    }
  }

  private async requireSession(sessionId: string) {
    const session = await this.store.findSession(sessionId)
    if (!session) {
      throw sessionNotFound(sessionId)
    }
    return session
  }
}
