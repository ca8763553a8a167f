/**
 * Participant routes: login and rating submission.
 */

import { Hono } from 'hono'
import { loginSchema, submitRatingsSchema } from '@pairup/schema'
import type { PairingSessionService } from '../services/pairing-sessions.js'
import { fail, failWithError, ok, readJsonBody } from './_api.js'

export function createParticipantRoutes(sessions: PairingSessionService) {
  const participantRoutes = new Hono()

  participantRoutes.post('/sessions/:sessionId/login', async (c) => {
    const parsed = loginSchema.safeParse(await readJsonBody(c))
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid request body.', 400, parsed.error.flatten())
    }

    try {
      const result = await sessions.login(c.req.param('sessionId'), parsed.data.username, parsed.data.password)
      return ok(c, result)
    } catch (error) {
      return failWithError(c, error)
    }
  })

  participantRoutes.post('/sessions/:sessionId/ratings', async (c) => {
    const parsed = submitRatingsSchema.safeParse(await readJsonBody(c))
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid request body.', 400, parsed.error.flatten())
    }

    try {
      const receipt = await sessions.tracker.recordSubmission(
        c.req.param('sessionId'),
        parsed.data.username,
        parsed.data.ratings,
      )
      return ok(c, receipt)
    } catch (error) {
      return failWithError(c, error)
    }
  })

  return participantRoutes
}
