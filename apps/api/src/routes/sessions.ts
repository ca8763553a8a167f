/**
 * Session routes: creation, submission status and pairing results.
 */

import { Hono } from 'hono'
import { createSessionSchema, resultsQuerySchema } from '@pairup/schema'
import type { PairingSessionService } from '../services/pairing-sessions.js'
import { fail, failWithError, ok, readJsonBody } from './_api.js'

export function createSessionRoutes(sessions: PairingSessionService) {
  const sessionRoutes = new Hono()

  sessionRoutes.post('/sessions', async (c) => {
    const parsed = createSessionSchema.safeParse(await readJsonBody(c))
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid request body.', 400, parsed.error.flatten())
    }

    try {
      const created = await sessions.createSession(parsed.data)
      return ok(c, created, 201)
    } catch (error) {
      return failWithError(c, error)
    }
  })

  sessionRoutes.get('/sessions/:sessionId/status', async (c) => {
    try {
      return ok(c, await sessions.tracker.status(c.req.param('sessionId')))
    } catch (error) {
      return failWithError(c, error)
    }
  })

  sessionRoutes.get('/sessions/:sessionId/results', async (c) => {
    const parsed = resultsQuerySchema.safeParse(c.req.query())
    if (!parsed.success) {
      return fail(c, 'VALIDATION_ERROR', 'Invalid query parameters.', 400, parsed.error.flatten())
    }

    try {
      return ok(c, await sessions.computeResults(c.req.param('sessionId'), parsed.data.strategy))
    } catch (error) {
      return failWithError(c, error)
    }
  })

  return sessionRoutes
}
