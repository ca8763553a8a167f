/**
 * Canonical API router.
 *
 * Route modules are split by audience (coordinator-facing session routes,
 * participant-facing routes) and share one session service.
 */

import { Hono } from 'hono'
import type { PairingSessionService } from '../services/pairing-sessions.js'
import { createParticipantRoutes } from './participants.js'
import { createSessionRoutes } from './sessions.js'
import { ok } from './_api.js'

export const API_VERSION = '0.1.0'

export function createCoreApiRoutes(sessions: PairingSessionService) {
  const coreApiRoutes = new Hono()

  coreApiRoutes.route('/', createSessionRoutes(sessions))
  coreApiRoutes.route('/', createParticipantRoutes(sessions))

  coreApiRoutes.get('/health', (c) => {
    return ok(c, {
      service: 'pairup-core-api',
      status: 'healthy',
      version: API_VERSION,
    })
  })

  return coreApiRoutes
}
