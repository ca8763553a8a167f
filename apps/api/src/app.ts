import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { createLogger } from './lib/logger.js'
import { requestId } from './middleware/request-id.js'
import { createCoreApiRoutes } from './routes/core-api.js'
import { fail } from './routes/_api.js'
import { PairingSessionService } from './services/pairing-sessions.js'
import type { PairingStore } from './services/pairing-store.js'

const log = createLogger('api')

export type AppOptions = {
  store: PairingStore
  corsOrigin?: string
}

export function createApp(options: AppOptions) {
  const sessions = new PairingSessionService(options.store)
  const app = new Hono()

  app.use('/*', cors({ origin: options.corsOrigin ?? '*' }))
  app.use('/*', requestId)

  app.route('/api/v1', createCoreApiRoutes(sessions))

  app.onError((err, c) => {
    log.error(`unhandled: ${err.message}`, { path: c.req.path, requestId: c.get('requestId') })
    return fail(c, 'INTERNAL_ERROR', 'Internal server error', 500)
  })

  app.notFound((c) => {
    return fail(c, 'NOT_FOUND', 'Route not found', 404)
  })

  return app
}
