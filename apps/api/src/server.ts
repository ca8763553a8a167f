import 'dotenv/config'
import { serve } from '@hono/node-server'
import { db, pool } from '@pairup/db'
import { createApp } from './app.js'
import { loadConfig } from './config.js'
import { createLogger } from './lib/logger.js'
import { DrizzlePairingStore } from './services/drizzle-pairing-store.js'

const config = loadConfig()
process.env.LOG_LEVEL = config.LOG_LEVEL

const log = createLogger('server')

const app = createApp({
  store: new DrizzlePairingStore(db),
  corsOrigin: config.CORS_ORIGIN,
})

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  },
  (info) => {
    log.info(`pairup API listening on http://${config.HOST}:${info.port}/api/v1`)
  },
)

function shutdown(signal: string) {
  log.info(`received ${signal}, shutting down`)
  server.close(() => {
    pool
      .end()
      .catch((error: unknown) => {
        log.error('failed to close database pool', { error: String(error) })
        process.exitCode = 1
      })
      .finally(() => process.exit())
  })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
