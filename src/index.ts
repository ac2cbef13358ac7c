import { createApp } from './app.js'
import { env } from './config.js'
import { logger } from './lib/logger.js'
import { createSdamGiaClient } from './services/sdamgiaService.js'

const client = createSdamGiaClient()
const app = createApp(client, env.corsOrigins)

const server = app.listen(env.port, env.serverHost, () => {
  logger.info(
    { examType: client.scope.examType, subject: client.scope.subject },
    `Server listening on http://${env.serverHost}:${env.port}`,
  )
})

const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, 'Shutting down')
  client.close()
  server.close((error) => {
    if (error) {
      logger.error({ err: error }, 'Server did not close cleanly')
      process.exit(1)
    }
    process.exit(0)
  })
}

process.once('SIGINT', shutdown)
process.once('SIGTERM', shutdown)
