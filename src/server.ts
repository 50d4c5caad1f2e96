import { createLoggerConfig, validLogLevels } from '@utils/logger.js'
import closeWithGrace from 'close-with-grace'
import Fastify from 'fastify'
import fp from 'fastify-plugin'
import serviceApp from './app.js'

/**
 * Starts the HTTP server with file/terminal logging and graceful shutdown.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    pluginTimeout: 60000,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  const configLogLevel = app.config.logLevel
  if (validLogLevels.includes(configLogLevel)) {
    app.log.level = configLogLevel
  }

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err }) => {
      if (err != null) {
        app.log.error(err)
      }
      await app.close()
    },
  )

  try {
    await app.listen({
      port: app.config.port,
      host: '0.0.0.0',
    })
  } catch (err) {
    app.log.error(err)
    process.exit(1)
  }
}

init().catch((err) => {
  console.error('Failed to start server', err)
  process.exit(1)
})
