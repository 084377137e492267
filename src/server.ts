import Fastify from 'fastify'
import fp from 'fastify-plugin'
import closeWithGrace from 'close-with-grace'
import serviceApp from './app.js'
import { createLoggerConfig } from '@utils/logger.js'

/**
 * Starts the mirror: builds the Fastify app, applies the configured log
 * level and closes everything gracefully on shutdown signals.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    pluginTimeout: 60000,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  app.log.level = app.config.logLevel

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
  console.error('Failed to start server:', err)
  process.exit(1)
})
