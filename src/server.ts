import closeWithGrace from 'close-with-grace'
import Fastify from 'fastify'
import fp from 'fastify-plugin'
import serviceApp from './app.js'
import { createLoggerConfig, validLogLevels } from '@utils/logger.js'

/**
 * Starts the server on the configured listen address with graceful shutdown.
 *
 * Startup failures (bad configuration, unreachable database, failed
 * migration) are logged and end the process with a non-zero exit code.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    pluginTimeout: 60000,
    forceCloseConnections: true,
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

  await app.listen({
    port: app.config.listen.port,
    host: app.config.listen.host,
  })
}

init().catch((err: unknown) => {
  console.error('Failed to start server:', err)
  process.exitCode = 1
})
