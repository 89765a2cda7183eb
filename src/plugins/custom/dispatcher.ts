import { NotificationDispatcherService } from '@services/notification-dispatcher.service.js'
import { createSubscriberSender } from '@services/notifications/channels/subscriber-push.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    dispatcher: NotificationDispatcherService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const log = fastify.log.child({ plugin: 'dispatcher' })
    const { config } = fastify

    const dispatcher = new NotificationDispatcherService(
      fastify.db,
      createSubscriberSender({ timeoutMs: config.dispatchTimeoutMs, log }),
      {
        concurrency: config.dispatchConcurrency,
        maxAttempts: config.dispatchMaxAttempts,
        baseDelayMs: config.dispatchBaseDelayMs,
        maxDelayMs: config.dispatchMaxDelayMs,
      },
      log,
    )
    fastify.decorate('dispatcher', dispatcher)

    fastify.addHook('onReady', async () => {
      if (!config.dispatchEnabled) {
        fastify.log.info('Notification dispatch disabled')
        return
      }

      dispatcher.start()
      // Picks up retries whose backoff has elapsed and events left by a restart
      fastify.scheduler.scheduleIntervalJob(
        'dispatch-sweep',
        config.dispatchSweepSeconds * 1000,
        async () => {
          dispatcher.wake()
        },
      )
      fastify.log.info('Notification dispatcher started')
    })
  },
  {
    name: 'dispatcher',
    dependencies: ['config', 'database', 'scheduler'],
  },
)
