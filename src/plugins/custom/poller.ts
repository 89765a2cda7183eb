import { PlatformClient } from '@services/platform/platform-client.js'
import { PollScheduler } from '@services/poller/poll-scheduler.js'
import { PollWorker } from '@services/poller/poll-worker.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    pollScheduler: PollScheduler
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const log = fastify.log.child({ plugin: 'poller' })
    const { config } = fastify

    const platform = new PlatformClient(
      {
        baseUrl: config.platformBaseUrl,
        bearerToken: config.platformBearerToken,
        badgePath: config.platformBadgePath,
        notificationsPath: config.platformNotificationsPath,
        requestTimeoutMs: config.platformRequestTimeoutMs,
        tokenHeaderName: config.tokenHeaderName,
      },
      fastify.tokens,
      log,
    )
    const worker = new PollWorker(
      platform,
      fastify.tokens,
      fastify.db,
      fastify.dispatcher,
      { badgeCheckEnabled: config.badgeCheckEnabled },
      log,
    )
    const pollScheduler = new PollScheduler(
      worker,
      fastify.db,
      {
        pollIntervalMs: config.pollInterval * 1000,
        maxConcurrent: config.maxConcurrent,
        jitterRatio: config.pollJitterRatio,
      },
      log,
    )
    fastify.decorate('pollScheduler', pollScheduler)

    fastify.addHook('onReady', async () => {
      if (!config.pollingEnabled) {
        fastify.log.info('Polling disabled')
        return
      }

      await pollScheduler.start()
      fastify.scheduler.scheduleIntervalJob(
        'poll-tick',
        config.schedulerTickMs,
        async () => {
          pollScheduler.tick()
        },
      )
    })

    // Polls stop first so nothing new is enqueued while deliveries drain
    fastify.addHook('preClose', async () => {
      fastify.scheduler.unscheduleJob('poll-tick')
      fastify.scheduler.unscheduleJob('dispatch-sweep')

      const polls = await pollScheduler.stop(config.pollShutdownTimeoutMs)
      if (!polls.completed) {
        fastify.log.warn(`Abandoned ${polls.abandoned} poll(s) at shutdown`)
      }

      if (config.dispatchEnabled) {
        const drained = await fastify.dispatcher.drain(
          config.dispatchDrainTimeoutMs,
        )
        fastify.log.info(
          drained,
          drained.completed
            ? 'Notification queue drained'
            : 'Drain deadline reached, pending events remain queued',
        )
      }

      fastify.scheduler.stop()
    })
  },
  {
    name: 'poller',
    dependencies: [
      'config',
      'database',
      'scheduler',
      'transaction-token',
      'dispatcher',
    ],
  },
)
