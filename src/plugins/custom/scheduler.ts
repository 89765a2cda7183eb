import { SchedulerService } from '@services/scheduler.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    scheduler: SchedulerService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const scheduler = new SchedulerService(
      fastify.log.child({ plugin: 'scheduler' }),
    )
    fastify.decorate('scheduler', scheduler)

    // Jobs may still be registered when shutdown skipped the poller hook
    fastify.addHook('onClose', () => {
      scheduler.stop()
    })
  },
  {
    name: 'scheduler',
    dependencies: ['config'],
  },
)
