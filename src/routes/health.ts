import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: HealthCheckResponse
  }>(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Reports database connectivity and whether background jobs are running. Used by container health checks.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      const timestamp = new Date().toISOString()
      const dbStatus = (await fastify.db.ping()) ? 'ok' : 'failed'
      const schedulerStatus = fastify.scheduler.isRunning ? 'ok' : 'stopped'

      let targets = 0
      if (dbStatus === 'ok') {
        try {
          targets = await fastify.db.countTargets()
        } catch (error) {
          fastify.log.error({ error }, 'Health check failed to count targets')
        }
      } else {
        fastify.log.error('Health check failed: database connectivity error')
      }

      const isHealthy = dbStatus === 'ok' && schedulerStatus === 'ok'

      return reply.status(isHealthy ? 200 : 503).send({
        status: isHealthy ? 'healthy' : 'unhealthy',
        timestamp,
        checks: {
          database: dbStatus,
          scheduler: schedulerStatus,
        },
        targets,
      })
    },
  )
}

export default plugin
