import {
  ErrorSchema,
  IdParamsSchema,
} from '@schemas/common/error.schema.js'
import {
  type CreateTargetBody,
  type CreateTargetResponse,
  CreateTargetResponseSchema,
  CreateTargetSchema,
} from '@schemas/targets/targets.schema.js'
import { toTargetResponse } from '@utils/api-serializers.js'
import type { FastifyPluginAsync } from 'fastify'
import type { z } from 'zod'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.post<{
    Body: CreateTargetBody
    Reply: CreateTargetResponse
  }>(
    '/targets',
    {
      config: {
        rateLimit: {
          max: fastify.config.registerRateLimit,
          timeWindow: '1 hour',
        },
      },
      schema: {
        summary: 'Register target',
        operationId: 'createTarget',
        description:
          'Start polling an account. Registering a known handle replaces its credentials and keeps its cursor.',
        body: CreateTargetSchema,
        response: {
          200: CreateTargetResponseSchema,
          201: CreateTargetResponseSchema,
          400: ErrorSchema,
        },
        tags: ['Targets'],
      },
    },
    async (request, reply) => {
      const { handle, authToken, csrfToken } = request.body
      const { target, created } = await fastify.db.upsertTarget({
        handle,
        auth_token: authToken,
        csrf_token: csrfToken,
      })

      fastify.pollScheduler.addTarget(target)
      request.log.info(
        { targetId: target.id, created },
        created ? 'Target registered' : 'Target credentials updated',
      )

      return reply.status(created ? 201 : 200).send({
        success: true,
        created,
        target: toTargetResponse(target),
      })
    },
  )

  fastify.delete<{
    Params: z.infer<typeof IdParamsSchema>
  }>(
    '/targets/:id',
    {
      config: {
        rateLimit: {
          max: fastify.config.unregisterRateLimit,
          timeWindow: '1 hour',
        },
      },
      schema: {
        summary: 'Remove target',
        operationId: 'deleteTarget',
        description:
          'Stop polling an account. Its subscriptions and their events are deleted with it.',
        params: IdParamsSchema,
        response: {
          404: ErrorSchema,
        },
        tags: ['Targets'],
      },
    },
    async (request, reply) => {
      const { id } = request.params
      const deleted = await fastify.db.deleteTarget(id)
      if (!deleted) {
        return reply.notFound('Target not found')
      }

      fastify.pollScheduler.removeTarget(id)
      request.log.info({ targetId: id }, 'Target removed')
      return reply.status(204).send()
    },
  )
}

export default plugin
