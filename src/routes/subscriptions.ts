import { randomBytes } from 'node:crypto'
import {
  ErrorSchema,
  IdParamsSchema,
} from '@schemas/common/error.schema.js'
import {
  type CreateSubscriptionBody,
  type CreateSubscriptionResponse,
  CreateSubscriptionResponseSchema,
  CreateSubscriptionSchema,
} from '@schemas/subscriptions/subscriptions.schema.js'
import type { FastifyPluginAsync } from 'fastify'
import type { z } from 'zod'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.post<{
    Body: CreateSubscriptionBody
    Reply: CreateSubscriptionResponse
  }>(
    '/subscriptions',
    {
      schema: {
        summary: 'Create subscription',
        operationId: 'createSubscription',
        description:
          'Deliver new notifications of a target to an endpoint. A signing secret is generated when none is given and is only returned here.',
        body: CreateSubscriptionSchema,
        response: {
          201: CreateSubscriptionResponseSchema,
          400: ErrorSchema,
          404: ErrorSchema,
        },
        tags: ['Subscriptions'],
      },
    },
    async (request, reply) => {
      const { targetId, endpoint } = request.body
      const target = await fastify.db.getTarget(targetId)
      if (!target) {
        return reply.notFound('Target not found')
      }

      const secret = request.body.secret ?? randomBytes(32).toString('hex')
      const subscription = await fastify.db.createSubscription({
        target_id: targetId,
        endpoint,
        secret,
      })
      request.log.info(
        { subscriptionId: subscription.id, targetId },
        'Subscription created',
      )

      return reply.status(201).send({
        success: true,
        subscription: {
          id: subscription.id,
          targetId: subscription.target_id,
          endpoint: subscription.endpoint,
          secret: subscription.secret,
          createdAt: subscription.created_at,
        },
      })
    },
  )

  fastify.delete<{
    Params: z.infer<typeof IdParamsSchema>
  }>(
    '/subscriptions/:id',
    {
      schema: {
        summary: 'Delete subscription',
        operationId: 'deleteSubscription',
        description: 'Stop deliveries to an endpoint and drop its events.',
        params: IdParamsSchema,
        response: {
          404: ErrorSchema,
        },
        tags: ['Subscriptions'],
      },
    },
    async (request, reply) => {
      const deleted = await fastify.db.deleteSubscription(request.params.id)
      if (!deleted) {
        return reply.notFound('Subscription not found')
      }
      return reply.status(204).send()
    },
  )
}

export default plugin
