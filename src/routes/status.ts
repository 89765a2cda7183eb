import {
  ErrorSchema,
  IdParamsSchema,
} from '@schemas/common/error.schema.js'
import {
  type EventsQuery,
  EventsQuerySchema,
  type EventsResponse,
  EventsResponseSchema,
  type NotificationEventResponse,
  NotificationEventSchema,
  type StatusResponse,
  StatusResponseSchema,
} from '@schemas/status/status.schema.js'
import { toEventResponse } from '@utils/api-serializers.js'
import { serializeDate } from '@utils/date-serializer.js'
import type { FastifyPluginAsync } from 'fastify'
import type { z } from 'zod'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: StatusResponse
  }>(
    '/status',
    {
      schema: {
        summary: 'Service status',
        operationId: 'getStatus',
        description:
          'Per-target poll state and subscription counts, event counts by delivery status, pool statistics and recurring jobs.',
        response: {
          200: StatusResponseSchema,
        },
        tags: ['Status'],
      },
    },
    async () => {
      const [targets, events] = await Promise.all([
        fastify.db.getAllTargets(),
        fastify.db.countNotificationEventsByStatus(),
      ])

      const targetStatus = await Promise.all(
        targets.map(async (target) => {
          const state = fastify.pollScheduler.getState(target.id)
          return {
            id: target.id,
            handle: target.handle,
            cursor: target.cursor,
            lastPolledAt: serializeDate(target.last_polled_at),
            nextPollAt: serializeDate(target.next_poll_at),
            consecutiveFailures: target.consecutive_failures,
            lastError: target.last_error,
            seenItems: await fastify.db.countSeenItems(target.id),
            subscriptions: (
              await fastify.db.getSubscriptionsForTarget(target.id)
            ).length,
            inFlight: state?.inFlight ?? false,
          }
        }),
      )

      const token = fastify.tokens.describe()
      const jobs = fastify.scheduler.getActiveJobs().flatMap((name) => {
        const info = fastify.scheduler.getJobInfo(name)
        return info
          ? [{ name, ...info, lastRunAt: serializeDate(info.lastRunAt) }]
          : []
      })

      return {
        targets: targetStatus,
        events,
        poller: fastify.pollScheduler.stats(),
        dispatcher: fastify.dispatcher.stats(),
        token: {
          version: token.version,
          cached: token.cached,
          fetchedAt: serializeDate(token.fetchedAt),
          expiresAt: serializeDate(token.expiresAt),
        },
        jobs,
      }
    },
  )

  fastify.get<{
    Querystring: EventsQuery
    Reply: EventsResponse
  }>(
    '/status/events',
    {
      schema: {
        summary: 'List notification events',
        operationId: 'listNotificationEvents',
        description:
          'Delivery status of notification events, newest first. Failed events stay listed after their last attempt.',
        querystring: EventsQuerySchema,
        response: {
          200: EventsResponseSchema,
          400: ErrorSchema,
        },
        tags: ['Status'],
      },
    },
    async (request) => {
      const { status, subscriptionId, limit } = request.query
      const events = await fastify.db.listNotificationEvents({
        status,
        subscriptionId,
        limit,
      })
      return { events: events.map(toEventResponse) }
    },
  )

  fastify.get<{
    Params: z.infer<typeof IdParamsSchema>
    Reply: NotificationEventResponse
  }>(
    '/status/events/:id',
    {
      schema: {
        summary: 'Get notification event',
        operationId: 'getNotificationEvent',
        description: 'Delivery status of one notification event.',
        params: IdParamsSchema,
        response: {
          200: NotificationEventSchema,
          404: ErrorSchema,
        },
        tags: ['Status'],
      },
    },
    async (request, reply) => {
      const event = await fastify.db.getNotificationEvent(request.params.id)
      if (!event) {
        return reply.notFound('Notification event not found')
      }
      return toEventResponse(event)
    },
  )
}

export default plugin
