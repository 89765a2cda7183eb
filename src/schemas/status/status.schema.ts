import { NotificationPayloadSchema } from '@schemas/notifications/notification-payload.schema.js'
import { NOTIFICATION_EVENT_STATUSES } from '@root/types/notification-event.types.js'
import { z } from 'zod'

export const TargetStatusSchema = z.object({
  id: z.number().int(),
  handle: z.string(),
  cursor: z.string().nullable(),
  lastPolledAt: z.string().nullable(),
  nextPollAt: z.string().nullable(),
  consecutiveFailures: z.number().int(),
  lastError: z.string().nullable(),
  seenItems: z.number().int(),
  subscriptions: z.number().int(),
  inFlight: z.boolean(),
})

export const PollerStatsSchema = z.object({
  running: z.boolean(),
  tracked: z.number().int(),
  due: z.number().int(),
  inFlight: z.number().int(),
  maxConcurrent: z.number().int(),
  peakInFlight: z.number().int(),
  totalPolls: z.number().int(),
  totalFailures: z.number().int(),
})

export const DispatcherStatsSchema = z.object({
  running: z.boolean(),
  inFlight: z.number().int(),
  concurrency: z.number().int(),
  delivered: z.number().int(),
  retried: z.number().int(),
  failed: z.number().int(),
})

export const TokenStatusSchema = z.object({
  version: z.string(),
  cached: z.boolean(),
  fetchedAt: z.string().nullable(),
  expiresAt: z.string().nullable(),
})

export const JobStatusSchema = z.object({
  name: z.string(),
  intervalMs: z.number().int(),
  lastRunAt: z.string().nullable(),
  lastStatus: z.enum(['completed', 'failed']).nullable(),
  lastError: z.string().nullable(),
  runs: z.number().int(),
})

export const StatusResponseSchema = z.object({
  targets: z.array(TargetStatusSchema),
  events: z.object({
    pending: z.number().int(),
    delivered: z.number().int(),
    failed: z.number().int(),
  }),
  poller: PollerStatsSchema,
  dispatcher: DispatcherStatsSchema,
  token: TokenStatusSchema,
  jobs: z.array(JobStatusSchema),
})

export const EventStatusSchema = z.enum(NOTIFICATION_EVENT_STATUSES)

export const NotificationEventSchema = z.object({
  id: z.number().int(),
  subscriptionId: z.number().int(),
  targetId: z.number().int(),
  itemId: z.string(),
  status: EventStatusSchema,
  attempts: z.number().int(),
  nextRetryAt: z.string().nullable(),
  lastError: z.string().nullable(),
  deliveredAt: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  payload: NotificationPayloadSchema,
})

export const EventsQuerySchema = z.object({
  status: EventStatusSchema.optional(),
  subscriptionId: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
})

export const EventsResponseSchema = z.object({
  events: z.array(NotificationEventSchema),
})

export type StatusResponse = z.infer<typeof StatusResponseSchema>
export type NotificationEventResponse = z.infer<typeof NotificationEventSchema>
export type EventsQuery = z.infer<typeof EventsQuerySchema>
export type EventsResponse = z.infer<typeof EventsResponseSchema>
