import { NotificationPayloadSchema } from '@root/schemas/notifications/notification-payload.schema.js'
import { PersistenceError } from '@root/types/errors.js'
import {
  NOTIFICATION_EVENT_STATUSES,
  type DueNotificationEvent,
  type NotificationEvent,
  type NotificationEventCounts,
  type NotificationEventFilter,
  type NotificationEventStatus,
} from '@root/types/notification-event.types.js'
import type {
  NotificationPayload,
  PlatformItem,
} from '@root/types/platform.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { buildNotificationPayload } from '@utils/notification-payload.js'

interface NotificationEventRow {
  id: number
  subscription_id: number
  target_id: number
  item_id: string
  payload: string
  status: NotificationEventStatus
  attempts: number
  next_retry_at: string | null
  last_error: string | null
  delivered_at: string | null
  created_at: string
  updated_at: string
}

interface DueNotificationEventRow extends NotificationEventRow {
  endpoint: string
  secret: string
}

const INSERT_CHUNK_SIZE = 100

function parsePayload(
  db: DatabaseService,
  row: NotificationEventRow,
): NotificationPayload {
  const parsed = NotificationPayloadSchema.safeParse(
    db.safeJsonParse(row.payload, 'notification_events.payload'),
  )
  if (parsed.success) return parsed.data

  db.log.warn({ eventId: row.id }, 'Malformed event payload, using fallback')
  return {
    title: 'New Notification',
    message: '',
    priority: 3,
    data: {
      url: null,
      notification_type: 'unknown',
      sort_index: row.item_id,
      target_id: row.target_id,
      from_users: [],
    },
  }
}

function mapEvent(
  db: DatabaseService,
  row: NotificationEventRow,
): NotificationEvent {
  return {
    id: row.id,
    subscription_id: row.subscription_id,
    target_id: row.target_id,
    item_id: row.item_id,
    payload: parsePayload(db, row),
    status: row.status,
    attempts: row.attempts,
    next_retry_at: db.toDate(row.next_retry_at),
    last_error: row.last_error,
    delivered_at: db.toDate(row.delivered_at),
    created_at: row.created_at,
    updated_at: row.updated_at,
  }
}

/**
 * Creates one pending event per (subscription of the target, item).
 *
 * Pairs that already have an event are skipped through the unique
 * (subscription_id, item_id) key, so replaying the same items is harmless.
 *
 * @returns Number of events actually created
 */
export async function createNotificationEvents(
  this: DatabaseService,
  targetId: number,
  items: PlatformItem[],
): Promise<number> {
  if (items.length === 0) return 0

  try {
    return await this.knex.transaction(async (trx) => {
      const subscriptions: Array<{ id: number }> = await trx('subscriptions')
        .where({ target_id: targetId })
        .select('id')
      if (subscriptions.length === 0) return 0

      const now = this.timestamp
      const rows = subscriptions.flatMap((subscription) =>
        items.map((item) => ({
          subscription_id: subscription.id,
          target_id: targetId,
          item_id: item.id,
          payload: JSON.stringify(buildNotificationPayload(targetId, item)),
          status: 'pending',
          attempts: 0,
          next_retry_at: null,
          created_at: now,
          updated_at: now,
        })),
      )

      let created = 0
      for (let i = 0; i < rows.length; i += INSERT_CHUNK_SIZE) {
        const inserted: unknown[] = await trx('notification_events')
          .insert(rows.slice(i, i + INSERT_CHUNK_SIZE))
          .onConflict(['subscription_id', 'item_id'])
          .ignore()
          .returning('id')
        created += inserted.length
      }
      return created
    })
  } catch (error) {
    this.log.error({ error, targetId }, 'Error creating notification events')
    throw new PersistenceError(
      `Failed to create notification events for target ${targetId}`,
      { cause: error },
    )
  }
}

/**
 * Loads pending events whose retry time has come, oldest retry first,
 * joined with the endpoint and secret of their subscription.
 *
 * @param now - Events with next_retry_at at or before this instant are due
 * @param limit - Maximum number of events returned
 * @param excludeIds - Events already being delivered
 */
export async function getDueNotificationEvents(
  this: DatabaseService,
  now: Date,
  limit: number,
  excludeIds: number[] = [],
): Promise<DueNotificationEvent[]> {
  try {
    const query = this.knex('notification_events as e')
      .join('subscriptions as s', 's.id', 'e.subscription_id')
      .where('e.status', 'pending')
      .where((builder) =>
        builder
          .whereNull('e.next_retry_at')
          .orWhere('e.next_retry_at', '<=', now.toISOString()),
      )
      .select('e.*', 's.endpoint', 's.secret')
      .orderBy([
        { column: 'e.next_retry_at', order: 'asc' },
        { column: 'e.id', order: 'asc' },
      ])
      .limit(limit)

    if (excludeIds.length > 0) {
      query.whereNotIn('e.id', excludeIds)
    }

    const rows: DueNotificationEventRow[] = await query
    return rows.map((row) => ({
      ...mapEvent(this, row),
      endpoint: row.endpoint,
      secret: row.secret,
    }))
  } catch (error) {
    this.log.error({ error }, 'Error loading due notification events')
    throw new PersistenceError('Failed to load due notification events', {
      cause: error,
    })
  }
}

async function updateEvent(
  db: DatabaseService,
  id: number,
  changes: Record<string, string | number | null>,
): Promise<void> {
  try {
    await db
      .knex('notification_events')
      .where({ id })
      .update({ ...changes, updated_at: db.timestamp })
  } catch (error) {
    db.log.error({ error, eventId: id }, 'Error updating notification event')
    throw new PersistenceError(`Failed to update notification event ${id}`, {
      cause: error,
    })
  }
}

export async function markNotificationDelivered(
  this: DatabaseService,
  id: number,
  attempts: number,
  deliveredAt: Date,
): Promise<void> {
  await updateEvent(this, id, {
    status: 'delivered',
    attempts,
    delivered_at: deliveredAt.toISOString(),
    next_retry_at: null,
    last_error: null,
  })
}

export async function markNotificationRetry(
  this: DatabaseService,
  id: number,
  attempts: number,
  nextRetryAt: Date,
  error: string,
): Promise<void> {
  await updateEvent(this, id, {
    attempts,
    next_retry_at: nextRetryAt.toISOString(),
    last_error: error,
  })
}

/**
 * Dead-letters an event. Failed events are kept for inspection and never
 * retried.
 */
export async function markNotificationFailed(
  this: DatabaseService,
  id: number,
  attempts: number,
  error: string,
): Promise<void> {
  await updateEvent(this, id, {
    status: 'failed',
    attempts,
    next_retry_at: null,
    last_error: error,
  })
}

export async function getNotificationEvent(
  this: DatabaseService,
  id: number,
): Promise<NotificationEvent | undefined> {
  const row: NotificationEventRow | undefined = await this.knex(
    'notification_events',
  )
    .where({ id })
    .first()
  return row ? mapEvent(this, row) : undefined
}

/**
 * Lists events newest first, optionally filtered by status and subscription.
 */
export async function listNotificationEvents(
  this: DatabaseService,
  filter: NotificationEventFilter = {},
): Promise<NotificationEvent[]> {
  const query = this.knex('notification_events')
    .orderBy('id', 'desc')
    .limit(filter.limit ?? 50)

  if (filter.status) {
    query.where({ status: filter.status })
  }
  if (filter.subscriptionId !== undefined) {
    query.where({ subscription_id: filter.subscriptionId })
  }

  const rows: NotificationEventRow[] = await query
  return rows.map((row) => mapEvent(this, row))
}

export async function countNotificationEventsByStatus(
  this: DatabaseService,
): Promise<NotificationEventCounts> {
  const rows: Array<{ status: string; count: number | string }> =
    await this.knex('notification_events')
      .select('status')
      .count({ count: '*' })
      .groupBy('status')

  const counts: NotificationEventCounts = {
    pending: 0,
    delivered: 0,
    failed: 0,
  }
  for (const row of rows) {
    const status = NOTIFICATION_EVENT_STATUSES.find((s) => s === row.status)
    if (status) counts[status] = Number(row.count)
  }
  return counts
}
