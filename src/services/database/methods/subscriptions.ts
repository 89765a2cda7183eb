import { PersistenceError } from '@root/types/errors.js'
import type {
  Subscription,
  SubscriptionCreate,
} from '@root/types/subscription.types.js'
import type { DatabaseService } from '@services/database.service.js'

interface SubscriptionRow {
  id: number
  target_id: number
  endpoint: string
  secret: string
  created_at: string
}

function mapSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    target_id: row.target_id,
    endpoint: row.endpoint,
    secret: row.secret,
    created_at: row.created_at,
  }
}

/**
 * Inserts a subscription for an existing target.
 *
 * @returns The created subscription, including its id
 */
export async function createSubscription(
  this: DatabaseService,
  data: SubscriptionCreate,
): Promise<Subscription> {
  try {
    const createdAt = this.timestamp
    const result = await this.knex('subscriptions')
      .insert({ ...data, created_at: createdAt })
      .returning('id')

    return { id: this.extractId(result), ...data, created_at: createdAt }
  } catch (error) {
    this.log.error(
      { error, targetId: data.target_id },
      'Error creating subscription',
    )
    throw new PersistenceError('Failed to create subscription', {
      cause: error,
    })
  }
}

/**
 * Retrieves every subscription of a target, oldest first.
 */
export async function getSubscriptionsForTarget(
  this: DatabaseService,
  targetId: number,
): Promise<Subscription[]> {
  const rows: SubscriptionRow[] = await this.knex('subscriptions')
    .where({ target_id: targetId })
    .orderBy('id', 'asc')
  return rows.map(mapSubscription)
}

/**
 * Deletes a subscription together with its notification events.
 *
 * @returns True when a subscription was deleted
 */
export async function deleteSubscription(
  this: DatabaseService,
  id: number,
): Promise<boolean> {
  try {
    const deleted = await this.knex('subscriptions').where({ id }).delete()
    return deleted > 0
  } catch (error) {
    this.log.error({ error, subscriptionId: id }, 'Error deleting subscription')
    throw new PersistenceError(`Failed to delete subscription ${id}`, {
      cause: error,
    })
  }
}
