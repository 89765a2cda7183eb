import type { NotificationEventResponse } from '@schemas/status/status.schema.js'
import type { TargetResponse } from '@schemas/targets/targets.schema.js'
import type { NotificationEvent } from '@root/types/notification-event.types.js'
import type { Target } from '@root/types/target.types.js'
import { serializeDate } from '@utils/date-serializer.js'

/**
 * Public view of a target. Session credentials are left out.
 */
export function toTargetResponse(target: Target): TargetResponse {
  return {
    id: target.id,
    handle: target.handle,
    cursor: target.cursor,
    nextPollAt: serializeDate(target.next_poll_at),
    lastPolledAt: serializeDate(target.last_polled_at),
    consecutiveFailures: target.consecutive_failures,
    lastError: target.last_error,
    createdAt: target.created_at,
    updatedAt: target.updated_at,
  }
}

export function toEventResponse(
  event: NotificationEvent,
): NotificationEventResponse {
  return {
    id: event.id,
    subscriptionId: event.subscription_id,
    targetId: event.target_id,
    itemId: event.item_id,
    status: event.status,
    attempts: event.attempts,
    nextRetryAt: serializeDate(event.next_retry_at),
    lastError: event.last_error,
    deliveredAt: serializeDate(event.delivered_at),
    createdAt: event.created_at,
    updatedAt: event.updated_at,
    payload: event.payload,
  }
}
