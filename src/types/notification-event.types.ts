import type { NotificationPayload } from '@root/types/platform.types.js'

export const NOTIFICATION_EVENT_STATUSES = [
  'pending',
  'delivered',
  'failed',
] as const

export type NotificationEventStatus =
  (typeof NOTIFICATION_EVENT_STATUSES)[number]

export interface NotificationEvent {
  id: number
  subscription_id: number
  target_id: number
  item_id: string
  payload: NotificationPayload
  status: NotificationEventStatus
  attempts: number
  next_retry_at: Date | null
  last_error: string | null
  delivered_at: Date | null
  created_at: string
  updated_at: string
}

/**
 * A pending event joined with the delivery details of its subscription.
 */
export interface DueNotificationEvent extends NotificationEvent {
  endpoint: string
  secret: string
}

export interface NotificationEventFilter {
  status?: NotificationEventStatus
  subscriptionId?: number
  limit?: number
}

export type NotificationEventCounts = Record<NotificationEventStatus, number>
