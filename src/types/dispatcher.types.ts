import type {
  DueNotificationEvent,
  NotificationEventStatus,
} from '@root/types/notification-event.types.js'
import type {
  NotificationPayload,
  PlatformItem,
} from '@root/types/platform.types.js'

export interface DispatcherOptions {
  concurrency: number
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  /** Maximum number of due events loaded per pass */
  batchSize?: number
  now?: () => number
}

export interface DeliveryTarget {
  endpoint: string
  secret: string
}

/**
 * Sends one signed payload to one subscriber endpoint.
 * Throws DispatchFailure or RateLimitError when the attempt fails.
 */
export type DeliverySender = (
  target: DeliveryTarget,
  payload: NotificationPayload,
  signal?: AbortSignal,
) => Promise<void>

export interface DeliveryOutcome {
  eventId: number
  /** 'pending' when the attempt failed and a retry is scheduled */
  status: NotificationEventStatus
  attempts: number
  nextRetryAt: Date | null
  error?: string
}

/**
 * Persistence used by the dispatcher; the database is the queue.
 */
export interface DispatchStore {
  createNotificationEvents(targetId: number, items: PlatformItem[]): Promise<number>
  getDueNotificationEvents(
    now: Date,
    limit: number,
    excludeIds?: number[],
  ): Promise<DueNotificationEvent[]>
  markNotificationDelivered(
    id: number,
    attempts: number,
    deliveredAt: Date,
  ): Promise<void>
  markNotificationRetry(
    id: number,
    attempts: number,
    nextRetryAt: Date,
    error: string,
  ): Promise<void>
  markNotificationFailed(id: number, attempts: number, error: string): Promise<void>
}

export interface DispatcherStats {
  running: boolean
  inFlight: number
  concurrency: number
  delivered: number
  retried: number
  failed: number
}

export interface DrainResult {
  completed: boolean
  delivered: number
  failed: number
  retrying: number
}
