import type {
  DueNotificationEvent,
  NotificationEvent,
  NotificationEventCounts,
  NotificationEventFilter,
} from '@root/types/notification-event.types.js'
import type { PlatformItem } from '@root/types/platform.types.js'

declare module '../../database.service.js' {
  interface DatabaseService {
    // NOTIFICATION EVENT METHODS
    /**
     * Creates pending events for every subscription of a target
     * @param targetId - The target the items belong to
     * @param items - Newly seen items
     * @returns Promise resolving to the number of events created
     */
    createNotificationEvents(
      targetId: number,
      items: PlatformItem[],
    ): Promise<number>

    /**
     * Gets pending events that are due for delivery
     * @param now - Cut-off for next_retry_at
     * @param limit - Maximum number of events
     * @param excludeIds - Event ids to leave out
     * @returns Promise resolving to due events with endpoint and secret
     */
    getDueNotificationEvents(
      now: Date,
      limit: number,
      excludeIds?: number[],
    ): Promise<DueNotificationEvent[]>

    /**
     * Marks an event delivered
     * @param id - The event id
     * @param attempts - Attempt count including the successful one
     * @param deliveredAt - Delivery time
     */
    markNotificationDelivered(
      id: number,
      attempts: number,
      deliveredAt: Date,
    ): Promise<void>

    /**
     * Schedules another delivery attempt
     * @param id - The event id
     * @param attempts - Attempts made so far
     * @param nextRetryAt - When the event becomes due again
     * @param error - Message of the failed attempt
     */
    markNotificationRetry(
      id: number,
      attempts: number,
      nextRetryAt: Date,
      error: string,
    ): Promise<void>

    /**
     * Marks an event permanently failed
     * @param id - The event id
     * @param attempts - Attempts made
     * @param error - Message of the last failed attempt
     */
    markNotificationFailed(
      id: number,
      attempts: number,
      error: string,
    ): Promise<void>

    /**
     * Gets one event
     * @param id - The event id
     * @returns Promise resolving to the event or undefined
     */
    getNotificationEvent(id: number): Promise<NotificationEvent | undefined>

    /**
     * Lists events, newest first
     * @param filter - Optional status, subscription and limit
     * @returns Promise resolving to matching events
     */
    listNotificationEvents(
      filter?: NotificationEventFilter,
    ): Promise<NotificationEvent[]>

    /**
     * Counts events by status
     * @returns Promise resolving to a count for every status
     */
    countNotificationEventsByStatus(): Promise<NotificationEventCounts>
  }
}
