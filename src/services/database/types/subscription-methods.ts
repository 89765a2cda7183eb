import type {
  Subscription,
  SubscriptionCreate,
} from '@root/types/subscription.types.js'

declare module '../../database.service.js' {
  interface DatabaseService {
    // SUBSCRIPTION METHODS
    /**
     * Creates a subscription
     * @param data - Target id, endpoint URL and signing secret
     * @returns Promise resolving to the created subscription
     */
    createSubscription(data: SubscriptionCreate): Promise<Subscription>

    /**
     * Gets every subscription of a target
     * @param targetId - The target id
     * @returns Promise resolving to the subscriptions ordered by id
     */
    getSubscriptionsForTarget(targetId: number): Promise<Subscription[]>

    /**
     * Deletes a subscription and its events
     * @param id - The subscription id
     * @returns Promise resolving to true when a row was deleted
     */
    deleteSubscription(id: number): Promise<boolean>
  }
}
