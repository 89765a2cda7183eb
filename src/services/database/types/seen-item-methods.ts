import type { PlatformItem } from '@root/types/platform.types.js'

declare module '../../database.service.js' {
  interface DatabaseService {
    // SEEN ITEM METHODS
    /**
     * Atomically records unseen items and advances the target cursor
     * @param targetId - The target id
     * @param items - Candidate items
     * @returns Promise resolving to the items inserted by this call, in input order
     */
    recordIfNew(targetId: number, items: PlatformItem[]): Promise<PlatformItem[]>

    /**
     * Counts recorded items of a target
     * @param targetId - The target id
     * @returns Promise resolving to the number of seen items
     */
    countSeenItems(targetId: number): Promise<number>
  }
}
