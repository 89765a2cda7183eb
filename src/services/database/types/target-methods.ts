import type {
  Target,
  TargetCreate,
  TargetPollRecord,
  TargetUpsertResult,
} from '@root/types/target.types.js'

declare module '../../database.service.js' {
  interface DatabaseService {
    // TARGET METHODS
    /**
     * Creates a target, or updates the credentials of an existing handle
     * @param data - Handle and session credentials
     * @returns Promise resolving to the stored target and a created flag
     */
    upsertTarget(data: TargetCreate): Promise<TargetUpsertResult>

    /**
     * Gets a target by id
     * @param id - The target id
     * @returns Promise resolving to the target or undefined
     */
    getTarget(id: number): Promise<Target | undefined>

    /**
     * Gets all tracked targets
     * @returns Promise resolving to every target ordered by id
     */
    getAllTargets(): Promise<Target[]>

    /**
     * Deletes a target and, by cascade, its subscriptions and their events
     * @param id - The target id
     * @returns Promise resolving to true when a row was deleted
     */
    deleteTarget(id: number): Promise<boolean>

    /**
     * Counts tracked targets
     * @returns Promise resolving to the number of targets
     */
    countTargets(): Promise<number>

    /**
     * Persists the schedule state after a poll attempt
     * @param targetId - The target id
     * @param record - Poll timestamps and failure bookkeeping
     */
    recordPollResult(targetId: number, record: TargetPollRecord): Promise<void>
  }
}
