import type { PlatformItem } from '@root/types/platform.types.js'
import type {
  PlatformCredentials,
  Target,
  TargetPollRecord,
} from '@root/types/target.types.js'

export interface PollOutcome {
  /** Items recorded for the first time during this poll, newest first */
  newItems: PlatformItem[]
  /** Cursor after the poll */
  cursor: string | null
  /** True when the badge probe reported nothing unread and no fetch was made */
  skipped: boolean
}

/**
 * Read access to a target's notifications on the platform.
 */
export interface NotificationSource {
  getUnreadCount(
    credentials: PlatformCredentials,
    signal?: AbortSignal,
  ): Promise<number>
  getNotifications(
    credentials: PlatformCredentials,
    signal?: AbortSignal,
  ): Promise<PlatformItem[]>
}

/**
 * Performs one poll of one target. Rejections are retry-eligible failures.
 */
export interface PollExecutor {
  poll(target: Target, signal: AbortSignal): Promise<PollOutcome>
}

/**
 * Receives items that were committed as seen and turns them into
 * notification events.
 */
export interface NotificationIntake {
  enqueue(target: Target, items: PlatformItem[]): Promise<number>
}

/**
 * Durable dedup record consulted by the poll worker.
 */
export interface SeenItemStore {
  recordIfNew(targetId: number, items: PlatformItem[]): Promise<PlatformItem[]>
}

/**
 * Persistence used by the poll scheduler.
 */
export interface ScheduleStore {
  getAllTargets(): Promise<Target[]>
  recordPollResult(targetId: number, record: TargetPollRecord): Promise<void>
}

export interface PollSchedulerOptions {
  pollIntervalMs: number
  maxConcurrent: number
  /** Upper bound of the random delay added to each interval, as a fraction of it */
  jitterRatio: number
  now?: () => number
  random?: () => number
}

export interface TargetScheduleState {
  targetId: number
  dueAt: Date
  inFlight: boolean
  consecutiveFailures: number
  lastCompletedAt: Date | null
  lastError: string | null
}

export interface PollSchedulerStats {
  running: boolean
  tracked: number
  due: number
  inFlight: number
  maxConcurrent: number
  /** Highest number of polls ever in flight at once */
  peakInFlight: number
  totalPolls: number
  totalFailures: number
}

export interface StopResult {
  /** False when in-flight work had to be aborted at the timeout */
  completed: boolean
  abandoned: number
}
