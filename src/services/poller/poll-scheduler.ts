/**
 * Poll Scheduler
 *
 * Keeps every tracked target in a min-heap keyed by its next due time and
 * admits due targets into a bounded pool of concurrent polls. Admission runs
 * on the coordinating tick and right after every completed poll.
 *
 * Responsible for:
 * - Never running more than `maxConcurrent` polls at once; due targets that
 *   do not fit stay in the heap
 * - Never polling the same target twice at once
 * - Rescheduling after each poll with interval plus jitter, honouring
 *   retry-after hints
 * - Tracking and persisting consecutive failures per target
 * - Stopping with a deadline, aborting polls still running at the deadline
 */
import { RateLimitError, errorMessage } from '@root/types/errors.js'
import type {
  PollExecutor,
  PollSchedulerOptions,
  PollSchedulerStats,
  ScheduleStore,
  StopResult,
  TargetScheduleState,
} from '@root/types/poller.types.js'
import type { Target } from '@root/types/target.types.js'
import { createServiceLogger } from '@utils/logger.js'
import { MinHeap } from '@utils/min-heap.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit, { type LimitFunction } from 'p-limit'

interface HeapNode {
  dueAt: number
  targetId: number
  /** Matches ScheduleEntry.seq while the node is live */
  seq: number
}

interface ScheduleEntry {
  target: Target
  dueAt: number
  seq: number
  inFlight: boolean
  consecutiveFailures: number
  lastCompletedAt: number | null
  lastError: string | null
}

export class PollScheduler {
  private readonly heap = new MinHeap<HeapNode>(
    (a, b) => a.dueAt - b.dueAt || a.seq - b.seq,
  )
  private readonly entries = new Map<number, ScheduleEntry>()
  private readonly inFlight = new Set<Promise<void>>()
  private readonly limit: LimitFunction
  private readonly now: () => number
  private readonly random: () => number
  private readonly log: FastifyBaseLogger

  private abortController = new AbortController()
  private running = false
  private seq = 0
  private peakInFlight = 0
  private totalPolls = 0
  private totalFailures = 0

  constructor(
    private readonly executor: PollExecutor,
    private readonly store: ScheduleStore,
    private readonly options: PollSchedulerOptions,
    baseLog: FastifyBaseLogger,
  ) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new RangeError('maxConcurrent must be a positive integer')
    }
    this.limit = pLimit(options.maxConcurrent)
    this.now = options.now ?? Date.now
    this.random = options.random ?? Math.random
    this.log = createServiceLogger(baseLog, 'POLL_SCHEDULER')
  }

  get isRunning(): boolean {
    return this.running
  }

  /**
   * Loads every persisted target and starts admitting due polls.
   */
  async start(): Promise<void> {
    if (this.running) return
    const targets = await this.store.getAllTargets()
    this.abortController = new AbortController()
    this.running = true
    for (const target of targets) {
      this.track(target)
    }
    this.log.info(
      `Scheduling ${targets.length} target(s), at most ${this.options.maxConcurrent} concurrent poll(s)`,
    )
    this.admitDue()
  }

  /**
   * Starts tracking a target, or refreshes the stored copy of one already
   * tracked (new credentials take effect on its next poll).
   */
  addTarget(target: Target): void {
    const existing = this.entries.get(target.id)
    if (existing) {
      existing.target = { ...target, cursor: existing.target.cursor }
      return
    }
    this.track(target)
    this.admitDue()
  }

  /**
   * Stops tracking a target. A poll already in flight finishes but the
   * target is not rescheduled.
   *
   * @returns True when the target was tracked
   */
  removeTarget(targetId: number): boolean {
    // The heap node goes stale and is skipped when popped
    return this.entries.delete(targetId)
  }

  /**
   * Coordinating tick: admits due targets while the pool has room.
   *
   * @returns Number of polls started
   */
  tick(): number {
    return this.admitDue()
  }

  /**
   * Stops admission and waits for in-flight polls. Polls still running at
   * the deadline are aborted through their signal and awaited once more.
   */
  async stop(timeoutMs: number): Promise<StopResult> {
    this.running = false
    if (this.inFlight.size === 0) return { completed: true, abandoned: 0 }

    let timer: NodeJS.Timeout | undefined
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs)
    })
    const result = await Promise.race([
      this.whenIdle().then(() => 'done' as const),
      deadline,
    ])
    clearTimeout(timer)

    if (result === 'done') {
      this.log.info('All in-flight polls completed')
      return { completed: true, abandoned: 0 }
    }

    const abandoned = this.inFlight.size
    this.log.warn(`Aborting ${abandoned} poll(s) still running at shutdown`)
    this.abortController.abort()
    await Promise.allSettled([...this.inFlight])
    return { completed: false, abandoned }
  }

  /**
   * Resolves once no poll is in flight.
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight])
    }
  }

  getState(targetId: number): TargetScheduleState | undefined {
    const entry = this.entries.get(targetId)
    if (!entry) return undefined
    return {
      targetId,
      dueAt: new Date(entry.dueAt),
      inFlight: entry.inFlight,
      consecutiveFailures: entry.consecutiveFailures,
      lastCompletedAt:
        entry.lastCompletedAt === null ? null : new Date(entry.lastCompletedAt),
      lastError: entry.lastError,
    }
  }

  stats(): PollSchedulerStats {
    const now = this.now()
    let due = 0
    for (const entry of this.entries.values()) {
      if (!entry.inFlight && entry.dueAt <= now) due++
    }
    return {
      running: this.running,
      tracked: this.entries.size,
      due,
      inFlight: this.inFlight.size,
      maxConcurrent: this.options.maxConcurrent,
      peakInFlight: this.peakInFlight,
      totalPolls: this.totalPolls,
      totalFailures: this.totalFailures,
    }
  }

  private track(target: Target): void {
    const entry: ScheduleEntry = {
      target,
      dueAt: 0,
      seq: 0,
      inFlight: false,
      consecutiveFailures: target.consecutive_failures,
      lastCompletedAt: target.last_polled_at?.getTime() ?? null,
      lastError: target.last_error,
    }
    this.entries.set(target.id, entry)
    this.schedule(entry, target.next_poll_at?.getTime() ?? this.now())
  }

  private schedule(entry: ScheduleEntry, dueAt: number): void {
    entry.seq = ++this.seq
    entry.dueAt = dueAt
    this.heap.push({ dueAt, targetId: entry.target.id, seq: entry.seq })
  }

  private admitDue(): number {
    if (!this.running) return 0

    const now = this.now()
    let admitted = 0
    while (this.inFlight.size < this.options.maxConcurrent) {
      const head = this.heap.peek()
      if (!head || head.dueAt > now) break
      this.heap.pop()

      const entry = this.entries.get(head.targetId)
      if (!entry || entry.seq !== head.seq || entry.inFlight) continue

      this.launch(entry)
      admitted++
    }
    return admitted
  }

  private launch(entry: ScheduleEntry): void {
    entry.inFlight = true

    const run: Promise<void> = this.limit(() => this.runPoll(entry)).finally(
      () => {
        this.inFlight.delete(run)
        this.admitDue()
      },
    )
    this.inFlight.add(run)
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight.size)
  }

  /**
   * Runs one poll and reschedules the target. Never rejects.
   */
  private async runPoll(entry: ScheduleEntry): Promise<void> {
    const targetId = entry.target.id
    let failure: unknown = null
    try {
      const outcome = await this.executor.poll(
        entry.target,
        this.abortController.signal,
      )
      entry.target = { ...entry.target, cursor: outcome.cursor }
    } catch (error) {
      failure = error
    }

    const completedAt = this.now()
    entry.lastCompletedAt = completedAt
    this.totalPolls++

    if (this.entries.get(targetId) !== entry) {
      entry.inFlight = false
      this.log.debug({ targetId }, 'Target removed during poll')
      return
    }

    if (failure !== null && this.abortController.signal.aborted) {
      entry.inFlight = false
      this.log.debug({ targetId }, 'Poll aborted by shutdown')
      return
    }

    if (failure === null) {
      entry.consecutiveFailures = 0
      entry.lastError = null
    } else {
      entry.consecutiveFailures++
      entry.lastError = errorMessage(failure)
      this.totalFailures++
      this.log.warn(
        {
          targetId,
          error: failure,
          consecutiveFailures: entry.consecutiveFailures,
        },
        'Poll failed',
      )
    }

    const interval = this.options.pollIntervalMs
    let dueAt =
      completedAt + interval + this.random() * this.options.jitterRatio * interval
    if (failure instanceof RateLimitError && failure.retryAfterMs !== undefined) {
      dueAt = Math.max(dueAt, completedAt + failure.retryAfterMs)
    }

    try {
      await this.store.recordPollResult(targetId, {
        last_polled_at: new Date(completedAt),
        next_poll_at: new Date(dueAt),
        consecutive_failures: entry.consecutiveFailures,
        last_error: entry.lastError,
      })
    } catch (error) {
      this.log.error({ error, targetId }, 'Failed to persist poll result')
    }

    // Rescheduled only now so a new poll cannot start while this one persists
    entry.inFlight = false
    this.schedule(entry, dueAt)
  }
}
