/**
 * Notification Dispatcher
 *
 * Delivers notification events to subscriber endpoints. Events are rows in
 * the database, so pending deliveries survive restarts and are picked up
 * again by the periodic sweep.
 *
 * Responsible for:
 * - Turning newly seen items into one pending event per subscription
 * - Delivering due events through a bounded pool
 * - Exponential backoff between attempts, or the receiver's Retry-After
 * - Dead-lettering events that exhaust their attempts
 * - Draining due deliveries on shutdown within a deadline
 */
import type {
  DeliveryOutcome,
  DeliverySender,
  DispatchStore,
  DispatcherOptions,
  DispatcherStats,
  DrainResult,
} from '@root/types/dispatcher.types.js'
import { RateLimitError, errorMessage } from '@root/types/errors.js'
import type { DueNotificationEvent } from '@root/types/notification-event.types.js'
import type { PlatformItem } from '@root/types/platform.types.js'
import type { NotificationIntake } from '@root/types/poller.types.js'
import type { Target } from '@root/types/target.types.js'
import { computeBackoff } from '@utils/backoff.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit, { type LimitFunction } from 'p-limit'

export class NotificationDispatcherService implements NotificationIntake {
  private readonly limit: LimitFunction
  private readonly inFlight = new Map<number, Promise<DeliveryOutcome>>()
  private readonly now: () => number
  private readonly batchSize: number
  private readonly log: FastifyBaseLogger

  private abortController = new AbortController()
  private running = false
  private loop: Promise<void> | null = null
  private dirty = false
  private delivered = 0
  private retried = 0
  private failed = 0

  constructor(
    private readonly store: DispatchStore,
    private readonly send: DeliverySender,
    private readonly options: DispatcherOptions,
    baseLog: FastifyBaseLogger,
  ) {
    this.limit = pLimit(options.concurrency)
    this.now = options.now ?? Date.now
    this.batchSize = options.batchSize ?? options.concurrency * 2
    this.log = createServiceLogger(baseLog, 'DISPATCHER')
  }

  get isRunning(): boolean {
    return this.running
  }

  /**
   * Starts the delivery loop and picks up anything already due.
   */
  start(): void {
    if (this.running) return
    this.abortController = new AbortController()
    this.running = true
    this.wake()
  }

  /**
   * Creates pending events for every subscription of the target and wakes
   * the delivery loop. Does not wait for delivery.
   *
   * @returns Number of events created
   */
  async enqueue(target: Target, items: PlatformItem[]): Promise<number> {
    const created = await this.store.createNotificationEvents(target.id, items)
    if (created > 0) {
      this.log.debug(
        { targetId: target.id, created },
        'Queued notification events',
      )
      this.wake()
    }
    return created
  }

  /**
   * Requests a pass over due events. Passes never overlap; a wake during a
   * pass schedules one more pass.
   */
  wake(): void {
    if (!this.running) return
    this.dirty = true
    if (!this.loop) {
      this.loop = this.runLoop().finally(() => {
        this.loop = null
      })
    }
  }

  /**
   * Starts every due delivery that fits in this pass and resolves once all
   * deliveries in flight have settled.
   */
  async processDue(): Promise<DeliveryOutcome[]> {
    await this.launchDue()
    const settled = await Promise.allSettled([...this.inFlight.values()])
    return settled.flatMap((result) =>
      result.status === 'fulfilled' ? [result.value] : [],
    )
  }

  /**
   * Stops the loop, then keeps delivering due events until none are left or
   * the deadline passes. Deliveries still running at the deadline are
   * aborted and stay pending for the next start.
   */
  async drain(timeoutMs: number): Promise<DrainResult> {
    this.running = false
    const deadline = this.now() + timeoutMs
    const outcomes: DeliveryOutcome[] = []
    let completed = false

    let timer: NodeJS.Timeout | undefined
    const expired = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs)
    })

    try {
      while (this.now() < deadline) {
        const pass = this.processDue()
        const result = await Promise.race([pass, expired])
        if (result === 'timeout') break
        outcomes.push(...result)
        if (result.length === 0 && this.inFlight.size === 0) {
          completed = true
          break
        }
      }
    } finally {
      clearTimeout(timer)
    }

    if (!completed) {
      this.abortController.abort()
      await Promise.allSettled([...this.inFlight.values()])
      this.log.warn('Dispatch drain hit its deadline')
    }

    return {
      completed,
      delivered: outcomes.filter((o) => o.status === 'delivered').length,
      failed: outcomes.filter((o) => o.status === 'failed').length,
      retrying: outcomes.filter((o) => o.status === 'pending').length,
    }
  }

  stats(): DispatcherStats {
    return {
      running: this.running,
      inFlight: this.inFlight.size,
      concurrency: this.options.concurrency,
      delivered: this.delivered,
      retried: this.retried,
      failed: this.failed,
    }
  }

  private async runLoop(): Promise<void> {
    while (this.dirty && this.running) {
      this.dirty = false
      try {
        await this.launchDue()
      } catch (error) {
        this.log.error({ error }, 'Failed to load due notification events')
      }
    }
  }

  /**
   * Loads due events not already in flight and hands them to the pool.
   *
   * @returns Number of deliveries started
   */
  private async launchDue(): Promise<number> {
    const room = this.batchSize - this.inFlight.size
    if (room <= 0) return 0

    const events = await this.store.getDueNotificationEvents(
      new Date(this.now()),
      room,
      [...this.inFlight.keys()],
    )
    if (this.abortController.signal.aborted) return 0

    for (const event of events) {
      if (this.inFlight.has(event.id)) continue
      const attempt: Promise<DeliveryOutcome> = this.limit(() =>
        this.attempt(event),
      ).finally(() => {
        this.inFlight.delete(event.id)
        // Refill the pool from the queue
        this.wake()
      })
      this.inFlight.set(event.id, attempt)
    }
    return events.length
  }

  /**
   * Makes one delivery attempt and records its result. Never rejects.
   */
  private async attempt(event: DueNotificationEvent): Promise<DeliveryOutcome> {
    const attempts = event.attempts + 1
    let failure: unknown = null

    try {
      await this.send(
        { endpoint: event.endpoint, secret: event.secret },
        event.payload,
        this.abortController.signal,
      )
    } catch (error) {
      failure = error
    }

    // Cut off by shutdown: not an attempt, the row stays as it was
    if (failure !== null && this.abortController.signal.aborted) {
      this.log.debug(
        { eventId: event.id },
        'Notification delivery aborted, left pending',
      )
      return {
        eventId: event.id,
        status: 'pending',
        attempts: event.attempts,
        nextRetryAt: event.next_retry_at,
        error: errorMessage(failure),
      }
    }

    try {
      if (failure === null) {
        await this.store.markNotificationDelivered(
          event.id,
          attempts,
          new Date(this.now()),
        )
        this.delivered++
        return {
          eventId: event.id,
          status: 'delivered',
          attempts,
          nextRetryAt: null,
        }
      }

      const message = errorMessage(failure)
      if (attempts >= this.options.maxAttempts) {
        await this.store.markNotificationFailed(event.id, attempts, message)
        this.failed++
        this.log.warn(
          { eventId: event.id, attempts, error: message },
          'Notification delivery failed permanently',
        )
        return {
          eventId: event.id,
          status: 'failed',
          attempts,
          nextRetryAt: null,
          error: message,
        }
      }

      const delayMs =
        failure instanceof RateLimitError && failure.retryAfterMs !== undefined
          ? failure.retryAfterMs
          : computeBackoff(attempts, this.options)
      const nextRetryAt = new Date(this.now() + delayMs)
      await this.store.markNotificationRetry(
        event.id,
        attempts,
        nextRetryAt,
        message,
      )
      this.retried++
      this.log.debug(
        { eventId: event.id, attempts, delayMs, error: message },
        'Notification delivery failed, retry scheduled',
      )
      return {
        eventId: event.id,
        status: 'pending',
        attempts,
        nextRetryAt,
        error: message,
      }
    } catch (error) {
      // The event keeps its previous state and is attempted again later
      this.log.error(
        { error, eventId: event.id },
        'Failed to record delivery result',
      )
      return {
        eventId: event.id,
        status: 'pending',
        attempts: event.attempts,
        nextRetryAt: event.next_retry_at,
        error: errorMessage(error),
      }
    }
  }
}
