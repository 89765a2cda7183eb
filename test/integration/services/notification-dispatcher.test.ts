import type { DeliverySender } from '@root/types/dispatcher.types.js'
import { DispatchFailure, RateLimitError } from '@root/types/errors.js'
import type { Target } from '@root/types/target.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { NotificationDispatcherService } from '@services/notification-dispatcher.service.js'
import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  createTestDatabase,
  createTestTarget,
  item,
} from '../../helpers/database.js'
import { createMockLogger } from '../../mocks/logger.js'

const T0 = Date.parse('2026-01-01T00:00:00.000Z')

describe('NotificationDispatcherService', () => {
  let db: DatabaseService
  let target: Target
  let clock: number
  let send: Mock<DeliverySender>

  const createDispatcher = (maxAttempts = 5, concurrency = 2) =>
    new NotificationDispatcherService(
      db,
      send,
      {
        concurrency,
        maxAttempts,
        baseDelayMs: 1_000,
        maxDelayMs: 60_000,
        now: () => clock,
      },
      createMockLogger(),
    )

  beforeEach(async () => {
    clock = T0
    db = await createTestDatabase()
    target = await createTestTarget(db)
    await db.createSubscription({
      target_id: target.id,
      endpoint: 'http://push.test/up/a',
      secret: 'test-secret-0123456789',
    })
    send = vi.fn<DeliverySender>(async () => {})
  })

  afterEach(async () => {
    await db.close()
  })

  it('should create one event per subscription on enqueue', async () => {
    const dispatcher = createDispatcher()

    await expect(
      dispatcher.enqueue(target, [item('2'), item('1')]),
    ).resolves.toBe(2)

    expect(await db.countNotificationEventsByStatus()).toEqual({
      pending: 2,
      delivered: 0,
      failed: 0,
    })
    expect(send).not.toHaveBeenCalled()
  })

  it('should deliver the payload to the subscription endpoint', async () => {
    const dispatcher = createDispatcher()
    await dispatcher.enqueue(target, [item('9', 'follow')])

    const outcomes = await dispatcher.processDue()

    expect(outcomes).toHaveLength(1)
    expect(outcomes[0]).toMatchObject({
      status: 'delivered',
      attempts: 1,
      nextRetryAt: null,
    })
    const [deliveryTarget, payload] = send.mock.calls[0]
    expect(deliveryTarget).toEqual({
      endpoint: 'http://push.test/up/a',
      secret: 'test-secret-0123456789',
    })
    expect(payload.title).toBe('New Follower')
    expect(payload.data.sort_index).toBe('9')

    const event = await db.getNotificationEvent(outcomes[0].eventId)
    expect(event?.status).toBe('delivered')
    expect(event?.delivered_at?.getTime()).toBe(T0)
  })

  it('should back off exponentially and deliver on the fourth attempt', async () => {
    send
      .mockRejectedValueOnce(new DispatchFailure('HTTP 503', 503))
      .mockRejectedValueOnce(new DispatchFailure('HTTP 503', 503))
      .mockRejectedValueOnce(new DispatchFailure('HTTP 503', 503))
    const dispatcher = createDispatcher()
    await dispatcher.enqueue(target, [item('1')])

    const [first] = await dispatcher.processDue()
    expect(first).toMatchObject({ status: 'pending', attempts: 1 })
    expect(first.nextRetryAt?.getTime()).toBe(T0 + 1_000)

    // Not due yet
    expect(await dispatcher.processDue()).toEqual([])

    clock = T0 + 1_000
    const [second] = await dispatcher.processDue()
    expect(second.attempts).toBe(2)
    expect(second.nextRetryAt?.getTime()).toBe(T0 + 3_000)

    clock = T0 + 3_000
    const [third] = await dispatcher.processDue()
    expect(third.attempts).toBe(3)
    expect(third.nextRetryAt?.getTime()).toBe(T0 + 7_000)

    clock = T0 + 7_000
    const [fourth] = await dispatcher.processDue()
    expect(fourth).toMatchObject({ status: 'delivered', attempts: 4 })
    expect(send).toHaveBeenCalledTimes(4)
    expect(dispatcher.stats()).toMatchObject({ delivered: 1, retried: 3 })
  })

  it('should dead-letter an event after the last attempt', async () => {
    send.mockRejectedValue(new DispatchFailure('HTTP 410: Gone', 410))
    const dispatcher = createDispatcher(2)
    await dispatcher.enqueue(target, [item('1')])

    await dispatcher.processDue()
    clock = T0 + 1_000
    const [last] = await dispatcher.processDue()

    expect(last).toEqual({
      eventId: last.eventId,
      status: 'failed',
      attempts: 2,
      nextRetryAt: null,
      error: 'HTTP 410: Gone',
    })
    clock = T0 + 3_600_000
    expect(await dispatcher.processDue()).toEqual([])
    expect((await db.getNotificationEvent(last.eventId))?.last_error).toBe(
      'HTTP 410: Gone',
    )
    expect(dispatcher.stats().failed).toBe(1)
  })

  it('should wait for the retry-after hint of a rate-limited delivery', async () => {
    send.mockRejectedValueOnce(new RateLimitError('limited', 30_000))
    const dispatcher = createDispatcher()
    await dispatcher.enqueue(target, [item('1')])

    const [outcome] = await dispatcher.processDue()

    expect(outcome.nextRetryAt?.getTime()).toBe(T0 + 30_000)
    expect(outcome.error).toBe('limited')
  })

  it('should never run more deliveries at once than the concurrency limit', async () => {
    let active = 0
    let maxActive = 0
    send.mockImplementation(async () => {
      active++
      maxActive = Math.max(maxActive, active)
      await new Promise((resolve) => setTimeout(resolve, 5))
      active--
    })
    const dispatcher = createDispatcher(5, 2)
    await dispatcher.enqueue(target, ['5', '4', '3', '2', '1'].map((id) => item(id)))

    // A pass loads at most twice the concurrency
    expect(await dispatcher.processDue()).toHaveLength(4)
    expect(await dispatcher.processDue()).toHaveLength(1)
    expect(maxActive).toBe(2)
  })

  it('should deliver queued events once started', async () => {
    const dispatcher = createDispatcher()
    dispatcher.start()

    await dispatcher.enqueue(target, [item('1')])

    await vi.waitFor(() => expect(dispatcher.stats().delivered).toBe(1))
    expect(dispatcher.isRunning).toBe(true)
    await dispatcher.drain(1_000)
    expect(dispatcher.isRunning).toBe(false)
  })

  describe('drain', () => {
    it('should deliver everything due before stopping', async () => {
      const dispatcher = createDispatcher()
      await dispatcher.enqueue(target, [item('2'), item('1')])

      await expect(dispatcher.drain(1_000)).resolves.toEqual({
        completed: true,
        delivered: 2,
        failed: 0,
        retrying: 0,
      })
    })

    it('should leave events with a future retry pending', async () => {
      send.mockRejectedValue(new DispatchFailure('HTTP 500', 500))
      const dispatcher = createDispatcher()
      await dispatcher.enqueue(target, [item('1')])

      await expect(dispatcher.drain(1_000)).resolves.toEqual({
        completed: true,
        delivered: 0,
        failed: 0,
        retrying: 1,
      })
      expect((await db.countNotificationEventsByStatus()).pending).toBe(1)
    })

    it('should abort deliveries still running at the deadline', async () => {
      send.mockImplementation(
        (_target, _payload, signal) =>
          new Promise<void>((_resolve, reject) => {
            signal?.addEventListener('abort', () =>
              reject(new DispatchFailure('aborted')),
            )
          }),
      )
      const dispatcher = createDispatcher()
      await dispatcher.enqueue(target, [item('1')])

      const result = await dispatcher.drain(20)

      expect(result.completed).toBe(false)
      expect(dispatcher.stats().inFlight).toBe(0)
      const [event] = await db.listNotificationEvents()
      expect(event.status).toBe('pending')
    })

    it('should not count an aborted delivery as an attempt', async () => {
      send.mockImplementation(
        (_target, _payload, signal) =>
          new Promise<void>((_resolve, reject) => {
            signal?.addEventListener('abort', () =>
              reject(new DispatchFailure('aborted')),
            )
          }),
      )
      const dispatcher = createDispatcher(1)
      await dispatcher.enqueue(target, [item('1')])

      const result = await dispatcher.drain(20)

      expect(result).toEqual({
        completed: false,
        delivered: 0,
        failed: 0,
        retrying: 0,
      })
      const [event] = await db.listNotificationEvents()
      expect(event.status).toBe('pending')
      expect(event.attempts).toBe(0)
      expect(event.last_error).toBeNull()
      expect(dispatcher.stats()).toMatchObject({ failed: 0, retried: 0 })
    })

    it('should not start deliveries loaded after the deadline', async () => {
      const load = db.getDueNotificationEvents.bind(db)
      vi.spyOn(db, 'getDueNotificationEvents').mockImplementation(
        async (...args) => {
          await new Promise((resolve) => setTimeout(resolve, 50))
          return load(...args)
        },
      )
      const dispatcher = createDispatcher(1)
      await dispatcher.enqueue(target, [item('1')])

      const result = await dispatcher.drain(10)
      await new Promise((resolve) => setTimeout(resolve, 100))

      expect(result.completed).toBe(false)
      expect(send).not.toHaveBeenCalled()
      const [event] = await db.listNotificationEvents()
      expect(event.status).toBe('pending')
      expect(event.attempts).toBe(0)
    })
  })
})
