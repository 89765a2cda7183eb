import { SchedulerService } from '@services/scheduler.service.js'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

describe('SchedulerService', () => {
  let scheduler: SchedulerService

  beforeEach(() => {
    vi.useFakeTimers()
    scheduler = new SchedulerService(createMockLogger())
  })

  afterEach(() => {
    scheduler.stop()
    vi.useRealTimers()
  })

  it('should run a job on its interval', async () => {
    const handler = vi.fn(async () => {})
    scheduler.scheduleIntervalJob('poll-tick', 1000, handler)

    await vi.advanceTimersByTimeAsync(3000)

    expect(handler).toHaveBeenCalledTimes(3)
    expect(handler).toHaveBeenCalledWith('poll-tick')
    expect(scheduler.getJobInfo('poll-tick')).toMatchObject({
      intervalMs: 1000,
      lastStatus: 'completed',
      lastError: null,
      runs: 3,
    })
  })

  it('should record failures and keep running the job', async () => {
    const handler = vi
      .fn(async () => {})
      .mockRejectedValueOnce(new Error('tick failed'))
    scheduler.scheduleIntervalJob('dispatch-sweep', 1000, handler)

    await vi.advanceTimersByTimeAsync(1000)
    expect(scheduler.getJobInfo('dispatch-sweep')).toMatchObject({
      lastStatus: 'failed',
      lastError: 'tick failed',
    })

    await vi.advanceTimersByTimeAsync(1000)
    expect(scheduler.getJobInfo('dispatch-sweep')).toMatchObject({
      lastStatus: 'completed',
      runs: 2,
    })
  })

  it('should replace a job registered under the same name', async () => {
    const first = vi.fn(async () => {})
    const second = vi.fn(async () => {})
    scheduler.scheduleIntervalJob('poll-tick', 1000, first)
    scheduler.scheduleIntervalJob('poll-tick', 1000, second)

    await vi.advanceTimersByTimeAsync(1000)

    expect(first).not.toHaveBeenCalled()
    expect(second).toHaveBeenCalledTimes(1)
    expect(scheduler.getActiveJobs()).toEqual(['poll-tick'])
  })

  it('should stop running an unscheduled job', async () => {
    const handler = vi.fn(async () => {})
    scheduler.scheduleIntervalJob('poll-tick', 1000, handler)

    expect(scheduler.unscheduleJob('poll-tick')).toBe(true)
    expect(scheduler.unscheduleJob('poll-tick')).toBe(false)
    await vi.advanceTimersByTimeAsync(2000)

    expect(handler).not.toHaveBeenCalled()
  })

  it('should reject invalid intervals and scheduling after stop', () => {
    expect(() =>
      scheduler.scheduleIntervalJob('bad', 0, async () => {}),
    ).toThrow('Invalid interval for job bad: 0')

    scheduler.stop()

    expect(scheduler.isRunning).toBe(false)
    expect(() =>
      scheduler.scheduleIntervalJob('late', 1000, async () => {}),
    ).toThrow('Cannot schedule late: scheduler is stopped')
  })
})
