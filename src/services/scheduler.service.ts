/**
 * Scheduler Service
 *
 * Runs the application's recurring jobs on toad-scheduler: the poll
 * scheduler's coordinating tick and the dispatcher's retry sweep.
 *
 * Responsible for:
 * - Registering interval jobs that never overlap with themselves
 * - Logging job failures without stopping the job
 * - Tracking the last run of every job for health reporting
 * - Stopping every job on shutdown
 *
 * @example
 * // In a plugin:
 * fastify.scheduler.scheduleIntervalJob('dispatch-sweep', 5000, async () => {
 *   dispatcher.wake()
 * })
 */
import type { FastifyBaseLogger } from 'fastify'
import { AsyncTask, SimpleIntervalJob, ToadScheduler } from 'toad-scheduler'

/** Handler function type for scheduled jobs */
export type JobHandler = (jobName: string) => Promise<void>

export interface JobRunInfo {
  intervalMs: number
  lastRunAt: Date | null
  lastStatus: 'completed' | 'failed' | null
  lastError: string | null
  runs: number
}

/** Map to track registered jobs and their handlers */
type JobMap = Map<
  string,
  {
    job: SimpleIntervalJob
    handler: JobHandler
    info: JobRunInfo
  }
>

export class SchedulerService {
  /** The scheduler instance */
  private readonly scheduler: ToadScheduler

  /** Map of job names to their job instances and handlers */
  private readonly jobs: JobMap = new Map()

  private stopped = false

  /**
   * Creates a new SchedulerService instance
   *
   * @param log - Fastify logger for recording operations
   */
  constructor(private readonly log: FastifyBaseLogger) {
    this.scheduler = new ToadScheduler()
    this.log.info('Scheduler service initialized')
  }

  get isRunning(): boolean {
    return !this.stopped
  }

  /**
   * Creates an interval job whose runs never overlap
   */
  private createJob(
    name: string,
    intervalMs: number,
    handler: JobHandler,
    info: JobRunInfo,
  ): SimpleIntervalJob {
    // Create an async task that wraps the handler and adds error handling
    const task = new AsyncTask(
      `${name}-task`,
      async () => {
        try {
          await handler(name)
          info.lastStatus = 'completed'
          info.lastError = null
        } catch (error) {
          this.log.error({ error }, `Error in job ${name}`)
          info.lastStatus = 'failed'
          info.lastError = error instanceof Error ? error.message : String(error)
        } finally {
          info.lastRunAt = new Date()
          info.runs++
        }
      },
      (error) => {
        this.log.error({ error }, `Job task error for ${name}`)
      },
    )

    return new SimpleIntervalJob({ milliseconds: intervalMs }, task, {
      id: name,
      preventOverrun: true,
    })
  }

  /**
   * Register an interval job, replacing any job with the same name
   *
   * @param name - Unique name for the job
   * @param intervalMs - Time between runs
   * @param handler - Function to execute when the job runs
   */
  scheduleIntervalJob(
    name: string,
    intervalMs: number,
    handler: JobHandler,
  ): void {
    if (this.stopped) {
      throw new Error(`Cannot schedule ${name}: scheduler is stopped`)
    }
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Invalid interval for job ${name}: ${intervalMs}`)
    }

    if (this.jobs.has(name)) {
      this.scheduler.removeById(name)
    }

    const info: JobRunInfo = {
      intervalMs,
      lastRunAt: null,
      lastStatus: null,
      lastError: null,
      runs: 0,
    }
    const job = this.createJob(name, intervalMs, handler, info)
    this.scheduler.addSimpleIntervalJob(job)
    this.jobs.set(name, { job, handler, info })
    this.log.info(`Job ${name} scheduled every ${intervalMs}ms`)
  }

  /**
   * Remove a job from the scheduler
   *
   * @param name - Name of the job to remove
   * @returns True when the job existed
   */
  unscheduleJob(name: string): boolean {
    if (!this.jobs.has(name)) return false
    this.scheduler.removeById(name)
    this.jobs.delete(name)
    this.log.info(`Job ${name} unscheduled successfully`)
    return true
  }

  /**
   * Run information of a registered job
   */
  getJobInfo(name: string): JobRunInfo | undefined {
    const jobData = this.jobs.get(name)
    return jobData ? { ...jobData.info } : undefined
  }

  /**
   * Get a list of all registered job names
   *
   * @returns Array of job names
   */
  getActiveJobs(): string[] {
    return Array.from(this.jobs.keys())
  }

  /**
   * Stop the scheduler and all running jobs
   *
   * Should be called during application shutdown.
   */
  stop(): void {
    if (this.stopped) return
    this.stopped = true
    this.log.info('Stopping all scheduled jobs')
    this.scheduler.stop()
    this.jobs.clear()
  }
}
