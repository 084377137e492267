/**
 * Scheduler Service
 *
 * Interval job scheduling on top of toad-scheduler. Keeps the outcome of the
 * last run of every job in memory so it can be reported by the sync status
 * route.
 *
 * @example
 * scheduler.scheduleJob('mirror-sync', { minutes: 30 }, async () => {
 *   await fastify.mirrorSync.run()
 * })
 */
import type { FastifyBaseLogger } from 'fastify'
import { AsyncTask, SimpleIntervalJob, ToadScheduler } from 'toad-scheduler'
import { createServiceLogger } from '@utils/logger.js'

/** Handler function type for scheduled jobs */
export type JobHandler = (jobName: string) => Promise<void>

export interface IntervalConfig {
  minutes?: number
  seconds?: number
  runImmediately?: boolean
}

export interface JobRun {
  time: string
  status: 'completed' | 'failed'
  error?: string
}

export interface JobStatus {
  name: string
  intervalMs: number
  lastRun: JobRun | null
  nextRun: string | null
}

interface JobEntry {
  handler: JobHandler
  intervalMs: number
  lastRun: JobRun | null
  nextRun: Date | null
}

export class SchedulerService {
  private readonly log: FastifyBaseLogger
  private readonly scheduler = new ToadScheduler()
  private readonly jobs = new Map<string, JobEntry>()

  constructor(baseLog: FastifyBaseLogger) {
    this.log = createServiceLogger(baseLog, 'SCHEDULER')
  }

  /**
   * Registers `handler` to run every interval. Replaces any job with the
   * same name.
   */
  scheduleJob(name: string, config: IntervalConfig, handler: JobHandler): void {
    const intervalMs =
      ((config.minutes ?? 0) * 60 + (config.seconds ?? 0)) * 1000
    if (intervalMs <= 0) {
      throw new Error(`Job ${name} needs a positive interval`)
    }

    if (this.jobs.has(name)) {
      this.scheduler.removeById(name)
    }

    const entry: JobEntry = {
      handler,
      intervalMs,
      lastRun: null,
      nextRun: config.runImmediately
        ? new Date()
        : new Date(Date.now() + intervalMs),
    }
    this.jobs.set(name, entry)

    const task = new AsyncTask(
      `${name}-task`,
      async () => {
        entry.nextRun = new Date(Date.now() + intervalMs)
        this.log.debug(`Running scheduled job: ${name}`)
        await this.execute(name, entry)
      },
      (error) => {
        this.log.error({ error }, `Job task error for ${name}`)
      },
    )

    this.scheduler.addSimpleIntervalJob(
      new SimpleIntervalJob(
        {
          minutes: config.minutes,
          seconds: config.seconds,
          runImmediately: config.runImmediately ?? false,
        },
        task,
        {
          id: name,
          preventOverrun: true,
        },
      ),
    )
    this.log.info(`Job ${name} scheduled every ${intervalMs / 1000}s`)
  }

  getJobStatus(name: string): JobStatus | null {
    const entry = this.jobs.get(name)
    if (!entry) return null
    return {
      name,
      intervalMs: entry.intervalMs,
      lastRun: entry.lastRun,
      nextRun: entry.nextRun ? entry.nextRun.toISOString() : null,
    }
  }

  /**
   * Stop the scheduler and all running jobs
   *
   * Should be called during application shutdown.
   */
  stop(): void {
    this.log.info('Stopping all scheduled jobs')
    this.scheduler.stop()
  }

  private async execute(name: string, entry: JobEntry): Promise<void> {
    try {
      await entry.handler(name)
      entry.lastRun = { time: new Date().toISOString(), status: 'completed' }
      this.log.debug(`Job ${name} completed successfully`)
    } catch (error) {
      this.log.error({ error }, `Error in job ${name}`)
      entry.lastRun = {
        time: new Date().toISOString(),
        status: 'failed',
        error: error instanceof Error ? error.message : String(error),
      }
    }
  }
}
