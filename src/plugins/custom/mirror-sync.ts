import { MirrorSyncService } from '@services/mirror-sync.service.js'
import { SyncInProgressError } from '@root/types/errors.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    mirrorSync: MirrorSyncService
    /** Aborted when the server shuts down; passed to every pass */
    mirrorSyncSignal: AbortSignal
  }
}

export const MIRROR_SYNC_JOB = 'mirror-sync'

// Upper bound for a single backoff wait between upstream retries
const MAX_RETRY_DELAY_MS = 60_000

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    const shutdown = new AbortController()

    const mirrorSync = new MirrorSyncService(fastify.log, {
      db: fastify.db,
      source: fastify.upstream,
      settings: {
        concurrency: config.syncConcurrency,
        retry: {
          maxRetries: config.syncMaxRetries,
          baseDelayMs: config.syncRetryBaseMs,
          maxDelayMs: MAX_RETRY_DELAY_MS,
        },
      },
    })

    fastify.decorate('mirrorSync', mirrorSync)
    fastify.decorate('mirrorSyncSignal', shutdown.signal)

    if (config.syncIntervalMinutes > 0) {
      fastify.scheduler.scheduleJob(
        MIRROR_SYNC_JOB,
        { minutes: config.syncIntervalMinutes, runImmediately: true },
        async () => {
          try {
            await mirrorSync.run({ signal: shutdown.signal })
          } catch (error) {
            if (error instanceof SyncInProgressError) {
              fastify.log.debug('Mirror sync pass already running, skipping')
              return
            }
            throw error // Re-throw so scheduler can record the failure
          }
        },
      )
    } else {
      fastify.log.info('Scheduled mirror sync disabled (syncIntervalMinutes=0)')
    }

    fastify.addHook('onClose', async () => {
      shutdown.abort()
      await mirrorSync.waitForIdle()
    })
  },
  {
    name: 'mirror-sync',
    dependencies: ['config', 'database', 'upstream', 'scheduler'],
  },
)
