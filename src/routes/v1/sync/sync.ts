import { MIRROR_SYNC_JOB } from '@plugins/custom/mirror-sync.js'
import {
  ErrorSchema,
  SyncPassResultSchema,
  SyncRequestBodySchema,
  SyncStatusResponseSchema,
} from '@schemas/sync/sync.schema.js'
import { SyncInProgressError } from '@root/types/errors.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  // Run one pass now
  fastify.post(
    '/',
    {
      schema: {
        summary: 'Run a sync pass',
        description:
          'Mirrors the upstream account into the local store and returns the pass report. Restrict the pass with `types`; `full` ignores stored positions.',
        body: SyncRequestBodySchema,
        response: {
          200: SyncPassResultSchema,
          409: ErrorSchema,
          500: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['Sync'],
      },
    },
    async (request, reply) => {
      const { types, full } = request.body
      try {
        request.log.info({ types, full }, 'Sync pass requested')
        return await fastify.mirrorSync.run({
          types,
          full,
          signal: fastify.mirrorSyncSignal,
        })
      } catch (error) {
        if (error instanceof SyncInProgressError) {
          return reply.conflict(error.message)
        }
        logRouteError(request.log, request, error, {
          message: 'Sync pass failed',
          types,
        })
        return reply.serviceUnavailable('Sync pass failed')
      }
    },
  )

  // Positions, last report and schedule
  fastify.get(
    '/status',
    {
      schema: {
        summary: 'Get sync status',
        description:
          'Stored position per entity type, the report of the last pass and the schedule of the periodic job.',
        response: {
          200: SyncStatusResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Sync'],
      },
    },
    async (request, reply) => {
      try {
        return {
          running: fastify.mirrorSync.isRunning,
          positions: await fastify.mirrorSync.getPositions(),
          lastResult: fastify.mirrorSync.lastResult,
          schedule: fastify.scheduler.getJobStatus(MIRROR_SYNC_JOB),
        }
      } catch (error) {
        logRouteError(request.log, request, error, {
          message: 'Failed to read sync status',
        })
        return reply.internalServerError('Unable to read sync status')
      }
    },
  )
}

export default plugin
