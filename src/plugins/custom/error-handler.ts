import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import { SyncInProgressError } from '@root/types/errors.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

/**
 * Status code for an error thrown out of a route. Errors raised by the sync
 * engine carry no HTTP status of their own.
 */
function statusCodeOf(err: FastifyError | Error): number {
  if (err instanceof SyncInProgressError) return 409
  if ('statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode
  }
  return 500
}

/**
 * Global error handler plugin.
 * Provides consistent error responses and appropriate logging.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    const statusCode = statusCodeOf(err)
    // Avoid logging query/params to prevent leaking tokens/PII
    const logData = {
      err,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
        route: request.routeOptions?.url,
      },
    }

    if (statusCode >= 500) {
      request.log.error(logData, 'Internal server error occurred')
    } else {
      request.log.warn(logData, 'Client error occurred')
    }
    reply.code(statusCode)
    const isServerError = statusCode >= 500
    const payload: ErrorResponse = {
      statusCode,
      code:
        err instanceof SyncInProgressError
          ? 'SYNC_IN_PROGRESS'
          : err.code || 'GENERIC_ERROR',
      error: isServerError
        ? 'Internal Server Error'
        : statusCode === 409
          ? 'Conflict'
          : 'error' in err && typeof err.error === 'string'
            ? err.error
            : 'Client Error',
      message: isServerError
        ? 'Internal Server Error'
        : err.message || 'An error occurred',
    }
    return payload
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
})
