import { HealthCheckResponseSchema } from '@schemas/health/health.schema.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        description:
          'Returns the health status of the mirror. Used by Docker HEALTHCHECK and orchestrators.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      const timestamp = new Date().toISOString()
      const dbStatus = (await fastify.db.ping()) ? 'ok' : 'failed'

      const isHealthy = dbStatus === 'ok'
      const statusCode = isHealthy ? 200 : 503

      return reply.status(statusCode).send({
        status: isHealthy ? 'healthy' : 'unhealthy',
        timestamp,
        checks: {
          database: dbStatus,
          syncRunning: fastify.mirrorSync.isRunning,
        },
      })
    },
  )
}

export default plugin
