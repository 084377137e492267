import { UpstreamClientService } from '@services/upstream-client.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    upstream: UpstreamClientService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    const upstream = new UpstreamClientService(fastify.log, {
      baseUrl: config.upstreamBaseUrl,
      token: config.upstreamToken,
      email: config.upstreamEmail,
      password: config.upstreamPassword,
      timeoutMs: config.upstreamTimeoutMs,
      hydrateConcurrency: config.hydrateConcurrency,
    })

    fastify.decorate('upstream', upstream)
  },
  {
    name: 'upstream',
    dependencies: ['config'],
  },
)
