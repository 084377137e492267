import {
  CollectionParamsSchema,
  CollectionQuerySchema,
  CollectionResponseSchema,
  ErrorSchema,
} from '@schemas/collections/collections.schema.js'
import { getEntityDefinition } from '@services/mirror-sync/entities/registry.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/:entityType',
    {
      schema: {
        summary: 'List a collection',
        description:
          'Members of one mirrored collection in display order. Filter on the scope columns of the type (e.g. `parent_uid` for categories); an empty value matches rows where the column is null.',
        params: CollectionParamsSchema,
        querystring: CollectionQuerySchema,
        response: {
          200: CollectionResponseSchema,
          400: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Collections'],
      },
    },
    async (request, reply) => {
      const { entityType } = request.params
      const definition = getEntityDefinition(entityType)
      const scopeColumns = definition.ordering?.scope ?? []

      const scope: Record<string, string | null> = {}
      for (const [name, value] of Object.entries(request.query)) {
        if (!scopeColumns.includes(name)) {
          return reply.badRequest(
            `${name} is not a scope column of ${entityType}`,
          )
        }
        scope[name] = value === '' ? null : value
      }

      try {
        const members = await fastify.db.listCollection(definition, scope)
        return { entityType, scope, members }
      } catch (error) {
        logRouteError(request.log, request, error, {
          message: 'Failed to list collection',
          entityType,
        })
        return reply.internalServerError('Unable to list collection')
      }
    },
  )
}

export default plugin
