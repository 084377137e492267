import { z } from 'zod'
import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import { EntityTypeSchema } from '@root/schemas/sync/sync.schema.js'

export const CollectionParamsSchema = z.object({
  entityType: EntityTypeSchema,
})

// Scope filters: one query parameter per scope column, empty string = null
export const CollectionQuerySchema = z.record(z.string(), z.string())

export const CollectionMemberSchema = z.object({
  id: z.number(),
  uid: z.string(),
  position: z.number().nullable(),
  row: z.record(
    z.string(),
    z.union([z.string(), z.number(), z.boolean(), z.null()]),
  ),
})

export const CollectionResponseSchema = z.object({
  entityType: EntityTypeSchema,
  scope: z.record(z.string(), z.string().nullable()),
  members: z.array(CollectionMemberSchema),
})

export type CollectionParams = z.infer<typeof CollectionParamsSchema>
export type CollectionQuery = z.infer<typeof CollectionQuerySchema>
export type CollectionResponse = z.infer<typeof CollectionResponseSchema>

// Re-export shared schemas
export { ErrorSchema }
