import { z } from 'zod'
import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import { ENTITY_TYPES } from '@root/types/entities.types.js'

export const EntityTypeSchema = z.enum(ENTITY_TYPES)

// Fastify hands over null for a missing body; that runs a pass over every type
export const SyncRequestBodySchema = z.preprocess(
  (body) => body ?? {},
  z.object({
    types: z.array(EntityTypeSchema).min(1).optional(),
    full: z.boolean().optional(),
  }),
)

const SyncCountsSchema = z.object({
  added: z.number(),
  changed: z.number(),
  removed: z.number(),
  unchanged: z.number(),
  trashed: z.number(),
  restored: z.number(),
  reordered: z.number(),
})

export const SyncAnomalySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('duplicate-uid'),
    entityType: EntityTypeSchema,
    uid: z.string(),
    occurrences: z.number(),
  }),
  z.object({
    kind: z.literal('duplicate-position'),
    entityType: EntityTypeSchema,
    scope: z.string().nullable(),
    position: z.number(),
    uids: z.array(z.string()),
  }),
  z.object({
    kind: z.literal('category-cycle'),
    entityType: EntityTypeSchema,
    uids: z.array(z.string()),
  }),
])

const IntegrityViolationSchema = z.object({
  entityType: z.string(),
  uid: z.string().nullable(),
  column: z.string(),
  referencedType: z.string(),
  referencedUid: z.string().nullable(),
})

export const SyncPassResultSchema = z.object({
  startedAt: z.string(),
  finishedAt: z.string(),
  cancelled: z.boolean(),
  hadChanges: z.boolean(),
  totals: SyncCountsSchema,
  entities: z.array(
    z.object({
      entityType: EntityTypeSchema,
      status: z.enum(['up-to-date', 'applied', 'failed', 'cancelled']),
      position: z.string().nullable(),
      counts: SyncCountsSchema,
      error: z.string().optional(),
    }),
  ),
  anomalies: z.array(SyncAnomalySchema),
  failures: z.array(
    z.object({
      kind: z.enum(['fetch', 'malformed', 'integrity', 'unknown']),
      entityTypes: z.array(EntityTypeSchema),
      message: z.string(),
      violations: z.array(IntegrityViolationSchema).optional(),
    }),
  ),
})

export const SyncStatusResponseSchema = z.object({
  running: z.boolean(),
  positions: z.record(
    z.string(),
    z.object({
      position: z.string(),
      updatedAt: z.string(),
    }),
  ),
  lastResult: SyncPassResultSchema.nullable(),
  schedule: z
    .object({
      intervalMs: z.number(),
      lastRun: z
        .object({
          time: z.string(),
          status: z.enum(['completed', 'failed']),
          error: z.string().optional(),
        })
        .nullable(),
      nextRun: z.string().nullable(),
    })
    .nullable(),
})

export type SyncRequestBody = z.infer<typeof SyncRequestBodySchema>
export type SyncPassResponse = z.infer<typeof SyncPassResultSchema>
export type SyncStatusResponse = z.infer<typeof SyncStatusResponseSchema>
export type SyncError = z.infer<typeof ErrorSchema>

// Re-export shared schemas
export { ErrorSchema }
