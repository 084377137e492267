import { z } from 'zod'

// Every upstream payload is wrapped as { "result": ... }
export const upstreamResult = <T extends z.ZodType>(schema: T) =>
  z.object({ result: schema })

export const UpstreamLoginSchema = upstreamResult(
  z.object({ token: z.string().min(1) }),
)

// Change counter per collection; unknown collections are kept and ignored
export const UpstreamStatusSchema = upstreamResult(
  z.record(z.string(), z.number().int()),
)

export const UpstreamScalarSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
])

// Rows are validated column by column once they are mapped to a table
export const UpstreamRecordSchema = z.looseObject({
  uid: z.string().min(1),
})

export const UpstreamCollectionSchema = upstreamResult(
  z.array(UpstreamRecordSchema),
)

export const UpstreamRecipeSummarySchema = z.object({
  uid: z.string().min(1),
  hash: z.string().min(1),
})

export const UpstreamRecipeSummariesSchema = upstreamResult(
  z.array(UpstreamRecipeSummarySchema),
)

export const UpstreamRecipeSchema = upstreamResult(
  z.looseObject({
    uid: z.string().min(1),
    hash: z.string().min(1),
    categories: z.array(z.string()).default([]),
  }),
)

export type UpstreamStatus = z.infer<typeof UpstreamStatusSchema>['result']
export type UpstreamRecord = z.infer<typeof UpstreamRecordSchema>
export type UpstreamRecipeSummary = z.infer<typeof UpstreamRecipeSummarySchema>
