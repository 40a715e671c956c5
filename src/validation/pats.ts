import { z } from 'zod/v4'

// ---------------------------------------------------------------------------
// Query schemas
// ---------------------------------------------------------------------------

const expireInDays = (maxDays: number) =>
  z.coerce
    .number()
    .int('expire_in_days must be a whole number of days')
    .min(1, 'expire_in_days must be at least 1')
    .max(maxDays, `expire_in_days must be at most ${maxDays}`)

/** POST /v2/pat query. The upper bound comes from PAT_MAX_EXPIRE_DAYS. */
export function createPatQuerySchema(maxDays: number) {
  return z.object({
    scope: z.string().max(1000),
    expire_in_days: expireInDays(maxDays),
  })
}

/** PATCH /v2/pat query. Omitted fields keep their stored value. */
export function editPatQuerySchema(maxDays: number) {
  return z.object({
    access_token: z.string().min(1, 'access_token is required'),
    scope: z.string().max(1000).optional(),
    expire_in_days: expireInDays(maxDays).optional(),
  })
}

/** DELETE /v2/pat query. */
export const deletePatQuerySchema = z.object({
  access_token: z.string().min(1, 'access_token is required'),
})

export type CreatePatQuery = z.infer<ReturnType<typeof createPatQuerySchema>>
export type EditPatQuery = z.infer<ReturnType<typeof editPatQuerySchema>>
