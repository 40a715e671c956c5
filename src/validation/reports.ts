import { z } from 'zod/v4'

/** Longest report body accepted, in UTF-16 code units. */
export const REPORT_BODY_MAX_LENGTH = 65536

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

/**
 * POST /v2/report body. `item_type` stays a plain string here; the report
 * service rejects unknown kinds with a message naming them.
 */
export const createReportSchema = z.object({
  report_type: z.string().min(1, 'report_type is required'),
  item_id: z.string().min(1, 'item_id is required'),
  item_type: z.string().min(1, 'item_type is required'),
  body: z.string().max(REPORT_BODY_MAX_LENGTH),
})

export type CreateReportInput = z.infer<typeof createReportSchema>

/** PATCH /v2/report/:id body. `null` and an absent key both leave the field alone. */
export const editReportSchema = z.object({
  body: z.string().max(REPORT_BODY_MAX_LENGTH).nullish(),
  closed: z.boolean().nullish(),
})

export type EditReportInput = z.infer<typeof editReportSchema>

// ---------------------------------------------------------------------------
// Query schemas
// ---------------------------------------------------------------------------

/** GET /v2/report query. */
export const reportsQuerySchema = z.object({
  count: z.coerce.number().int().min(1).max(1000).default(100),
  all: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
})

export type ReportsQueryInput = z.infer<typeof reportsQuerySchema>
