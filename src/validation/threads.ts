import { z } from 'zod/v4'
import { REPORT_BODY_MAX_LENGTH } from './reports.js'

/** POST /v2/thread/:id body. */
export const postMessageSchema = z.object({
  body: z.string().trim().min(1, 'Message body is required').max(REPORT_BODY_MAX_LENGTH),
})

export type PostMessageInput = z.infer<typeof postMessageSchema>
