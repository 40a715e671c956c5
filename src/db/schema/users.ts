import { pgTable, text, timestamp, bigint, index } from 'drizzle-orm/pg-core'
import { sql } from 'drizzle-orm'

/**
 * Platform accounts. Owned by the account service; this API only reads them
 * (role checks, PAT owner lookup, report target validation).
 */
export const users = pgTable(
  'users',
  {
    id: bigint('id', { mode: 'bigint' }).primaryKey(),
    username: text('username').notNull(),
    email: text('email'),
    role: text('role', { enum: ['developer', 'moderator', 'admin'] })
      .notNull()
      .default('developer'),
    created: timestamp('created', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('users_role_elevated_idx')
      .on(table.role)
      .where(sql`role IN ('moderator', 'admin')`),
    index('users_username_idx').on(table.username),
  ]
)

export type UserRole = (typeof users.$inferSelect)['role']
