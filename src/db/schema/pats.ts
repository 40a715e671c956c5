import { pgTable, text, timestamp, bigint, index, uniqueIndex } from 'drizzle-orm/pg-core'
import { users } from './users.js'

export const pats = pgTable(
  'pats',
  {
    id: bigint('id', { mode: 'bigint' }).primaryKey(),
    /** Secret value; base62-encoded it is the bearer credential. */
    accessToken: bigint('access_token', { mode: 'bigint' }).notNull(),
    userId: bigint('user_id', { mode: 'bigint' })
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    scope: text('scope').notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    uniqueIndex('pats_access_token_idx').on(table.accessToken),
    index('pats_user_id_idx').on(table.userId),
  ]
)
