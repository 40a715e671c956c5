import { pgTable, text, timestamp, index, bigint, integer, boolean } from 'drizzle-orm/pg-core'
import { reportTypes } from './report-types.js'
import { users } from './users.js'

/**
 * Moderation reports. The target is stored as three nullable columns with at
 * most one set; they are not foreign keys, existence is checked on creation
 * only.
 */
export const reports = pgTable(
  'reports',
  {
    id: bigint('id', { mode: 'bigint' }).primaryKey(),
    reportTypeId: integer('report_type_id')
      .notNull()
      .references(() => reportTypes.id),
    projectId: bigint('mod_id', { mode: 'bigint' }),
    versionId: bigint('version_id', { mode: 'bigint' }),
    userId: bigint('user_id', { mode: 'bigint' }),
    body: text('body').notNull(),
    reporter: bigint('reporter', { mode: 'bigint' })
      .notNull()
      .references(() => users.id),
    created: timestamp('created', { withTimezone: true }).notNull().defaultNow(),
    closed: boolean('closed').notNull().default(false),
    // No foreign key: deletion removes the thread before the report row.
    threadId: bigint('thread_id', { mode: 'bigint' }).notNull(),
  },
  (table) => [
    index('reports_reporter_idx').on(table.reporter),
    index('reports_closed_created_idx').on(table.closed, table.created),
    index('reports_thread_id_idx').on(table.threadId),
  ]
)
