import { pgTable, text, timestamp, index, bigint, jsonb, primaryKey } from 'drizzle-orm/pg-core'
import { users } from './users.js'

export const THREAD_TYPES = ['report', 'project', 'direct_message'] as const

export type ThreadType = (typeof THREAD_TYPES)[number]

/** Tagged message payload stored in `threads_messages.body`. */
export type MessageBody =
  | { type: 'text'; body: string }
  | { type: 'thread_closure' }
  | { type: 'thread_reopen' }

export const threads = pgTable('threads', {
  id: bigint('id', { mode: 'bigint' }).primaryKey(),
  threadType: text('thread_type', { enum: THREAD_TYPES }).notNull(),
})

export const threadMembers = pgTable(
  'threads_members',
  {
    threadId: bigint('thread_id', { mode: 'bigint' })
      .notNull()
      .references(() => threads.id, { onDelete: 'cascade' }),
    userId: bigint('user_id', { mode: 'bigint' })
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
  },
  (table) => [primaryKey({ columns: [table.threadId, table.userId] })]
)

export const threadMessages = pgTable(
  'threads_messages',
  {
    id: bigint('id', { mode: 'bigint' }).primaryKey(),
    threadId: bigint('thread_id', { mode: 'bigint' })
      .notNull()
      .references(() => threads.id, { onDelete: 'cascade' }),
    /** Null for system-generated messages. */
    authorId: bigint('author_id', { mode: 'bigint' }).references(() => users.id),
    body: jsonb('body').$type<MessageBody>().notNull(),
    created: timestamp('created', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('threads_messages_thread_created_idx').on(table.threadId, table.created)]
)
