import { pgTable, text, bigint } from 'drizzle-orm/pg-core'

// Only the columns report validation reads; the project service owns the rest.
export const projects = pgTable('mods', {
  id: bigint('id', { mode: 'bigint' }).primaryKey(),
  slug: text('slug'),
  title: text('title').notNull(),
})
