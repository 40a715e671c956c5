import { pgTable, text, bigint, index } from 'drizzle-orm/pg-core'

export const versions = pgTable(
  'versions',
  {
    id: bigint('id', { mode: 'bigint' }).primaryKey(),
    projectId: bigint('mod_id', { mode: 'bigint' }).notNull(),
    versionNumber: text('version_number').notNull(),
  },
  (table) => [index('versions_mod_id_idx').on(table.projectId)]
)
