import { pgTable, text, serial, uniqueIndex } from 'drizzle-orm/pg-core'

export const reportTypes = pgTable(
  'report_types',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
  },
  (table) => [uniqueIndex('report_types_name_idx').on(table.name)]
)
