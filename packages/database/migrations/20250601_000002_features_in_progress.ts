import type { Kysely } from 'kysely'
import { hasColumn } from './columns'

export async function up(db: Kysely<unknown>): Promise<void> {
  if (await hasColumn(db, 'features', 'in_progress')) return

  await db.schema
    .alterTable('features')
    .addColumn('in_progress', 'integer', (col) => col.notNull().defaultTo(0))
    .execute()
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.alterTable('features').dropColumn('in_progress').execute()
}
