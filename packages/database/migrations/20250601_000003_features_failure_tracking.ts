import { sql, type Kysely } from 'kysely'
import { hasColumn } from './columns'

export async function up(db: Kysely<unknown>): Promise<void> {
  if (!(await hasColumn(db, 'features', 'failure_count'))) {
    await db.schema
      .alterTable('features')
      .addColumn('failure_count', 'integer', (col) => col.notNull().defaultTo(0))
      .execute()
  } else {
    await sql`UPDATE features SET failure_count = 0 WHERE failure_count IS NULL`.execute(db)
  }

  if (!(await hasColumn(db, 'features', 'last_error'))) {
    await db.schema.alterTable('features').addColumn('last_error', 'text').execute()
  }
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.alterTable('features').dropColumn('last_error').execute()
  await db.schema.alterTable('features').dropColumn('failure_count').execute()
}
