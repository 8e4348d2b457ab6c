import type { Kysely } from 'kysely'

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('features')
    .ifNotExists()
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('priority', 'integer', (col) => col.notNull().defaultTo(999))
    .addColumn('category', 'varchar(100)', (col) => col.notNull())
    .addColumn('name', 'varchar(255)', (col) => col.notNull())
    .addColumn('description', 'text', (col) => col.notNull())
    .addColumn('steps', 'text', (col) => col.notNull())
    .addColumn('passes', 'integer', (col) => col.notNull().defaultTo(0))
    .execute()

  await db.schema
    .createIndex('idx_features_priority_id')
    .ifNotExists()
    .on('features')
    .columns(['priority', 'id'])
    .execute()

  await db.schema
    .createIndex('idx_features_passes')
    .ifNotExists()
    .on('features')
    .column('passes')
    .execute()
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropIndex('idx_features_passes').ifExists().execute()
  await db.schema.dropIndex('idx_features_priority_id').ifExists().execute()
  await db.schema.dropTable('features').ifExists().execute()
}
