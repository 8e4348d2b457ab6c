import type { Kysely } from 'kysely'

// Databases written before the migration table existed may already carry a column.
export async function hasColumn(db: Kysely<unknown>, table: string, column: string): Promise<boolean> {
  const tables = await db.introspection.getTables()
  const match = tables.find((candidate) => candidate.name === table)
  return match?.columns.some((candidate) => candidate.name === column) ?? false
}
