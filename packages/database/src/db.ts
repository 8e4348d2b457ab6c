import SQLite from 'better-sqlite3'
import { Kysely, SqliteDialect } from 'kysely'
import { existsSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import type { Database } from './types'

export const IN_MEMORY_DATABASE = ':memory:'

/**
 * Open a Kysely handle on a SQLite file, creating its directory when missing.
 * The caller owns the handle and must release it with closeDb().
 */
export function createDb(databasePath: string): Kysely<Database> {
  if (databasePath !== IN_MEMORY_DATABASE) {
    const dir = dirname(databasePath)
    if (dir && dir !== '.' && !existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }
  }

  const sqlite = new SQLite(databasePath)
  sqlite.pragma('journal_mode = WAL')

  return new Kysely<Database>({
    dialect: new SqliteDialect({
      database: sqlite,
    }),
  })
}

export async function closeDb(db: Kysely<Database>): Promise<void> {
  // Destroying the dialect closes the underlying better-sqlite3 connection
  await db.destroy()
}

export type { Database } from './types'
