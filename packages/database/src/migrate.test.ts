import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import SQLite from 'better-sqlite3'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { closeDb, createDb } from './db'
import { runMigrations } from './migrate'

let testDir = ''

async function columnNames(databasePath: string): Promise<string[]> {
  const db = createDb(databasePath)
  try {
    const tables = await db.introspection.getTables()
    const features = tables.find((table) => table.name === 'features')
    return (features?.columns ?? []).map((column) => column.name)
  } finally {
    await closeDb(db)
  }
}

describe('runMigrations', () => {
  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'feature-queue-migrate-'))
  })

  afterEach(() => {
    if (testDir) rmSync(testDir, { recursive: true, force: true })
  })

  it('creates the features table on a fresh database', async () => {
    const databasePath = join(testDir, 'nested', 'features.db')
    const db = createDb(databasePath)
    try {
      const report = await runMigrations(db)
      expect(report.applied).toEqual([
        '20250601_000001_features',
        '20250601_000002_features_in_progress',
        '20250601_000003_features_failure_tracking',
      ])
    } finally {
      await closeDb(db)
    }

    expect(await columnNames(databasePath)).toEqual([
      'id',
      'priority',
      'category',
      'name',
      'description',
      'steps',
      'passes',
      'in_progress',
      'failure_count',
      'last_error',
    ])
  })

  it('applies nothing the second time', async () => {
    const db = createDb(join(testDir, 'features.db'))
    try {
      await runMigrations(db)
      const report = await runMigrations(db)
      expect(report.applied).toEqual([])
    } finally {
      await closeDb(db)
    }
  })

  it('upgrades a database written before progress and failure tracking', async () => {
    const databasePath = join(testDir, 'legacy.db')
    const sqlite = new SQLite(databasePath)
    sqlite.exec(`
      CREATE TABLE features (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        priority INTEGER NOT NULL DEFAULT 999,
        category VARCHAR(100) NOT NULL,
        name VARCHAR(255) NOT NULL,
        description TEXT NOT NULL,
        steps TEXT NOT NULL,
        passes INTEGER NOT NULL DEFAULT 0,
        in_progress INTEGER NOT NULL DEFAULT 0
      )
    `)
    sqlite
      .prepare(
        'INSERT INTO features (priority, category, name, description, steps, passes) VALUES (?, ?, ?, ?, ?, ?)'
      )
      .run(1, 'core', 'legacy', 'from before', '["one"]', 0)
    sqlite.close()

    const db = createDb(databasePath)
    try {
      await runMigrations(db)
      const row = await db
        .selectFrom('features')
        .select(['name', 'in_progress', 'failure_count', 'last_error'])
        .executeTakeFirstOrThrow()
      expect(row).toEqual({ name: 'legacy', in_progress: 0, failure_count: 0, last_error: null })
    } finally {
      await closeDb(db)
    }
  })
})
