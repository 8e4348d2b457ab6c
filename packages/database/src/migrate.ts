import { Migrator, type Kysely, type MigrationResult } from 'kysely'
import { migrations } from '../migrations'
import type { Database } from './types'

export interface MigrationReport {
  applied: string[]
}

export class MigrationError extends Error {
  readonly migrationName?: string

  constructor(message: string, options: { migrationName?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'MigrationError'
    this.migrationName = options.migrationName
  }
}

export function createMigrator(db: Kysely<Database>): Migrator {
  return new Migrator({
    db,
    provider: {
      getMigrations: () => Promise.resolve(migrations),
    },
  })
}

/**
 * Apply pending migrations in name order. Throws a MigrationError naming the
 * failed migration; migrations that ran before it stay applied.
 */
export async function runMigrations(db: Kysely<Database>): Promise<MigrationReport> {
  const { error, results } = await createMigrator(db).migrateToLatest()
  const outcomes: MigrationResult[] = results ?? []

  if (error) {
    const failed = outcomes.find((result) => result.status === 'Error')
    throw new MigrationError(`Migration failed: ${formatUnknownError(error)}`, {
      migrationName: failed?.migrationName,
      cause: error,
    })
  }

  return {
    applied: outcomes
      .filter((result) => result.status === 'Success')
      .map((result) => result.migrationName),
  }
}

function formatUnknownError(value: unknown): string {
  if (typeof value === 'string') {
    return value
  }
  if (value instanceof Error) {
    return value.message
  }
  try {
    return JSON.stringify(value)
  } catch {
    return 'Unknown migration error'
  }
}
