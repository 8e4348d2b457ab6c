import type { Expression, ExpressionBuilder, Kysely, SqlBool } from 'kysely'
import { z } from 'zod'
import {
  type Feature,
  type FeatureFilter,
  type FeatureStore,
  type FeatureStoreTransaction,
  type FeatureUpdate,
  type NewFeature,
  FeatureNotFoundError,
  StoreError,
  formatError,
} from '@feature-queue/core'
import { closeDb, createDb } from './db'
import type { Database, FeatureRow, FeatureRowUpdate } from './types'

const stepsSchema = z.array(z.string())

function dbRowToFeature(row: FeatureRow): Feature {
  return {
    id: row.id,
    priority: row.priority,
    category: row.category,
    name: row.name,
    description: row.description,
    steps: parseSteps(row),
    passes: row.passes === 1,
    inProgress: row.in_progress === 1,
    failureCount: row.failure_count ?? 0,
    lastError: row.last_error,
  }
}

function parseSteps(row: FeatureRow): string[] {
  let decoded: unknown
  try {
    decoded = JSON.parse(row.steps)
  } catch (error) {
    throw new StoreError(`Feature ${row.id} has unreadable steps`, { cause: error })
  }
  const result = stepsSchema.safeParse(decoded)
  if (!result.success) {
    throw new StoreError(`Feature ${row.id} has malformed steps`)
  }
  return result.data
}

function featureUpdateToRow(updates: FeatureUpdate): FeatureRowUpdate {
  const row: FeatureRowUpdate = {}
  if (updates.priority !== undefined) row.priority = updates.priority
  if (updates.passes !== undefined) row.passes = updates.passes ? 1 : 0
  if (updates.inProgress !== undefined) row.in_progress = updates.inProgress ? 1 : 0
  if (updates.failureCount !== undefined) row.failure_count = updates.failureCount
  if (updates.lastError !== undefined) row.last_error = updates.lastError
  return row
}

function filterExpression(
  eb: ExpressionBuilder<Database, 'features'>,
  filter: FeatureFilter = {}
): Expression<SqlBool> {
  const conditions: Expression<SqlBool>[] = []
  if (filter.passes !== undefined) {
    conditions.push(eb('passes', '=', filter.passes ? 1 : 0))
  }
  if (filter.inProgress !== undefined) {
    conditions.push(eb('in_progress', '=', filter.inProgress ? 1 : 0))
  }
  const failureCount = eb.fn.coalesce('failure_count', eb.val(0))
  if (filter.failureCountBelow !== undefined) {
    conditions.push(eb(failureCount, '<', filter.failureCountBelow))
  }
  if (filter.failureCountAtLeast !== undefined) {
    conditions.push(eb(failureCount, '>=', filter.failureCountAtLeast))
  }
  return eb.and(conditions)
}

async function guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run()
  } catch (error) {
    if (error instanceof StoreError) throw error
    throw new StoreError(`Feature store ${operation} failed: ${formatError(error)}`, {
      cause: error,
    })
  }
}

class SqliteFeatureTransaction implements FeatureStoreTransaction {
  constructor(private readonly trx: Kysely<Database>) {}

  async findById(id: number): Promise<Feature | null> {
    const row = await guard('read', () =>
      this.trx.selectFrom('features').selectAll().where('id', '=', id).executeTakeFirst()
    )
    return row ? dbRowToFeature(row) : null
  }

  async findFirst(filter: FeatureFilter): Promise<Feature | null> {
    const row = await guard('read', () =>
      this.trx
        .selectFrom('features')
        .selectAll()
        .where((eb) => filterExpression(eb, filter))
        .orderBy('priority', 'asc')
        .orderBy('id', 'asc')
        .limit(1)
        .executeTakeFirst()
    )
    return row ? dbRowToFeature(row) : null
  }

  async list(filter: FeatureFilter): Promise<Feature[]> {
    const rows = await guard('read', () =>
      this.trx
        .selectFrom('features')
        .selectAll()
        .where((eb) => filterExpression(eb, filter))
        .orderBy('priority', 'asc')
        .orderBy('id', 'asc')
        .execute()
    )
    return rows.map(dbRowToFeature)
  }

  async count(filter?: FeatureFilter): Promise<number> {
    const result = await guard('read', () =>
      this.trx
        .selectFrom('features')
        .select((eb) => eb.fn.countAll<number>().as('count'))
        .where((eb) => filterExpression(eb, filter))
        .executeTakeFirst()
    )
    return Number(result?.count ?? 0)
  }

  async maxPriority(): Promise<number | null> {
    const result = await guard('read', () =>
      this.trx
        .selectFrom('features')
        .select((eb) => eb.fn.max('priority').as('max_priority'))
        .executeTakeFirst()
    )
    const value = result?.max_priority
    return value === null || value === undefined ? null : Number(value)
  }

  async update(id: number, updates: FeatureUpdate): Promise<Feature> {
    const row = await guard('write', () =>
      this.trx
        .updateTable('features')
        .set(featureUpdateToRow(updates))
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst()
    )
    if (!row) {
      throw new FeatureNotFoundError(id)
    }
    return dbRowToFeature(row)
  }

  async insertMany(features: NewFeature[]): Promise<number> {
    if (features.length === 0) return 0
    await guard('write', () =>
      this.trx
        .insertInto('features')
        .values(
          features.map((feature) => ({
            priority: feature.priority,
            category: feature.category,
            name: feature.name,
            description: feature.description,
            steps: JSON.stringify(feature.steps),
            passes: 0,
            in_progress: 0,
            failure_count: 0,
            last_error: null,
          }))
        )
        .execute()
    )
    return features.length
  }
}

/**
 * FeatureStore backed by SQLite through Kysely. The SQLite driver runs every
 * transaction on its single connection behind a mutex, so transactions never
 * interleave within the process.
 */
export class SqliteFeatureStore implements FeatureStore {
  constructor(readonly db: Kysely<Database>) {}

  async transaction<T>(fn: (tx: FeatureStoreTransaction) => Promise<T>): Promise<T> {
    let rejectedByCaller = false
    try {
      return await this.db.transaction().execute(async (trx) => {
        try {
          return await fn(new SqliteFeatureTransaction(trx))
        } catch (error) {
          rejectedByCaller = true
          throw error
        }
      })
    } catch (error) {
      // Errors from fn pass through untouched; begin/commit failures are store errors
      if (rejectedByCaller || error instanceof StoreError) throw error
      throw new StoreError(`Feature store transaction failed: ${formatError(error)}`, {
        cause: error,
      })
    }
  }

  close(): Promise<void> {
    return closeDb(this.db)
  }
}

export function openFeatureStore(databasePath: string): SqliteFeatureStore {
  return new SqliteFeatureStore(createDb(databasePath))
}
