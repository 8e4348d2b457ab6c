import { FeatureScheduler } from '@feature-queue/core'
import {
  openFeatureStore,
  runRuntimeMigrations,
  type RuntimeMigrationReceipt,
} from '@feature-queue/database'

import type { Paths } from './types.js'

/**
 * Open the project store, migrate it, and hand a scheduler to `fn`. The store
 * is closed whether or not `fn` succeeds.
 */
export async function withScheduler<T>(
  paths: Paths,
  fn: (scheduler: FeatureScheduler, receipt: RuntimeMigrationReceipt) => Promise<T>
): Promise<T> {
  const store = openFeatureStore(paths.databasePath)
  try {
    const receipt = await runRuntimeMigrations(store.db, paths.projectDir)
    return await fn(new FeatureScheduler(store), receipt)
  } finally {
    await store.close()
  }
}
