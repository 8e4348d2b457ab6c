export { createDb, closeDb, IN_MEMORY_DATABASE } from './db'
export type { Database, FeatureRow, FeatureTable, NewFeatureRow } from './types'
export { runMigrations, createMigrator, MigrationError, type MigrationReport } from './migrate'
export { SqliteFeatureStore, openFeatureStore } from './feature-store'
export {
  importLegacyFeatures,
  LEGACY_FEATURE_FILE,
  type LegacyImportResult,
} from './legacy-import'
export {
  runRuntimeMigrations,
  describeReceipt,
  type RuntimeMigrationReceipt,
} from './runtime-migrate'
