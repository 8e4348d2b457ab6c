import type { Kysely } from 'kysely'
import { importLegacyFeatures, type LegacyImportResult } from './legacy-import'
import { runMigrations } from './migrate'
import type { Database } from './types'

export type RuntimeMigrationReceipt = {
  applied: string[]
  legacyImport: LegacyImportResult
}

/**
 * Bring a project database up to date before serving: schema migrations
 * first, then the one-time import of the legacy JSON feature list.
 */
export async function runRuntimeMigrations(
  db: Kysely<Database>,
  projectDir: string
): Promise<RuntimeMigrationReceipt> {
  const { applied } = await runMigrations(db)
  const legacyImport = await importLegacyFeatures(db, projectDir)

  return { applied, legacyImport }
}

export function describeReceipt(receipt: RuntimeMigrationReceipt): string[] {
  const lines =
    receipt.applied.length > 0
      ? receipt.applied.map((name) => `  ✓ ${name}`)
      : ['  ✓ No pending migrations']

  if (receipt.legacyImport.status === 'completed') {
    lines.push(
      `  ✓ Imported ${receipt.legacyImport.imported} features from ${receipt.legacyImport.file}`
    )
  }
  return lines
}
