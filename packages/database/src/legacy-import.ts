import { existsSync, readFileSync, renameSync } from 'node:fs'
import path from 'node:path'
import type { Kysely } from 'kysely'
import { z } from 'zod'
import type { Database } from './types'

export const LEGACY_FEATURE_FILE = 'feature_list.json'

const legacyFeatureSchema = z.object({
  category: z.string().min(1),
  name: z.string().min(1).optional(),
  description: z.string().min(1),
  steps: z.array(z.string()).min(1),
  passes: z.boolean().optional(),
})

const legacyFeatureListSchema = z.array(legacyFeatureSchema)

export type LegacyImportResult =
  | { status: 'skipped'; reason: 'no-legacy-file' | 'store-not-empty'; file: string }
  | { status: 'completed'; imported: number; file: string; backupFile: string }

/**
 * Import the JSON feature list used before the database existed. Runs only
 * when the features table is empty; the source file is renamed to *.backup
 * once the rows are committed.
 */
export async function importLegacyFeatures(
  db: Kysely<Database>,
  projectDir: string
): Promise<LegacyImportResult> {
  const file = path.join(projectDir, LEGACY_FEATURE_FILE)
  if (!existsSync(file)) {
    return { status: 'skipped', reason: 'no-legacy-file', file }
  }

  const existing = await db
    .selectFrom('features')
    .select((eb) => eb.fn.countAll<number>().as('count'))
    .executeTakeFirst()
  if (Number(existing?.count ?? 0) > 0) {
    return { status: 'skipped', reason: 'store-not-empty', file }
  }

  const parsed = legacyFeatureListSchema.safeParse(JSON.parse(readFileSync(file, 'utf8')))
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid ${LEGACY_FEATURE_FILE}: ${detail}`)
  }

  const features = parsed.data
  if (features.length > 0) {
    await db.transaction().execute(async (trx) => {
      await trx
        .insertInto('features')
        .values(
          features.map((feature, index) => ({
            priority: index + 1,
            category: feature.category,
            name: feature.name ?? feature.description.slice(0, 100),
            description: feature.description,
            steps: JSON.stringify(feature.steps),
            passes: feature.passes ? 1 : 0,
            in_progress: 0,
            failure_count: 0,
            last_error: null,
          }))
        )
        .execute()
    })
  }

  const backupFile = `${file}.backup`
  renameSync(file, backupFile)
  return { status: 'completed', imported: features.length, file, backupFile }
}
