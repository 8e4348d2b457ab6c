import type { Generated, Insertable, Selectable, Updateable } from 'kysely'

export interface Database {
  features: FeatureTable
}

// Booleans are stored as 0/1 integers; steps as a JSON-encoded string array.
export interface FeatureTable {
  id: Generated<number>
  priority: number
  category: string
  name: string
  description: string
  steps: string
  passes: number
  in_progress: number
  // NULL in databases that gained the column outside our migrations
  failure_count: number | null
  last_error: string | null
}

export type FeatureRow = Selectable<FeatureTable>
export type NewFeatureRow = Insertable<FeatureTable>
export type FeatureRowUpdate = Updateable<FeatureTable>
