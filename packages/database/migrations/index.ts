import type { Migration } from 'kysely'
import * as features from './20250601_000001_features'
import * as featuresInProgress from './20250601_000002_features_in_progress'
import * as featuresFailureTracking from './20250601_000003_features_failure_tracking'

export const migrations: Record<string, Migration> = {
  '20250601_000001_features': features,
  '20250601_000002_features_in_progress': featuresInProgress,
  '20250601_000003_features_failure_tracking': featuresFailureTracking,
}
