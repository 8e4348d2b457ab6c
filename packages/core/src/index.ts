export {
  MAX_FEATURE_FAILURES,
  MAX_ERROR_LENGTH,
  truncateError,
  type Feature,
  type FeatureUpdate,
  type NewFeature,
} from './feature'
export {
  type FeatureFilter,
  type FeatureStore,
  type FeatureStoreTransaction,
  InMemoryFeatureStore,
  compareQueueOrder,
  matchesFilter,
} from './feature-store'
export {
  FeatureScheduler,
  roundPercentage,
  type FailureResult,
  type FeatureSchedulerOptions,
  type FeatureStats,
  type FetchNextResult,
  type SkipResult,
} from './scheduler'
export {
  SchedulerError,
  FeatureNotFoundError,
  FeatureAlreadyPassingError,
  FeatureValidationError,
  StoreError,
  isSchedulerError,
  formatError,
  type SchedulerErrorCode,
} from './errors'
export {
  featureInputSchema,
  checkFeatureInput,
  type FeatureInput,
  type FeatureInputCheck,
} from './schemas'
export { shuffle, sample, type RandomSource } from './shuffle'
